/**
 * Logging Component Names
 *
 * Usage:
 *   logger.info('Uploading config', { component: LogComponents.PROVISIONING });
 */

export const LogComponents = {
  CLI: 'CLI',
  CONFIG: 'Config',
  EXTRACTOR: 'Extractor',
  GENERATOR: 'Generator',
  REMOTE_SESSION: 'RemoteSession',
  PROVISIONING: 'Provisioning',
  BACKUP: 'Backup',
} as const;

export type LogComponent = typeof LogComponents[keyof typeof LogComponents];
