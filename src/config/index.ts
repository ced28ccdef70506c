/**
 * Configuration Module
 * ====================
 *
 * Defaults are layered: built-in values, then a `.env` file, then the
 * process environment. Command-line flags are applied on top by the CLI.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import dotenv from 'dotenv';
import { ConfigError, ValidationError } from '../errors';
import logger from '../utils/logger';
import { LogComponents } from '../utils/components';
import { EnvSchema } from './schema';

export {
  RunParametersSchema,
  validateRunParameters,
  toConnectionParams,
  toRemoteTarget,
} from './schema';
export type { RunParameters, EnvSettings } from './schema';

export interface DefaultSettings {
  folder: string;
  ip: string;
  username: string;
  password: string;
  iotHost: string;
  iotUsername: string;
  iotPassword: string;
  tokenFolder: string;
}

export interface LoadDefaultsOptions {
  env?: NodeJS.ProcessEnv;
  /** Overrides ENV_FILE and `<cwd>/.env` */
  envFile?: string;
  cwd?: string;
}

export const BUILT_IN_DEFAULTS = {
  ip: '192.168.0.1',
  username: '',
  password: '',
  iotHost: '192.168.200.1:22',
  iotUsername: 'root',
  iotPassword: '',
} as const;

function readEnvFile(path: string): Record<string, string> {
  if (!existsSync(path)) {
    return {};
  }
  try {
    return dotenv.parse(readFileSync(path));
  } catch (error) {
    throw new ConfigError(`Failed to read environment file ${path}`, error);
  }
}

export function loadDefaults(options: LoadDefaultsOptions = {}): DefaultSettings {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const envFile = options.envFile ?? env.ENV_FILE ?? join(cwd, '.env');

  const fileValues = readEnvFile(envFile);
  if (Object.keys(fileValues).length > 0) {
    logger.debug(`Loaded defaults from ${envFile}`, { component: LogComponents.CONFIG });
  }

  const parsed = EnvSchema.safeParse({ ...fileValues, ...env });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue.path.join('.'), `Invalid environment value for ${issue.path.join('.')}: ${issue.message}`);
  }
  const settings = parsed.data;

  return {
    folder: cwd,
    ip: settings.DEFAULT_IP ?? BUILT_IN_DEFAULTS.ip,
    username: settings.DEFAULT_USERNAME ?? BUILT_IN_DEFAULTS.username,
    password: settings.DEFAULT_PASSWORD ?? BUILT_IN_DEFAULTS.password,
    iotHost: settings.DEFAULT_IOT_IP ?? BUILT_IN_DEFAULTS.iotHost,
    iotUsername: settings.IOT_USERNAME ?? BUILT_IN_DEFAULTS.iotUsername,
    iotPassword: settings.DEFAULT_IOT_PASSWORD ?? BUILT_IN_DEFAULTS.iotPassword,
    tokenFolder: cwd,
  };
}
