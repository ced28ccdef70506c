/**
 * Run parameter schemas
 *
 * The CLI merges defaults, environment and flags into one bundle and
 * validates it here before any file or remote work starts.
 */

import { z } from 'zod';
import { ValidationError } from '../errors';
import { isDottedQuad, parseHostAndPort } from '../utils/validation';
import type { RemoteTarget } from '../remote/types';
import type { ConnectionParams } from '../telegraf/types';

export const EnvSchema = z.object({
  DEFAULT_IP: z.string().min(1).optional(),
  DEFAULT_USERNAME: z.string().optional(),
  DEFAULT_PASSWORD: z.string().optional(),
  DEFAULT_IOT_IP: z.string().min(1).optional(),
  DEFAULT_IOT_PASSWORD: z.string().optional(),
  IOT_USERNAME: z.string().min(1).optional(),
});
export type EnvSettings = z.infer<typeof EnvSchema>;

export const RunParametersSchema = z.object({
  folder: z.string().min(1, 'Folder must not be empty'),
  ip: z.string().refine(isDottedQuad, ip => ({
    message: `Invalid IP address format for '${ip}', expecting something like: 192.168.0.1`,
  })),
  username: z.string(),
  password: z.string(),
  iotUsername: z.string().min(1),
  iotPassword: z.string(),
  iotHost: z.string().refine(value => parseHostAndPort(value) !== undefined, host => ({
    message: `Invalid IOT host format for '${host}', expecting something like: 192.168.0.1:22`,
  })),
  tokenFolder: z.string().min(1, 'Token folder must not be empty'),
  send: z.boolean().default(false),
  backupInflux: z.boolean().default(false),
  backupGrafana: z.boolean().default(false),
});
export type RunParameters = z.infer<typeof RunParametersSchema>;

/**
 * Validate a merged parameter bundle; the first problem is raised as a
 * ValidationError naming the offending field.
 */
export function validateRunParameters(input: unknown): RunParameters {
  const result = RunParametersSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue.path.join('.') || 'parameters', issue.message);
  }
  return result.data;
}

export function toConnectionParams(params: RunParameters): ConnectionParams {
  return {
    host: params.ip,
    username: params.username,
    password: params.password,
  };
}

export function toRemoteTarget(params: RunParameters): RemoteTarget {
  const address = parseHostAndPort(params.iotHost);
  if (!address) {
    throw new ValidationError(
      'iotHost',
      `Invalid IOT host format for '${params.iotHost}', expecting something like: 192.168.0.1:22`
    );
  }
  return {
    host: address.host,
    port: address.port,
    username: params.iotUsername,
    password: params.iotPassword,
  };
}
