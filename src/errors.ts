/**
 * Provisioner errors
 *
 * Every failure the tool can surface is one of these. The CLI is the only
 * place that turns them into exit codes.
 */

export class ProvisionerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProvisionerError';
  }
}

/**
 * Unreadable or malformed address-space document
 */
export class ParseError extends ProvisionerError {
  constructor(public readonly file: string, detail: string, cause?: unknown) {
    super(`Unable to parse ${file}: ${detail}`, { cause });
    this.name = 'ParseError';
  }
}

export class ValidationError extends ProvisionerError {
  constructor(public readonly field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Missing folder, unreadable token file and other local setup problems
 */
export class ConfigError extends ProvisionerError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigError';
  }
}

export class ConnectError extends ProvisionerError {
  constructor(public readonly host: string, detail: string, cause?: unknown) {
    super(`Cannot connect to ${host}: ${detail}`, { cause });
    this.name = 'ConnectError';
  }
}

export class AuthError extends ProvisionerError {
  constructor(public readonly host: string, public readonly username: string, cause?: unknown) {
    super(`Authentication failed for ${username}@${host}`, { cause });
    this.name = 'AuthError';
  }
}

export type TransferDirection = 'upload' | 'download' | 'list';

export class TransferError extends ProvisionerError {
  constructor(
    public readonly direction: TransferDirection,
    public readonly path: string,
    detail: string,
    cause?: unknown
  ) {
    super(`${direction} of ${path} failed: ${detail}`, { cause });
    this.name = 'TransferError';
  }
}

export class ExecError extends ProvisionerError {
  constructor(public readonly command: string, detail: string, cause?: unknown) {
    super(`Command '${command}' failed: ${detail}`, { cause });
    this.name = 'ExecError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
