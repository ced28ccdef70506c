/**
 * SSH-backed remote session
 *
 * Commands run over exec channels on one authenticated connection; file
 * transfer and directory listing go through a single SFTP subsystem opened
 * on first use.
 */

import { Client } from 'ssh2';
import type { ClientErrorExtensions, SFTPWrapper } from 'ssh2';
import {
  AuthError,
  ConnectError,
  ExecError,
  TransferError,
  describeError,
} from '../errors';
import type { TransferDirection } from '../errors';
import logger from '../utils/logger';
import { LogComponents } from '../utils/components';
import { describeTarget } from './types';
import type { RemoteSession, RemoteTarget } from './types';

export const DEFAULT_FILE_MODE = 0o644;

export interface ConnectOptions {
  /** Handshake and authentication timeout in milliseconds */
  readyTimeout?: number;
}

export class Ssh2RemoteSession implements RemoteSession {
  private sftp?: SFTPWrapper;
  private closed = false;

  constructor(private readonly client: Client, public readonly target: RemoteTarget) {}

  private openSftp(direction: TransferDirection, path: string): Promise<SFTPWrapper> {
    if (this.sftp) {
      return Promise.resolve(this.sftp);
    }
    return new Promise((resolve, reject) => {
      this.client.sftp((err, sftp) => {
        if (err) {
          reject(new TransferError(direction, path, `SFTP unavailable: ${err.message}`, err));
          return;
        }
        this.sftp = sftp;
        resolve(sftp);
      });
    });
  }

  async uploadFile(localPath: string, remotePath: string, mode: number = DEFAULT_FILE_MODE): Promise<void> {
    const sftp = await this.openSftp('upload', remotePath);
    logger.debug(`Uploading ${localPath} to ${remotePath}`, {
      component: LogComponents.REMOTE_SESSION,
      mode: mode.toString(8),
    });

    await new Promise<void>((resolve, reject) => {
      sftp.fastPut(localPath, remotePath, { mode }, err => {
        if (err) {
          reject(new TransferError('upload', remotePath, err.message, err));
          return;
        }
        resolve();
      });
    });
  }

  execCommand(command: string): Promise<string> {
    logger.debug(`Executing: ${command}`, { component: LogComponents.REMOTE_SESSION });

    return new Promise((resolve, reject) => {
      this.client.exec(command, (err, channel) => {
        if (err) {
          reject(new ExecError(command, err.message, err));
          return;
        }

        const chunks: Buffer[] = [];
        channel.on('data', (data: Buffer) => {
          chunks.push(data);
        });
        // stderr is not part of the result
        channel.stderr.on('data', (data: Buffer) => {
          logger.debug('Remote stderr', {
            component: LogComponents.REMOTE_SESSION,
            command,
            message: data.toString().trim(),
          });
        });
        channel.on('error', (error: Error) => {
          reject(new ExecError(command, error.message, error));
        });
        // Exit status is not checked, only that the command finished
        let exited = false;
        channel.on('exit', () => {
          exited = true;
        });
        channel.on('close', () => {
          if (!exited) {
            reject(new ExecError(command, 'channel closed before the command exited'));
            return;
          }
          resolve(Buffer.concat(chunks).toString('utf-8'));
        });
        channel.end();
      });
    });
  }

  async listDirectory(remotePath: string): Promise<string[]> {
    const sftp = await this.openSftp('list', remotePath);

    return new Promise((resolve, reject) => {
      sftp.readdir(remotePath, (err, list) => {
        if (err) {
          reject(new TransferError('list', remotePath, err.message, err));
          return;
        }
        const names = list
          .map(entry => entry.filename)
          .filter(name => name !== '.' && name !== '..')
          .sort();
        resolve(names);
      });
    });
  }

  async downloadFile(remotePath: string): Promise<Buffer> {
    const sftp = await this.openSftp('download', remotePath);

    return new Promise((resolve, reject) => {
      sftp.readFile(remotePath, (err, data) => {
        if (err) {
          reject(new TransferError('download', remotePath, err.message, err));
          return;
        }
        resolve(data);
      });
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.sftp?.end();
    this.client.end();
    logger.debug(`Disconnected from ${describeTarget(this.target)}`, { component: LogComponents.REMOTE_SESSION });
  }
}

/**
 * Open and authenticate a session. Credential rejection is an AuthError,
 * anything else that stops the handshake is a ConnectError. No retries.
 */
export function connectSession(target: RemoteTarget, options: ConnectOptions = {}): Promise<RemoteSession> {
  const client = new Client();
  const address = `${target.host}:${target.port}`;

  return new Promise((resolve, reject) => {
    const onError = (error: Error & ClientErrorExtensions) => {
      client.removeListener('ready', onReady);
      if (error.level === 'client-authentication') {
        reject(new AuthError(address, target.username, error));
      } else {
        reject(new ConnectError(address, describeError(error), error));
      }
    };

    const onReady = () => {
      client.removeListener('error', onError);
      client.on('error', (error: Error) => {
        logger.error('SSH connection error', {
          component: LogComponents.REMOTE_SESSION,
          host: address,
          error: error.message,
        });
      });
      logger.info(`Connected to ${describeTarget(target)}`, { component: LogComponents.REMOTE_SESSION });
      resolve(new Ssh2RemoteSession(client, target));
    };

    client.on('ready', onReady);
    client.on('error', onError);
    client.connect({
      host: target.host,
      port: target.port,
      username: target.username,
      password: target.password,
      readyTimeout: options.readyTimeout,
    });
  });
}
