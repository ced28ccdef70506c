/**
 * Gateway backups
 *
 * InfluxDB: run `influx backup` into a dated directory on the gateway, then
 * pull every file it produced. Grafana: pull grafana.ini.
 *
 * A transfer failure aborts the flow; files already written are left as is.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import {
  GRAFANA_BACKUP_FILE,
  GRAFANA_CONFIG,
  influxBackupCommand,
  influxBackupDir,
} from '../remote/commands';
import type { RemoteTarget, SessionFactory } from '../remote/types';
import { ConfigError, describeError } from '../errors';
import logger from '../utils/logger';
import { LogComponents } from '../utils/components';

export interface BackupOptions {
  /** Local directory backups are written into, defaults to the process cwd */
  workingDir?: string;
  clock?: () => Date;
}

export interface BackedUpFile {
  name: string;
  bytes: number;
}

export interface InfluxBackupReport {
  remoteDir: string;
  localDir: string;
  commandOutput: string;
  files: BackedUpFile[];
}

export interface GrafanaBackupReport {
  remotePath: string;
  localPath: string;
  bytes: number;
}

/**
 * YYYY-MM-DD in local time
 */
export function formatBackupDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

async function writeLocal(path: string, data: Buffer): Promise<void> {
  try {
    await writeFile(path, data);
  } catch (error) {
    throw new ConfigError(`Failed to write ${path}: ${describeError(error)}`, error);
  }
}

export class BackupOrchestrator {
  private readonly workingDir: string;
  private readonly clock: () => Date;

  constructor(private readonly connect: SessionFactory, options: BackupOptions = {}) {
    this.workingDir = resolve(options.workingDir ?? process.cwd());
    this.clock = options.clock ?? (() => new Date());
  }

  async backupInfluxDb(target: RemoteTarget): Promise<InfluxBackupReport> {
    const date = formatBackupDate(this.clock());
    const remoteDir = influxBackupDir(date);
    const localDir = join(this.workingDir, `influx_backup_${date}`);

    const session = await this.connect(target);
    try {
      logger.info(`Backing up InfluxDB to ${remoteDir}`, { component: LogComponents.BACKUP });
      const commandOutput = await session.execCommand(influxBackupCommand(remoteDir));
      logger.info('Backup command finished', {
        component: LogComponents.BACKUP,
        output: commandOutput.trim(),
      });

      try {
        await mkdir(localDir, { recursive: true });
      } catch (error) {
        throw new ConfigError(`Failed to create ${localDir}: ${describeError(error)}`, error);
      }

      const names = await session.listDirectory(remoteDir);
      const files: BackedUpFile[] = [];
      for (const name of names) {
        const data = await session.downloadFile(`${remoteDir}/${name}`);
        await writeLocal(join(localDir, name), data);
        files.push({ name, bytes: data.length });
        logger.info(`Copied ${name} (${data.length} bytes)`, { component: LogComponents.BACKUP });
      }

      logger.info(`Backup completed successfully. Files are located at: ${localDir}`, {
        component: LogComponents.BACKUP,
        files: files.length,
      });
      return { remoteDir, localDir, commandOutput, files };
    } finally {
      await session.close();
    }
  }

  async backupGrafanaConfig(target: RemoteTarget): Promise<GrafanaBackupReport> {
    const localPath = join(this.workingDir, GRAFANA_BACKUP_FILE);

    const session = await this.connect(target);
    try {
      const data = await session.downloadFile(GRAFANA_CONFIG);
      await writeLocal(localPath, data);
      logger.info(`Grafana configuration backed up to ${localPath}`, { component: LogComponents.BACKUP });
      return { remotePath: GRAFANA_CONFIG, localPath, bytes: data.length };
    } finally {
      await session.close();
    }
  }
}
