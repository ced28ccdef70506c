/**
 * iot2050-config command line
 * ===========================
 *
 * Usage:
 *   iot2050-config                    - Generate telegraf.conf from the XML files in --folder
 *   iot2050-config --send             - Send the existing telegraf.conf and restart Telegraf
 *   iot2050-config --backup-influx    - Back up InfluxDB v2 from the gateway
 *   iot2050-config --backup-grafana   - Back up grafana.ini from the gateway
 */

import { existsSync } from 'fs';
import { Command } from 'commander';
import { z } from 'zod';
import {
  toConnectionParams,
  toRemoteTarget,
  validateRunParameters,
} from '../config';
import type { DefaultSettings, RunParameters } from '../config';
import { BackupOrchestrator } from '../backup/orchestrator';
import { ProvisioningOrchestrator } from '../provisioning/orchestrator';
import type { ProvisioningOptions } from '../provisioning/orchestrator';
import type { SessionFactory } from '../remote/types';
import {
  configPathFor,
  generateTelegrafConfig,
  readInfluxToken,
  scanAddressSpaceFiles,
} from '../telegraf/generator';
import { DEFAULT_INTERVAL } from '../telegraf/renderer';
import type { AddressSpaceSource } from '../telegraf/types';
import { describeError } from '../errors';
import logger from '../utils/logger';
import { LogComponents } from '../utils/components';
import { isYes, parseListenerSelection } from './prompts';
import type { Prompter } from './prompts';

export const VERSION = '0.4.0';

const CliOptionsSchema = z.object({
  folder: z.string(),
  ip: z.string(),
  username: z.string(),
  password: z.string(),
  iotPassword: z.string(),
  iotHost: z.string(),
  token: z.string(),
  send: z.boolean().optional(),
  backupInflux: z.boolean().optional(),
  backupGrafana: z.boolean().optional(),
});

export function buildProgram(defaults: DefaultSettings): Command {
  return new Command()
    .name('iot2050-config')
    .version(VERSION)
    .description('Generates a config file for Telegraf from XML files in the folder')
    .option('-f, --folder <folder>', 'Sets the folder containing the XML files', defaults.folder)
    .option('-i, --ip <ip>', 'Sets the OPC IP address', defaults.ip)
    .option('-u, --username <username>', 'Sets the OPC username', defaults.username)
    .option('-p, --password <password>', 'Sets the OPC password', defaults.password)
    .option('-w, --iot-password <password>', 'Sets the IOT-2050 password', defaults.iotPassword)
    .option('-a, --iot-host <host:port>', 'Sets the IOT-2050 host address and port', defaults.iotHost)
    .option('-t, --token <folder>', 'Sets the location of the InfluxDB token.txt', defaults.tokenFolder)
    .option('-s, --send', 'Sends the existing telegraf.conf file to the IOT-2050 and quits')
    .option('-b, --backup-influx', 'Backs up the InfluxDB v2 database from the IOT-2050 into the current working directory')
    .option('-g, --backup-grafana', 'Backs up the Grafana configuration from the IOT-2050 into the current working directory');
}

/**
 * Merge parsed flags over the defaults and validate the bundle
 */
export function toRunParameters(options: unknown, defaults: DefaultSettings): RunParameters {
  const parsed = CliOptionsSchema.parse(options);
  return validateRunParameters({
    folder: parsed.folder,
    ip: parsed.ip,
    username: parsed.username,
    password: parsed.password,
    iotUsername: defaults.iotUsername,
    iotPassword: parsed.iotPassword,
    iotHost: parsed.iotHost,
    tokenFolder: parsed.token,
    send: parsed.send ?? false,
    backupInflux: parsed.backupInflux ?? false,
    backupGrafana: parsed.backupGrafana ?? false,
  });
}

export interface CliContext {
  prompter: Prompter;
  connect: SessionFactory;
  print: (line: string) => void;
  /** Where backups are written */
  workingDir?: string;
  provisioning?: ProvisioningOptions;
}

export function describeParameters(params: RunParameters): string[] {
  return [
    'Current configuration:',
    '=====================',
    `Folder: ${params.folder}`,
    `IP: ${params.ip}`,
    `Username: ${params.username}`,
    `IOT Host: ${params.iotHost}`,
    `Token Folder: ${params.tokenFolder}`,
    `Send config: ${params.send}`,
    `Backup InfluxDB: ${params.backupInflux}`,
    `Backup Grafana: ${params.backupGrafana}`,
    '=====================',
    '',
  ];
}

async function sendConfig(params: RunParameters, context: CliContext): Promise<number> {
  const configPath = configPathFor(params.folder);
  if (!existsSync(configPath)) {
    logger.error('telegraf.conf file does not exist in the specified folder.', { component: LogComponents.CLI });
    return 1;
  }

  const orchestrator = new ProvisioningOrchestrator(context.connect, context.provisioning);
  try {
    const report = await orchestrator.provision(toRemoteTarget(params), configPath);
    report.lines.forEach(line => context.print(line));
    return 0;
  } catch (error) {
    logger.error(`Failed to send telegraf.conf file and restart Telegraf: ${describeError(error)}`, {
      component: LogComponents.CLI,
    });
    return 1;
  }
}

async function backupInflux(params: RunParameters, context: CliContext): Promise<number> {
  const orchestrator = new BackupOrchestrator(context.connect, { workingDir: context.workingDir });
  try {
    const report = await orchestrator.backupInfluxDb(toRemoteTarget(params));
    context.print(`Backup completed successfully. Files are located at: ${report.localDir}`);
    return 0;
  } catch (error) {
    logger.error(`Failed to backup InfluxDB: ${describeError(error)}`, { component: LogComponents.CLI });
    return 1;
  }
}

async function backupGrafana(params: RunParameters, context: CliContext): Promise<number> {
  const orchestrator = new BackupOrchestrator(context.connect, { workingDir: context.workingDir });
  try {
    await orchestrator.backupGrafanaConfig(toRemoteTarget(params));
    context.print('Grafana configuration backup completed successfully.');
    return 0;
  } catch (error) {
    logger.error(`Failed to backup Grafana configuration: ${describeError(error)}`, { component: LogComponents.CLI });
    return 1;
  }
}

async function collectSources(files: string[], listeners: number[], prompter: Prompter): Promise<AddressSpaceSource[]> {
  const sources: AddressSpaceSource[] = [];
  for (const [index, path] of files.entries()) {
    const listener = listeners.includes(index);
    const namespace = await prompter.ask(`----Enter the namespace number for ${path}:`);
    const interval = await prompter.ask(
      listener
        ? `----Enter the sampling_interval in ms (default ${DEFAULT_INTERVAL}):`
        : `----Enter the interval in ms (default ${DEFAULT_INTERVAL}):`
    );
    sources.push({ path, mode: listener ? 'subscribe' : 'poll', namespace, interval });
  }
  return sources;
}

async function generate(params: RunParameters, context: CliContext): Promise<number> {
  const { prompter, print } = context;

  const files = await scanAddressSpaceFiles(params.folder);
  if (files.length === 0) {
    print('No XML files found in the folder.');
    print('Aborting.');
    return 1;
  }

  print('Found the following XML files in the folder:');
  files.forEach((file, index) => print(`${index + 1}. ${file}`));
  print('');

  if (!isYes(await prompter.ask('Do you want to use these files? (y/N)'))) {
    print('Aborting.');
    return 1;
  }

  print('OPC clients can be active (standard), pulling data every interval, or');
  print('passive (subscribers), listening for changes.');
  const selection = await prompter.ask(
    'Enter the indexes of the files that should be listeners (subscribers),\n' +
    'separated by commas (e.g., 1,3). If none, just press enter:'
  );
  const listeners = parseListenerSelection(selection, files.length);

  let influxToken = await readInfluxToken(params.tokenFolder);
  if (influxToken === undefined) {
    influxToken = await prompter.ask("No 'token.txt' found, enter the InfluxDB token manually:");
  }

  const sources = await collectSources(files, listeners, prompter);

  const rendered = await generateTelegrafConfig({
    folder: params.folder,
    sources,
    connection: toConnectionParams(params),
    influxToken,
  });
  print('Config file generated successfully!');

  if (!isYes(await prompter.ask('Do you want to send the config file to the IOT box? (y/N)'))) {
    print(`Config file generated at ${rendered.path}. Please copy it and run telegraf manually.`);
    return 0;
  }
  return sendConfig(params, context);
}

/**
 * Run one invocation and return the process exit code. Parse and IO
 * errors from generation propagate to the caller.
 */
export async function run(params: RunParameters, context: CliContext): Promise<number> {
  describeParameters(params).forEach(line => context.print(line));

  if (params.send) {
    return sendConfig(params, context);
  }
  if (params.backupInflux) {
    return backupInflux(params, context);
  }
  if (params.backupGrafana) {
    return backupGrafana(params, context);
  }
  return generate(params, context);
}
