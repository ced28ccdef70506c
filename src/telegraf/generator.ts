/**
 * Telegraf config generation
 *
 * Ties extraction and rendering together for a folder of address-space
 * exports and writes the result next to them.
 */

import { existsSync } from 'fs';
import { readdir, readFile, writeFile } from 'fs/promises';
import { extname, join, resolve } from 'path';
import { ConfigError, describeError } from '../errors';
import logger from '../utils/logger';
import { LogComponents } from '../utils/components';
import { extractAddressSpace, resolveGroupName } from './extractor';
import { renderDocument, renderGroup } from './renderer';
import type { AddressSpaceSource, ConnectionParams, GroupDescriptor, RenderedConfig } from './types';

export const CONFIG_FILE_NAME = 'telegraf.conf';
export const TOKEN_FILE_NAME = 'token.txt';

export function configPathFor(folder: string): string {
  return join(folder, CONFIG_FILE_NAME);
}

/**
 * Absolute paths of the `.xml` files directly inside `folder`, sorted by name
 */
export async function scanAddressSpaceFiles(folder: string): Promise<string[]> {
  try {
    const entries = await readdir(folder, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && extname(entry.name) === '.xml')
      .map(entry => resolve(folder, entry.name))
      .sort();
  } catch (error) {
    throw new ConfigError(`Failed to read folder ${folder}: ${describeError(error)}`, error);
  }
}

/**
 * Trimmed InfluxDB token from `<tokenFolder>/token.txt`, or undefined when
 * there is no such file.
 */
export async function readInfluxToken(tokenFolder: string): Promise<string | undefined> {
  const tokenPath = join(tokenFolder, TOKEN_FILE_NAME);
  if (!existsSync(tokenPath)) {
    return undefined;
  }
  try {
    const token = (await readFile(tokenPath, 'utf-8')).trim();
    logger.info(`InfluxDB token read from ${tokenPath}`, { component: LogComponents.GENERATOR });
    return token;
  } catch (error) {
    throw new ConfigError(`Failed to read InfluxDB token from ${tokenPath}: ${describeError(error)}`, error);
  }
}

export async function buildGroup(source: AddressSpaceSource): Promise<GroupDescriptor> {
  const addressSpace = await extractAddressSpace(source.path);
  return {
    groupName: resolveGroupName(source.path, addressSpace.groupName),
    namespace: source.namespace,
    samplingInterval: source.interval ?? '',
    nodes: addressSpace.nodes,
    mode: source.mode,
  };
}

export interface GenerateOptions {
  folder: string;
  sources: AddressSpaceSource[];
  connection: ConnectionParams;
  influxToken: string;
}

/**
 * Render every source in order and write `<folder>/telegraf.conf`
 */
export async function generateTelegrafConfig(options: GenerateOptions): Promise<RenderedConfig> {
  const blocks: string[] = [];
  for (const source of options.sources) {
    const group = await buildGroup(source);
    logger.info(`Rendering ${group.mode === 'subscribe' ? 'listener' : 'standard'} input for ${group.groupName}`, {
      component: LogComponents.GENERATOR,
      nodes: group.nodes.length,
    });
    blocks.push(renderGroup(group, options.connection));
  }

  const content = renderDocument(options.influxToken, blocks);
  const path = configPathFor(options.folder);
  try {
    await writeFile(path, content, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to write ${path}: ${describeError(error)}`, error);
  }

  logger.info(`Config file written to ${path}`, { component: LogComponents.GENERATOR });
  return { path, content };
}
