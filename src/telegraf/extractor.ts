/**
 * Address-space extraction
 *
 * Reads a vendor OPC-UA nodeset export and pulls out the namespace-2
 * variables a Telegraf input should collect, plus the group name carried by
 * the vendor's root organizer object.
 */

import { readFile } from 'fs/promises';
import { parse as parsePath } from 'path';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ParseError, describeError } from '../errors';
import logger from '../utils/logger';
import { LogComponents } from '../utils/components';
import type { AddressSpace, NodeDescriptor } from './types';

/** NodeId of the organizer whose DisplayName names the group */
export const GROUP_SENTINEL_NODE_ID = 'ns=2;i=1';
export const VARIABLE_NODE_ID_PREFIX = 'ns=2;i=';

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

interface XmlElement {
  tag: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  /** First text child only */
  text?: string;
}

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  // numeric character references such as &#252;
  htmlEntities: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (isRecord(value)) {
    for (const [name, attr] of Object.entries(value)) {
      attributes[name] = String(attr);
    }
  }
  return attributes;
}

function buildElement(tag: string, content: unknown, attributes: Record<string, string>): XmlElement {
  const element: XmlElement = { tag, attributes, children: [] };
  if (!Array.isArray(content)) {
    return element;
  }

  for (const entry of content) {
    if (!isRecord(entry)) {
      continue;
    }
    if (TEXT_KEY in entry) {
      if (element.text === undefined) {
        element.text = String(entry[TEXT_KEY]);
      }
      continue;
    }
    const childTag = Object.keys(entry).find(key => key !== ATTRIBUTES_KEY);
    if (childTag) {
      element.children.push(buildElement(childTag, entry[childTag], readAttributes(entry[ATTRIBUTES_KEY])));
    }
  }
  return element;
}

function* descendants(element: XmlElement): Generator<XmlElement> {
  for (const child of element.children) {
    yield child;
    yield* descendants(child);
  }
}

function findDescendantText(element: XmlElement, tag: string): string | undefined {
  for (const node of descendants(element)) {
    if (node.tag === tag) {
      return node.text;
    }
  }
  return undefined;
}

function parseDocument(xml: string, source: string): XmlElement {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new ParseError(source, `${msg} (line ${line}, column ${col})`);
  }
  const ordered: unknown = parser.parse(xml);
  return buildElement('#document', ordered, {});
}

/**
 * Extract the group override and namespace-2 variables from an
 * address-space document. Nodes keep document order; duplicates are kept.
 */
export function parseAddressSpace(xml: string, source: string): AddressSpace {
  const document = parseDocument(xml, source);
  let groupName: string | undefined;
  let sentinelMatches = 0;
  const nodes: NodeDescriptor[] = [];

  for (const element of descendants(document)) {
    if (element.tag !== 'UAObject' || element.attributes.NodeId !== GROUP_SENTINEL_NODE_ID) {
      continue;
    }
    const displayName = findDescendantText(element, 'DisplayName');
    if (displayName === undefined) {
      continue;
    }
    sentinelMatches++;
    if (sentinelMatches > 1) {
      logger.warn(`Multiple ${GROUP_SENTINEL_NODE_ID} objects in ${source}, using the last one`, {
        component: LogComponents.EXTRACTOR,
        previous: groupName,
      });
    }
    groupName = displayName;
    logger.info(`DisplayName for ${GROUP_SENTINEL_NODE_ID}: ${displayName}`, {
      component: LogComponents.EXTRACTOR,
    });
  }

  for (const element of descendants(document)) {
    const nodeId = element.attributes.NodeId;
    if (element.tag !== 'UAVariable' || !nodeId?.startsWith(VARIABLE_NODE_ID_PREFIX)) {
      continue;
    }
    const identifier = nodeId.split('=')[2];

    let name = findDescendantText(element, 'BrowseName') ?? '';
    const mapping = findDescendantText(element, 'VariableMapping');
    if (mapping !== undefined) {
      name = mapping.replace(/"/g, '');
    }

    nodes.push({ name, identifier });
  }

  logger.debug(`Extracted ${nodes.length} nodes from ${source}`, { component: LogComponents.EXTRACTOR });
  return { groupName, nodes };
}

export async function extractAddressSpace(filePath: string): Promise<AddressSpace> {
  let xml: string;
  try {
    xml = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ParseError(filePath, describeError(error), error);
  }
  return parseAddressSpace(xml, filePath);
}

/**
 * The document's override when it has a non-empty one, else the file's
 * base name without extension.
 */
export function resolveGroupName(filePath: string, override?: string): string {
  if (override) {
    return override;
  }
  return parsePath(filePath).name || 'unknown';
}
