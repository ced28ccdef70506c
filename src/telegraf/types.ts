/**
 * Telegraf config generation types
 */

export type CollectionMode = 'poll' | 'subscribe';

export interface NodeDescriptor {
  readonly name: string;
  readonly identifier: string;
}

export interface AddressSpace {
  /** DisplayName of the sentinel organizer object, when the document has one */
  groupName?: string;
  nodes: NodeDescriptor[];
}

export interface GroupDescriptor {
  groupName: string;
  namespace: string;
  samplingInterval: string;
  nodes: NodeDescriptor[];
  mode: CollectionMode;
}

/**
 * OPC-UA server the generated inputs connect to
 */
export interface ConnectionParams {
  host: string;
  username: string;
  password: string;
}

/**
 * Per-file answers collected by the CLI before generation
 */
export interface AddressSpaceSource {
  path: string;
  mode: CollectionMode;
  namespace: string;
  /** Empty or missing falls back to the default interval */
  interval?: string;
}

export interface RenderedConfig {
  path: string;
  content: string;
}
