/**
 * Telegraf config rendering
 *
 * Pure template substitution. Interval and namespace values are opaque
 * strings; nothing here parses or validates them.
 */

import type { ConnectionParams, GroupDescriptor, NodeDescriptor } from './types';

export const DEFAULT_INTERVAL = '1000ms';
export const OPCUA_PORT = 4840;

const NODE_SEPARATOR = ',\n        ';

/**
 * Escape a value for a TOML basic string
 */
export function tomlEscape(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export function renderNode(node: NodeDescriptor): string {
  return `{name="${tomlEscape(node.name)}", identifier="${tomlEscape(node.identifier)}"}`;
}

export function renderNodes(nodes: readonly NodeDescriptor[]): string {
  return nodes.map(renderNode).join(NODE_SEPARATOR);
}

function renderPollGroup(group: GroupDescriptor, connection: ConnectionParams, interval: string): string {
  return `
[[inputs.opcua]]
name = "opcua"
interval = "${tomlEscape(interval)}"
endpoint = "opc.tcp://${tomlEscape(connection.host)}:${OPCUA_PORT}"
connect_timeout = "30s"
request_timeout = "10s"
security_policy = "Basic256Sha256"
security_mode = "SignAndEncrypt"
certificate = ""
private_key = ""
auth_method = "UserName"
username = "${tomlEscape(connection.username)}"
password = "${tomlEscape(connection.password)}"
timestamp = "source"
client_trace = false
    [[inputs.opcua.group]]
      name = "${tomlEscape(group.groupName)}"
      namespace = "${tomlEscape(group.namespace)}"
      identifier_type = "i"
      nodes = [
        ${renderNodes(group.nodes)}
      ]
    `;
}

function renderListenerGroup(group: GroupDescriptor, connection: ConnectionParams, interval: string): string {
  return `
[[inputs.opcua_listener]]
name = "opcua_listener"
endpoint = "opc.tcp://${tomlEscape(connection.host)}:${OPCUA_PORT}"
connect_fail_behavior = "ignore"
connect_timeout = "30s"
request_timeout = "10s"
session_timeout = "20m"
security_policy = "Basic256Sha256"
security_mode = "SignAndEncrypt"
certificate = ""
private_key = ""
auth_method = "UserName"
username = "${tomlEscape(connection.username)}"
password = "${tomlEscape(connection.password)}"
timestamp = "source"
client_trace = false
    [[inputs.opcua_listener.group]]
      name = "${tomlEscape(group.groupName)}"
      sampling_interval = "${tomlEscape(interval)}"
      namespace = "${tomlEscape(group.namespace)}"
      identifier_type = "i"
      nodes = [
        ${renderNodes(group.nodes)}
      ]
    `;
}

/**
 * Render one input block: `[[inputs.opcua]]` for poll mode,
 * `[[inputs.opcua_listener]]` for subscribe mode.
 */
export function renderGroup(group: GroupDescriptor, connection: ConnectionParams): string {
  const interval = group.samplingInterval || DEFAULT_INTERVAL;
  return group.mode === 'subscribe'
    ? renderListenerGroup(group, connection, interval)
    : renderPollGroup(group, connection, interval);
}

/**
 * Wrap the input blocks in the agent preamble and InfluxDB v2 output
 */
export function renderDocument(influxToken: string, blocks: readonly string[]): string {
  return `# Global tags can be specified here in key="value" format.
[global_tags]

# Configuration for telegraf agent
[agent]
  ## Default data collection interval for all inputs
  interval = "1000ms"
  round_interval = true

  metric_batch_size = 10000
  metric_buffer_limit = 100000

  collection_jitter = "0s"
  flush_interval = "10s"
  flush_jitter = "0s"
  precision = "0s"

  ## Log at debug level.
  # debug = false
  ## Log only error level messages.
  # quiet = false

  logtarget = "file"
  logfile = "/var/log/telegraf/telegraf.log"
  logfile_rotation_max_size = "25MB"
  logfile_rotation_max_archives = 4

  hostname = ""
  omit_hostname = false

# Configuration for sending metrics to InfluxDB 2.0
[[outputs.influxdb_v2]]
  urls = ["http://127.0.0.1:8086"]
  token = "${tomlEscape(influxToken)}"
  organization = "org"
  bucket = "line"

${blocks.join('\n\n')}
`;
}
