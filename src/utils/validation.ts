/**
 * Address format checks
 *
 * Purely syntactic: nothing here resolves or reaches the host.
 */

const SEGMENT_PATTERN = /^\d{1,3}$/;
const PORT_PATTERN = /^\d{1,5}$/;

export interface HostAndPort {
  host: string;
  port: number;
}

/**
 * True for four period-separated segments, each a decimal 0-255
 */
export function isDottedQuad(value: string): boolean {
  const segments = value.split('.');
  if (segments.length !== 4) {
    return false;
  }
  return segments.every(segment => SEGMENT_PATTERN.test(segment) && Number(segment) <= 255);
}

/**
 * Parse `host:port`. Returns undefined unless there is exactly one colon,
 * a non-empty host and a port of 1-65535.
 */
export function parseHostAndPort(value: string): HostAndPort | undefined {
  const parts = value.split(':');
  if (parts.length !== 2) {
    return undefined;
  }

  const [host, portText] = parts;
  if (host.length === 0 || !PORT_PATTERN.test(portText)) {
    return undefined;
  }

  const port = Number(portText);
  if (port < 1 || port > 65535) {
    return undefined;
  }

  return { host, port };
}

export function isHostAndPort(value: string): boolean {
  return parseHostAndPort(value) !== undefined;
}
