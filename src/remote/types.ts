/**
 * Remote session types
 */

export interface RemoteTarget {
  host: string;
  port: number;
  username: string;
  password: string;
}

/**
 * One authenticated connection to the gateway. Owned by a single flow and
 * never shared; every call runs to completion before the next one starts.
 */
export interface RemoteSession {
  readonly target: RemoteTarget;

  /**
   * Copy a local file to the gateway, replacing any existing file
   */
  uploadFile(localPath: string, remotePath: string, mode?: number): Promise<void>;

  /**
   * Run a command to completion and return everything it wrote to stdout
   */
  execCommand(command: string): Promise<string>;

  /**
   * Entry names of a remote directory, sorted, without `.` and `..`
   */
  listDirectory(remotePath: string): Promise<string[]>;

  downloadFile(remotePath: string): Promise<Buffer>;

  close(): Promise<void>;
}

export type SessionFactory = (target: RemoteTarget) => Promise<RemoteSession>;

export function describeTarget(target: RemoteTarget): string {
  return `${target.username}@${target.host}:${target.port}`;
}
