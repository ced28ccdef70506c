/**
 * Telegraf provisioning
 *
 * Upload the generated config, restart the service, give it a moment to
 * settle and check that it came up. When it did not, collect the service
 * status and recent logs so the operator can see why.
 */

import { REMOTE_TELEGRAF_CONFIG, ACTIVE_STATUS, TelegrafCommands } from '../remote/commands';
import { describeTarget } from '../remote/types';
import type { RemoteSession, RemoteTarget, SessionFactory } from '../remote/types';
import { describeError } from '../errors';
import logger from '../utils/logger';
import { LogComponents } from '../utils/components';

export const SETTLE_DELAY_MS = 5000;

export type ProvisioningState = 'uploading' | 'restarting' | 'verifying' | 'diagnosing' | 'done';

export interface DiagnosticResult {
  label: string;
  command: string;
  output?: string;
  error?: string;
}

export interface ProvisioningReport {
  active: boolean;
  /** Trimmed output of the is-active check */
  status: string;
  states: ProvisioningState[];
  diagnostics: DiagnosticResult[];
  /** Human-readable summary for the CLI */
  lines: string[];
}

export interface ProvisioningOptions {
  remotePath?: string;
  settleDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const DIAGNOSTICS: ReadonlyArray<{ label: string; command: string }> = [
  { label: 'Detailed Telegraf status', command: TelegrafCommands.status },
  { label: 'Recent Telegraf logs', command: TelegrafCommands.recentLogs },
  { label: 'Latest Telegraf error logs', command: TelegrafCommands.recentErrors },
];

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class ProvisioningOrchestrator {
  private readonly remotePath: string;
  private readonly settleDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly connect: SessionFactory, options: ProvisioningOptions = {}) {
    this.remotePath = options.remotePath ?? REMOTE_TELEGRAF_CONFIG;
    this.settleDelayMs = options.settleDelayMs ?? SETTLE_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Upload and restart are fatal; an inactive service is reported, not thrown.
   */
  async provision(target: RemoteTarget, localConfigPath: string): Promise<ProvisioningReport> {
    const states: ProvisioningState[] = [];
    const lines: string[] = [];
    const enter = (state: ProvisioningState) => {
      states.push(state);
      logger.debug(`Provisioning state: ${state}`, { component: LogComponents.PROVISIONING });
    };

    const session = await this.connect(target);
    try {
      enter('uploading');
      logger.info(`Sending ${localConfigPath} to ${describeTarget(target)}:${this.remotePath}`, {
        component: LogComponents.PROVISIONING,
      });
      await session.uploadFile(localConfigPath, this.remotePath);

      enter('restarting');
      logger.info('Restarting telegraf service on the remote host', { component: LogComponents.PROVISIONING });
      await session.execCommand(TelegrafCommands.restart);

      logger.info('Waiting for the service to start', {
        component: LogComponents.PROVISIONING,
        delayMs: this.settleDelayMs,
      });
      await this.sleep(this.settleDelayMs);

      enter('verifying');
      const status = (await session.execCommand(TelegrafCommands.isActive)).trim();

      if (status === ACTIVE_STATUS) {
        lines.push(`Telegraf service restarted successfully. Current status: ${status}`);
        logger.info(lines[0], { component: LogComponents.PROVISIONING });
        enter('done');
        return { active: true, status, states, diagnostics: [], lines };
      }

      lines.push(`Telegraf service restarted, but it's not active. Current status: ${status}`);
      logger.warn(lines[0], { component: LogComponents.PROVISIONING });

      enter('diagnosing');
      const diagnostics = await this.diagnose(session);
      lines.push(...diagnostics.map(formatDiagnostic));

      enter('done');
      return { active: false, status, states, diagnostics, lines };
    } finally {
      await session.close();
    }
  }

  /**
   * Run every diagnostic once, in order. A failing command is recorded and
   * the rest still run.
   */
  private async diagnose(session: RemoteSession): Promise<DiagnosticResult[]> {
    const results: DiagnosticResult[] = [];
    for (const { label, command } of DIAGNOSTICS) {
      try {
        const output = await session.execCommand(command);
        results.push({ label, command, output });
      } catch (error) {
        logger.error(`Diagnostic command failed: ${command}`, {
          component: LogComponents.PROVISIONING,
          error: describeError(error),
        });
        results.push({ label, command, error: describeError(error) });
      }
    }
    return results;
  }
}

export function formatDiagnostic(result: DiagnosticResult): string {
  if (result.error !== undefined) {
    return `${result.label} unavailable: ${result.error}`;
  }
  if (result.command === TelegrafCommands.recentErrors && result.output?.trim() === '') {
    return 'No recent error logs found for Telegraf.';
  }
  return `${result.label}:\n\n${result.output ?? ''}`;
}
