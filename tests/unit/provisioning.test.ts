import {
  ProvisioningOrchestrator,
  SETTLE_DELAY_MS,
  formatDiagnostic,
} from '../../src/provisioning/orchestrator';
import { REMOTE_TELEGRAF_CONFIG, TelegrafCommands } from '../../src/remote/commands';
import { ExecError, TransferError } from '../../src/errors';
import { MockRemoteSession, TEST_TARGET, factoryFor } from '../helpers/mock-remote-session';

const LOCAL_CONFIG = '/data/xml/telegraf.conf';

describe('ProvisioningOrchestrator', () => {
  let session: MockRemoteSession;
  let sleep: jest.Mock<Promise<void>, [number]>;
  let orchestrator: ProvisioningOrchestrator;

  beforeEach(() => {
    session = new MockRemoteSession();
    sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
    orchestrator = new ProvisioningOrchestrator(factoryFor(session), { sleep });
  });

  describe('when the service comes up', () => {
    beforeEach(() => {
      session.mockCommand(TelegrafCommands.isActive, 'active\n');
    });

    it('should upload, restart and verify without diagnostics', async () => {
      const report = await orchestrator.provision(TEST_TARGET, LOCAL_CONFIG);

      expect(report.active).toBe(true);
      expect(report.status).toBe('active');
      expect(report.diagnostics).toEqual([]);
      expect(report.lines).toEqual(['Telegraf service restarted successfully. Current status: active']);
      expect(session.executedCommands()).toEqual([TelegrafCommands.restart, TelegrafCommands.isActive]);
    });

    it('should upload to the telegraf config path', async () => {
      await orchestrator.provision(TEST_TARGET, LOCAL_CONFIG);

      expect(session.uploadStub.callCount).toBe(1);
      expect(session.uploadStub.firstCall.args).toEqual([LOCAL_CONFIG, REMOTE_TELEGRAF_CONFIG, undefined]);
    });

    it('should wait for the service to settle once', async () => {
      await orchestrator.provision(TEST_TARGET, LOCAL_CONFIG);

      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(SETTLE_DELAY_MS);
    });

    it('should walk the states in order and close the session', async () => {
      const report = await orchestrator.provision(TEST_TARGET, LOCAL_CONFIG);

      expect(report.states).toEqual(['uploading', 'restarting', 'verifying', 'done']);
      expect(session.closeStub.callCount).toBe(1);
    });
  });

  describe('when the service does not come up', () => {
    beforeEach(() => {
      session.mockCommand(TelegrafCommands.isActive, 'failed\n');
      session.mockCommand(TelegrafCommands.status, 'telegraf.service - loaded, inactive (dead)');
      session.mockCommand(TelegrafCommands.recentLogs, 'E! [telegraf] Error running agent');
      session.mockCommand(TelegrafCommands.recentErrors, '');
    });

    it('should run each diagnostic exactly once', async () => {
      const report = await orchestrator.provision(TEST_TARGET, LOCAL_CONFIG);

      expect(report.active).toBe(false);
      expect(report.status).toBe('failed');
      expect(session.executedCommands()).toEqual([
        TelegrafCommands.restart,
        TelegrafCommands.isActive,
        TelegrafCommands.status,
        TelegrafCommands.recentLogs,
        TelegrafCommands.recentErrors,
      ]);
      expect(report.states).toEqual(['uploading', 'restarting', 'verifying', 'diagnosing', 'done']);
    });

    it('should report the diagnostic output', async () => {
      const report = await orchestrator.provision(TEST_TARGET, LOCAL_CONFIG);

      expect(report.lines).toEqual([
        "Telegraf service restarted, but it's not active. Current status: failed",
        'Detailed Telegraf status:\n\ntelegraf.service - loaded, inactive (dead)',
        'Recent Telegraf logs:\n\nE! [telegraf] Error running agent',
        'No recent error logs found for Telegraf.',
      ]);
    });

    it('should keep diagnosing after a failed diagnostic', async () => {
      session.mockCommandFailure(TelegrafCommands.status, new ExecError(TelegrafCommands.status, 'channel closed'));

      const report = await orchestrator.provision(TEST_TARGET, LOCAL_CONFIG);

      expect(report.diagnostics.map(result => result.command)).toEqual([
        TelegrafCommands.status,
        TelegrafCommands.recentLogs,
        TelegrafCommands.recentErrors,
      ]);
      expect(report.diagnostics[0].error).toBe(`Command '${TelegrafCommands.status}' failed: channel closed`);
      expect(report.diagnostics[1].output).toBe('E! [telegraf] Error running agent');
    });
  });

  describe('fatal steps', () => {
    it('should abort when the upload fails', async () => {
      session.uploadStub.rejects(new TransferError('upload', REMOTE_TELEGRAF_CONFIG, 'Permission denied'));

      await expect(orchestrator.provision(TEST_TARGET, LOCAL_CONFIG)).rejects.toThrow(TransferError);
      expect(session.execStub.callCount).toBe(0);
      expect(session.closeStub.callCount).toBe(1);
    });

    it('should abort when the restart cannot be dispatched', async () => {
      session.mockCommandFailure(TelegrafCommands.restart, new ExecError(TelegrafCommands.restart, 'channel open failure'));

      await expect(orchestrator.provision(TEST_TARGET, LOCAL_CONFIG)).rejects.toThrow(ExecError);
      expect(session.executedCommands()).toEqual([TelegrafCommands.restart]);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should not touch the session when connecting fails', async () => {
      const failing = new ProvisioningOrchestrator(
        jest.fn().mockRejectedValue(new Error('connect ECONNREFUSED')),
        { sleep }
      );

      await expect(failing.provision(TEST_TARGET, LOCAL_CONFIG)).rejects.toThrow('connect ECONNREFUSED');
      expect(session.closeStub.callCount).toBe(0);
    });
  });

  describe('formatDiagnostic', () => {
    it('should describe a failed command', () => {
      expect(formatDiagnostic({ label: 'Recent Telegraf logs', command: 'tail', error: 'timeout' }))
        .toBe('Recent Telegraf logs unavailable: timeout');
    });
  });
});
