import { copyFile, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { buildProgram, describeParameters, run, toRunParameters } from '../../src/cli/program';
import type { CliContext } from '../../src/cli/program';
import { isYes, parseListenerSelection } from '../../src/cli/prompts';
import type { Prompter } from '../../src/cli/prompts';
import type { DefaultSettings, RunParameters } from '../../src/config';
import { ValidationError } from '../../src/errors';
import { TelegrafCommands } from '../../src/remote/commands';
import { MockRemoteSession, factoryFor } from '../helpers/mock-remote-session';

const FIXTURES = path.join(__dirname, '..', 'fixtures');

const defaults: DefaultSettings = {
  folder: '/data/xml',
  ip: '192.168.0.1',
  username: 'opc',
  password: 'test-secret',
  iotHost: '192.168.200.1:22',
  iotUsername: 'root',
  iotPassword: 'test-iot-secret',
  tokenFolder: '/data/token',
};

class ScriptedPrompter implements Prompter {
  public questions: string[] = [];

  constructor(private answers: string[]) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    return this.answers.shift() ?? '';
  }

  close(): void {}
}

function parse(argv: string[]): RunParameters {
  const program = buildProgram(defaults);
  program.parse(['node', 'iot2050-config', ...argv]);
  return toRunParameters(program.opts(), defaults);
}

describe('CLI', () => {
  describe('option parsing', () => {
    it('should use defaults when no flags are given', () => {
      const params = parse([]);

      expect(params).toEqual({
        folder: '/data/xml',
        ip: '192.168.0.1',
        username: 'opc',
        password: 'test-secret',
        iotUsername: 'root',
        iotPassword: 'test-iot-secret',
        iotHost: '192.168.200.1:22',
        tokenFolder: '/data/token',
        send: false,
        backupInflux: false,
        backupGrafana: false,
      });
    });

    it('should apply short and long flags', () => {
      const params = parse(['-i', '10.0.0.5', '--iot-host', '10.0.0.6:2222', '-t', '/tokens', '-s', '-g']);

      expect(params.ip).toBe('10.0.0.5');
      expect(params.iotHost).toBe('10.0.0.6:2222');
      expect(params.tokenFolder).toBe('/tokens');
      expect(params.send).toBe(true);
      expect(params.backupInflux).toBe(false);
      expect(params.backupGrafana).toBe(true);
    });

    it('should reject an invalid IP before any work', () => {
      expect(() => parse(['-i', '10.0.0.5.6'])).toThrow(ValidationError);
    });

    it('should reject an IOT host without a port', () => {
      expect(() => parse(['-a', '10.0.0.6'])).toThrow(ValidationError);
    });
  });

  describe('prompt helpers', () => {
    it('should accept only y as yes', () => {
      expect(isYes('y')).toBe(true);
      expect(isYes(' Y ')).toBe(true);
      expect(isYes('yes')).toBe(false);
      expect(isYes('')).toBe(false);
    });

    it('should parse listener indexes', () => {
      expect(parseListenerSelection('1,3', 3)).toEqual([0, 2]);
      expect(parseListenerSelection(' 3 , 1, 3', 3)).toEqual([0, 2]);
      expect(parseListenerSelection('0,4,x,-1,2', 3)).toEqual([1]);
      expect(parseListenerSelection('', 3)).toEqual([]);
    });
  });

  describe('describeParameters', () => {
    it('should not print passwords', () => {
      const lines = describeParameters(parse([]));

      expect(lines).toContain('IP: 192.168.0.1');
      expect(lines.some(line => line.includes('test-secret'))).toBe(false);
    });
  });

  describe('run', () => {
    let folder: string;
    let session: MockRemoteSession;
    let printed: string[];

    function context(prompter: Prompter): CliContext {
      return {
        prompter,
        connect: factoryFor(session),
        print: line => printed.push(line),
        workingDir: folder,
        provisioning: { sleep: async () => undefined },
      };
    }

    function paramsFor(overrides: Partial<RunParameters> = {}): RunParameters {
      return { ...parse([]), folder, tokenFolder: folder, ...overrides };
    }

    beforeEach(async () => {
      folder = await mkdtemp(path.join(tmpdir(), 'iot2050-cli-'));
      session = new MockRemoteSession();
      printed = [];
    });

    afterEach(async () => {
      await rm(folder, { recursive: true, force: true });
    });

    it('should generate a config with the selected listener', async () => {
      await copyFile(path.join(FIXTURES, 'line-a.xml'), path.join(folder, 'line-a.xml'));
      await copyFile(path.join(FIXTURES, 'press.xml'), path.join(folder, 'press.xml'));
      await writeFile(path.join(folder, 'token.txt'), 'test-token\n');
      const prompter = new ScriptedPrompter(['y', '2', '3', '', '4', '250ms', 'n']);

      const exitCode = await run(paramsFor(), context(prompter));

      const content = await readFile(path.join(folder, 'telegraf.conf'), 'utf-8');
      expect(exitCode).toBe(0);
      expect(content).toContain('[[inputs.opcua]]');
      expect(content).toContain('[[inputs.opcua_listener]]');
      expect(content).toContain('      name = "Line A"\n      namespace = "3"');
      expect(content).toContain('      name = "press"\n      sampling_interval = "250ms"\n      namespace = "4"');
      expect(content).toContain('token = "test-token"');
      expect(prompter.questions[3]).toBe('----Enter the interval in ms (default 1000ms):');
      expect(prompter.questions[5]).toBe('----Enter the sampling_interval in ms (default 1000ms):');
      expect(session.uploadStub.callCount).toBe(0);
    });

    it('should ask for the token when token.txt is missing', async () => {
      await copyFile(path.join(FIXTURES, 'press.xml'), path.join(folder, 'press.xml'));
      const prompter = new ScriptedPrompter(['y', '', 'typed-token', '3', '', 'n']);

      await run(paramsFor(), context(prompter));

      const content = await readFile(path.join(folder, 'telegraf.conf'), 'utf-8');
      expect(prompter.questions[2]).toBe("No 'token.txt' found, enter the InfluxDB token manually:");
      expect(prompter.questions[3]).toBe(`----Enter the namespace number for ${path.join(folder, 'press.xml')}:`);
      expect(content).toContain('token = "typed-token"');
      expect(content).toContain('namespace = "3"');
    });

    it('should abort without XML files', async () => {
      const exitCode = await run(paramsFor(), context(new ScriptedPrompter([])));

      expect(exitCode).toBe(1);
      expect(printed.slice(-2)).toEqual(['No XML files found in the folder.', 'Aborting.']);
    });

    it('should abort when the files are not confirmed', async () => {
      await copyFile(path.join(FIXTURES, 'press.xml'), path.join(folder, 'press.xml'));

      const exitCode = await run(paramsFor(), context(new ScriptedPrompter(['n'])));

      expect(exitCode).toBe(1);
      expect(printed[printed.length - 1]).toBe('Aborting.');
    });

    it('should send the generated config when confirmed', async () => {
      await copyFile(path.join(FIXTURES, 'press.xml'), path.join(folder, 'press.xml'));
      await writeFile(path.join(folder, 'token.txt'), 'test-token');
      session.mockCommand(TelegrafCommands.isActive, 'active');

      const exitCode = await run(paramsFor(), context(new ScriptedPrompter(['y', '', '3', '', 'y'])));

      expect(exitCode).toBe(0);
      expect(session.uploadStub.firstCall.args[0]).toBe(path.join(folder, 'telegraf.conf'));
      expect(printed[printed.length - 1]).toBe('Telegraf service restarted successfully. Current status: active');
    });

    it('should refuse to send a missing telegraf.conf', async () => {
      const exitCode = await run(paramsFor({ send: true }), context(new ScriptedPrompter([])));

      expect(exitCode).toBe(1);
      expect(session.uploadStub.callCount).toBe(0);
    });

    it('should exit non-zero when provisioning fails', async () => {
      await writeFile(path.join(folder, 'telegraf.conf'), '[agent]\n');
      session.uploadStub.rejects(new Error('Permission denied'));

      const exitCode = await run(paramsFor({ send: true }), context(new ScriptedPrompter([])));

      expect(exitCode).toBe(1);
    });

    it('should back up grafana.ini into the working directory', async () => {
      session.downloadStub.resolves(Buffer.from('[server]\n'));

      const exitCode = await run(paramsFor({ backupGrafana: true }), context(new ScriptedPrompter([])));

      expect(exitCode).toBe(0);
      expect(await readFile(path.join(folder, 'grafana_backup.ini'), 'utf-8')).toBe('[server]\n');
      expect(printed[printed.length - 1]).toBe('Grafana configuration backup completed successfully.');
    });

    it('should exit non-zero when the InfluxDB backup fails', async () => {
      session.execStub.rejects(new Error('influx: command not found'));

      const exitCode = await run(paramsFor({ backupInflux: true }), context(new ScriptedPrompter([])));

      expect(exitCode).toBe(1);
    });
  });
});
