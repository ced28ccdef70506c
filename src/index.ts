#!/usr/bin/env node
/**
 * iot2050-config entry point
 */

import { buildProgram, run, toRunParameters } from './cli/program';
import { createPrompter } from './cli/prompts';
import type { Prompter } from './cli/prompts';
import { loadDefaults } from './config';
import { connectSession } from './remote/session';
import { describeError } from './errors';
import logger from './utils/logger';
import { LogComponents } from './utils/components';

/**
 * Windows consoles close with the process, so wait for Enter first
 */
async function wrapUp(exitCode: number, prompter: Prompter): Promise<never> {
  if (process.platform === 'win32') {
    await prompter.ask('Press enter to exit');
  }
  prompter.close();
  process.exit(exitCode);
}

async function main(): Promise<void> {
  const prompter = createPrompter();
  let exitCode = 1;

  try {
    const defaults = loadDefaults();
    const program = buildProgram(defaults);
    program.parse(process.argv);

    const params = toRunParameters(program.opts(), defaults);
    exitCode = await run(params, {
      prompter,
      connect: target => connectSession(target),
      print: line => console.log(line),
    });
  } catch (error) {
    logger.error(describeError(error), { component: LogComponents.CLI });
    exitCode = 1;
  }

  await wrapUp(exitCode, prompter);
}

main().catch(error => {
  console.error('Fatal error:', error);
  process.exit(1);
});
