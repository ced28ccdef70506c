/**
 * Interactive questions
 */

import { createInterface } from 'readline/promises';

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export function createPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = createInterface({ input, output });
  let closed = false;
  // Once input ends every question reads as an empty line
  const whenClosed = new Promise<string>(resolve => {
    rl.once('close', () => {
      closed = true;
      resolve('');
    });
  });

  return {
    ask: async (question: string) => {
      if (closed) {
        return '';
      }
      const answer = await Promise.race([rl.question(`${question}\n`), whenClosed]);
      return answer.trim();
    },
    close: () => rl.close(),
  };
}

export function isYes(answer: string): boolean {
  return answer.trim().toLowerCase() === 'y';
}

/**
 * Parse a comma-separated list of 1-based indexes into sorted 0-based
 * indexes. Entries that are not numbers or fall outside 1..count are ignored.
 */
export function parseListenerSelection(input: string, count: number): number[] {
  const selected = new Set<number>();
  for (const part of input.split(',')) {
    const value = part.trim();
    if (!/^\d+$/.test(value)) {
      continue;
    }
    const index = Number(value);
    if (index > 0 && index <= count) {
      selected.add(index - 1);
    }
  }
  return [...selected].sort((a, b) => a - b);
}
