import { createInterface } from 'node:readline/promises';
import type { ConversionDirection } from '../kernel/grid.js';

const DIRECTION_QUESTION = [
  '',
  'Convert a plugin or master file:',
  '1. From Bloodmoon to Anthology Bloodmoon',
  '2. From Anthology Bloodmoon to Bloodmoon',
  'Choice: ',
].join('\n');

const TARGETS_QUESTION = [
  '',
  'Enter .ESP|ESM files or Mod folders, separated by semicolons ";": ',
].join('\n');

export function parseDirectionChoice(answer: string): ConversionDirection | undefined {
  switch (answer.trim()) {
    case '1':
      return 'bm-to-ab';
    case '2':
      return 'ab-to-bm';
    default:
      return undefined;
  }
}

export async function promptDirection(): Promise<ConversionDirection> {
  const prompt = createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const direction = parseDirectionChoice(await prompt.question(DIRECTION_QUESTION));
      if (direction !== undefined) {
        return direction;
      }
      process.stdout.write('Invalid choice. Enter 1 or 2.\n');
    }
  } finally {
    prompt.close();
  }
}

export async function promptTargets(): Promise<string> {
  const prompt = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await prompt.question(TARGETS_QUESTION);
  } finally {
    prompt.close();
  }
}
