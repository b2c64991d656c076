/**
 * Terminal confirmation prompts.
 */

import { createInterface } from 'node:readline/promises';

import type { Confirm } from '../core/context.js';

export interface ConfirmOptions {
  /** Answer every question with yes without asking */
  yes?: boolean;
  input?: NodeJS.ReadableStream & { isTTY?: boolean };
  output?: NodeJS.WritableStream;
}

/**
 * Whether an answer counts as yes.
 */
export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

/**
 * Build a confirmation function for the CLI.
 *
 * Without a terminal to ask on, every question is declined.
 */
export function createConfirm(options: ConfirmOptions = {}): Confirm {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stderr;

  return async (question: string): Promise<boolean> => {
    if (options.yes) {
      return true;
    }
    if (!input.isTTY) {
      return false;
    }
    const rl = createInterface({ input, output });
    try {
      return isAffirmative(await rl.question(`${question} (y/N) `));
    } finally {
      rl.close();
    }
  };
}
