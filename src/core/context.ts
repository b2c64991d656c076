/**
 * Machine Context
 *
 * Everything a core operation needs to act on one declared machine.
 */

import { randomBytes } from 'node:crypto';

import type { CloudApi } from '../cloud/types.js';
import type { Logger } from '../lib/logger.js';
import type { MachineShell } from '../remote/shell.js';
import type { PollOptions } from './poll.js';
import type { RecordStore } from './types.js';

/**
 * Ask the operator a yes/no question.
 */
export type Confirm = (question: string) => Promise<boolean>;

export interface MachineContext {
  /** Machine name as declared in the deployment file */
  name: string;
  cloud: CloudApi;
  store: RecordStore;
  log: Logger;
  confirm: Confirm;
  /** Opens a shell on the machine at `host`; absent when no remote access is configured */
  shell?: (host: string) => MachineShell;
  poll: PollOptions;
  /** Random printable secret of the given length */
  randomSecret: (length: number) => string;
}

/**
 * Random printable secret drawn from the system CSPRNG.
 */
export function generateRandomString(length: number): string {
  return randomBytes(length).toString('base64').slice(0, length);
}

/**
 * Display name of the machine used in messages.
 */
export function fullName(machineName: string | null): string {
  return `Azure machine '${machineName ?? '(unnamed)'}'`;
}
