/**
 * Keys Command Handler
 *
 * Prints the generated disk encryption keys of each machine as passphrase
 * overrides and secret files, so they can be saved before a destroy.
 */

import { exportGeneratedKeys } from '../../core/keys.js';
import type { KeyExport } from '../../core/keys.js';
import type { CommonOptions } from '../session.js';
import { openSession, runCommand, selectMachines } from '../session.js';

/**
 * Execute the keys command.
 */
export async function keysCommand(file: string, machines: string[], options: CommonOptions): Promise<void> {
  await runCommand('keys', options, async (log) => {
    const session = await openSession(file, log, options, true);
    const exported: Record<string, KeyExport> = {};

    for (const machine of selectMachines(session.config, machines)) {
      exported[machine.name] = exportGeneratedKeys(session.state.getRecord(machine.name));
    }

    if (log.getMode() === 'human') {
      console.log(JSON.stringify(exported, null, 2));
    }
    log.addData('keys', exported);
  });
}
