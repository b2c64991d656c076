/**
 * Check Command Handler
 *
 * Compares each declared machine's record with the live VM and reports
 * whether it exists, is up and has its disks attached.
 */

import { checkMachine } from '../../core/status.js';
import type { MachineStatus } from '../../core/status.js';
import type { CommonOptions } from '../session.js';
import { openSession, runCommand, selectMachines } from '../session.js';

function describeStatus(status: MachineStatus): string {
  if (!status.exists) {
    return 'Missing';
  }
  if (!status.isUp) {
    return 'Down';
  }
  return status.disksOk === false ? 'Degraded' : 'Up';
}

/**
 * Execute the check command.
 *
 * Machines without a record are reported as not deployed and not queried.
 */
export async function checkCommand(file: string, machines: string[], options: CommonOptions): Promise<void> {
  await runCommand('check', options, async (log) => {
    const session = await openSession(file, log, options, true);
    const selected = selectMachines(session.config, machines);
    const recorded = new Set(session.state.getMachineNames());

    const rows: string[][] = [];
    const results: Array<{ name: string; state: string; publicIpv4: string | null; messages: string[] }> = [];

    for (const machine of selected) {
      if (!recorded.has(machine.name)) {
        rows.push([machine.name, 'Not deployed', '-']);
        results.push({ name: machine.name, state: 'Not deployed', publicIpv4: null, messages: [] });
        continue;
      }
      await session.forEachMachine([machine.name], async (ctx) => {
        const status = await checkMachine(ctx);
        for (const message of status.messages) {
          log.warning(message);
        }
        const record = ctx.store.read();
        const state = describeStatus(status);
        rows.push([machine.name, state, record.publicIpv4 ?? '-']);
        results.push({ name: machine.name, state, publicIpv4: record.publicIpv4, messages: status.messages });
      });
    }

    log.newline();
    log.table(['NAME', 'STATE', 'PUBLIC IP'], rows);
    log.addData('machines', results);
  });
}
