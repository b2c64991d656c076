/**
 * Start, Stop and Reboot Command Handlers
 */

import { rebootMachine, startMachine, stopMachine } from '../../core/lifecycle.js';
import type { MachineContext } from '../../core/context.js';
import type { CommonOptions } from '../session.js';
import { openSession, runCommand, selectMachines } from '../session.js';
import type { Logger } from '../../lib/logger.js';

export interface RebootCommandOptions extends CommonOptions {
  hard?: boolean;
}

async function forDeployedMachines(
  command: string,
  file: string,
  machines: string[],
  options: CommonOptions,
  body: (ctx: MachineContext, log: Logger) => Promise<void>
): Promise<void> {
  await runCommand(command, options, async (log) => {
    const session = await openSession(file, log, options, true);
    const selected = selectMachines(session.config, machines).map((m) => m.name);
    const done: string[] = [];

    await session.forEachMachine(selected, async (ctx, name) => {
      if (ctx.store.read().vmId === null) {
        log.warning('not deployed; skipping');
        return;
      }
      await body(ctx, log);
      done.push(name);
    });
    log.addData('machines', done);
  });
}

/**
 * Execute the start command.
 */
export async function startCommand(file: string, machines: string[], options: CommonOptions): Promise<void> {
  await forDeployedMachines('start', file, machines, options, async (ctx, log) => {
    await startMachine(ctx);
    log.success('started');
  });
}

/**
 * Execute the stop command. Stopped machines keep their disks and addresses.
 */
export async function stopCommand(file: string, machines: string[], options: CommonOptions): Promise<void> {
  await forDeployedMachines('stop', file, machines, options, async (ctx, log) => {
    await stopMachine(ctx);
    log.success('stopped');
  });
}

/**
 * Execute the reboot command.
 */
export async function rebootCommand(file: string, machines: string[], options: RebootCommandOptions): Promise<void> {
  await forDeployedMachines('reboot', file, machines, options, async (ctx, log) => {
    await rebootMachine(ctx, options.hard ?? false);
    log.success(options.hard ? 'reset' : 'reboot requested');
  });
}
