/**
 * Deploy Command Handler
 *
 * Converges every selected machine towards its declaration, then releases
 * recorded disks that are no longer declared.
 */

import { reconcileMachine } from '../../core/sequencer.js';
import { releaseRemovedDisks } from '../../core/teardown.js';
import type { ConfirmingOptions } from '../session.js';
import { openSession, runCommand, selectMachines } from '../session.js';

/**
 * Options for the deploy command
 */
export interface DeployCommandOptions extends ConfirmingOptions {
  check?: boolean;
  allowReboot?: boolean;
  allowRecreate?: boolean;
}

interface DeploySummary {
  name: string;
  machineName: string;
  publicIpv4: string | null;
  recreated: boolean;
  attached: string[];
  released: string[];
  generatedKeys: string[];
  driftWarnings: number;
}

/**
 * Execute the deploy command.
 *
 * Machines are converged one after another; the first failure stops the run
 * with every completed step already recorded.
 *
 * @param file - Path to the deployment file
 * @param machines - Machine names to deploy; all declared machines when empty
 */
export async function deployCommand(file: string, machines: string[], options: DeployCommandOptions): Promise<void> {
  await runCommand('deploy', options, async (log) => {
    const session = await openSession(file, log, options);
    const selected = selectMachines(session.config, machines);

    const declared = new Set(session.config.machines.map((m) => m.name));
    for (const recorded of session.state.getMachineNames()) {
      if (!declared.has(recorded)) {
        log.warning(`machine '${recorded}' is recorded but no longer declared; run 'vmconverge destroy ${file} ${recorded}' to remove it`);
      }
    }

    const summaries: DeploySummary[] = [];
    for (const machine of selected) {
      await session.forEachMachine([machine.name], async (ctx) => {
        log.action(`converging ${machine.machineName}`);
        const result = await reconcileMachine(ctx, machine, {
          check: options.check ?? false,
          allowReboot: options.allowReboot ?? false,
          allowRecreate: options.allowRecreate ?? false,
        });
        const released = await releaseRemovedDisks(ctx, machine);
        const record = ctx.store.read();

        summaries.push({
          name: machine.name,
          machineName: machine.machineName,
          publicIpv4: record.publicIpv4,
          recreated: result.recreated,
          attached: result.attached,
          released,
          generatedKeys: result.generatedKeys,
          driftWarnings: result.drift?.warnings.length ?? 0,
        });
        log.success(record.publicIpv4 ? `up at ${record.publicIpv4}` : 'up');
      });
    }

    log.addData('machines', summaries);
  });
}
