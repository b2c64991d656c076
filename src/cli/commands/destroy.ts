/**
 * Destroy Command Handler
 *
 * Removes recorded machines with their network resources and ephemeral
 * disks. Persistent backing stores are kept.
 */

import { destroyMachine } from '../../core/lifecycle.js';
import { ConfigError } from '../../core/errors.js';
import type { ConfirmingOptions } from '../session.js';
import { openSession, runCommand } from '../session.js';

/**
 * Execute the destroy command.
 *
 * Works on recorded machines, so a machine removed from the deployment file
 * can still be destroyed by name.
 *
 * @param machines - Recorded machine names; every recorded machine when empty
 */
export async function destroyCommand(file: string, machines: string[], options: ConfirmingOptions): Promise<void> {
  await runCommand('destroy', options, async (log) => {
    const session = await openSession(file, log, options, true);
    const recorded = session.state.getMachineNames();

    for (const name of machines) {
      if (!recorded.includes(name)) {
        throw new ConfigError(
          `Machine '${name}' has no state record`,
          'CONFIG_VALIDATION_FAILED',
          `Recorded machines: ${recorded.join(', ') || '(none)'}`
        );
      }
    }
    const selected = machines.length > 0 ? machines : recorded;
    if (selected.length === 0) {
      log.info('Nothing to destroy.');
      return;
    }

    const destroyed: string[] = [];
    const kept: string[] = [];
    await session.forEachMachine(selected, async (ctx, name) => {
      if (await destroyMachine(ctx)) {
        await session.state.removeRecord(name);
        destroyed.push(name);
        log.success('destroyed');
      } else {
        kept.push(name);
        log.info('kept');
      }
    });

    log.addData('destroyed', destroyed);
    log.addData('kept', kept);
  });
}
