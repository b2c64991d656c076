/**
 * Backup Command Handlers
 *
 * backup, restore, remove-backup and backups all act on blob snapshots of
 * the recorded disks.
 */

import { backupMachine, describeBackups, removeBackup, restoreMachine } from '../../core/backup.js';
import type { BackupStatus } from '../../core/backup.js';
import type { CommonOptions, ConfirmingOptions } from '../session.js';
import { openSession, runCommand, selectMachines } from '../session.js';

export interface BackupCommandOptions extends CommonOptions {
  id?: string;
}

export interface RestoreCommandOptions extends ConfirmingOptions {
  id: string;
  devices?: string[];
}

export interface RemoveBackupCommandOptions extends CommonOptions {
  id: string;
}

/**
 * Backup id derived from the current time, e.g. 20261018143005.
 */
export function timestampBackupId(now: Date = new Date()): string {
  return now.toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

const STATUS_RANK: Record<BackupStatus, number> = { complete: 0, incomplete: 1, unavailable: 2 };

/**
 * Execute the backup command.
 */
export async function backupCommand(file: string, machines: string[], options: BackupCommandOptions): Promise<void> {
  await runCommand('backup', options, async (log) => {
    const session = await openSession(file, log, options, true);
    const backupId = options.id ?? timestampBackupId();
    const selected = selectMachines(session.config, machines);

    for (const machine of selected) {
      await session.forEachMachine([machine.name], async (ctx) => {
        await backupMachine(ctx, machine, backupId);
      });
    }
    log.success(`backup '${backupId}' created`);
    log.addData('backupId', backupId);
  });
}

/**
 * Execute the restore command.
 */
export async function restoreCommand(file: string, machines: string[], options: RestoreCommandOptions): Promise<void> {
  await runCommand('restore', options, async (log) => {
    const session = await openSession(file, log, options, true);
    const selected = selectMachines(session.config, machines);

    for (const machine of selected) {
      await session.forEachMachine([machine.name], async (ctx) => {
        await restoreMachine(ctx, machine, options.id, options.devices ?? []);
        log.success(`restored from backup '${options.id}'`);
      });
    }
    log.addData('backupId', options.id);
  });
}

/**
 * Execute the remove-backup command.
 */
export async function removeBackupCommand(
  file: string,
  machines: string[],
  options: RemoveBackupCommandOptions
): Promise<void> {
  await runCommand('remove-backup', options, async (log) => {
    const session = await openSession(file, log, options, true);
    const selected = selectMachines(session.config, machines).map((m) => m.name);

    await session.forEachMachine(selected, async (ctx) => {
      await removeBackup(ctx, options.id);
    });
    log.success(`backup '${options.id}' removed`);
    log.addData('backupId', options.id);
  });
}

/**
 * Execute the backups command: every recorded backup with its worst status
 * across the selected machines.
 */
export async function backupsCommand(file: string, machines: string[], options: CommonOptions): Promise<void> {
  await runCommand('backups', options, async (log) => {
    const session = await openSession(file, log, options, true);
    const selected = selectMachines(session.config, machines);
    const summary = new Map<string, { status: BackupStatus; info: string[] }>();

    for (const machine of selected) {
      const record = session.state.getRecord(machine.name);
      const backups = await describeBackups(record, session.cloud.blobs, machine.name);
      for (const [backupId, description] of Object.entries(backups)) {
        const entry = summary.get(backupId) ?? { status: 'complete', info: [] };
        if (STATUS_RANK[description.status] > STATUS_RANK[entry.status]) {
          entry.status = description.status;
        }
        entry.info.push(...description.info);
        summary.set(backupId, entry);
      }
    }

    const ids = [...summary.keys()].sort();
    log.table(
      ['BACKUP ID', 'STATUS', 'INFO'],
      ids.map((id) => {
        const entry = summary.get(id);
        return [id, entry?.status ?? '', entry?.info.join('; ') ?? ''];
      })
    );
    log.addData(
      'backups',
      ids.map((id) => ({ id, ...summary.get(id) }))
    );
  });
}
