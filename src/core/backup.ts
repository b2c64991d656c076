/**
 * Backups
 *
 * Snapshots of every disk's backing store, restored by copying a snapshot
 * over the blob while the VM is deprovisioned.
 */

import type { BlobApi } from '../cloud/types.js';
import type { MachineContext } from './context.js';
import { fullName } from './context.js';
import { attachedRecord } from './disks.js';
import { InvariantError, ResourceMissingError } from './errors.js';
import { parseBlobUrl, resolveBlobRef, snapshotUrl } from './blob-url.js';
import { markResourceDeleted, stopMachine } from './lifecycle.js';
import { recordedIdentity } from './machine.js';
import { provisionMachine } from './provision.js';
import type { BackupSnapshots, DesiredMachine, DiskSpec, MachineRecord } from './types.js';

/** Metadata key tagging a snapshot with the backup it belongs to */
export const BACKUP_ID_METADATA = 'vmconverge_backup_id';

export type BackupStatus = 'complete' | 'incomplete' | 'unavailable';

export interface BackupDescription {
  status: BackupStatus;
  info: string[];
}

function sameKeys(a: Record<string, unknown>, b: Record<string, unknown>): boolean {
  const left = Object.keys(a).sort();
  const right = Object.keys(b).sort();
  return left.length === right.length && left.every((key, i) => key === right[i]);
}

/**
 * Snapshot every recorded disk under `backupId`.
 */
export async function backupMachine(ctx: MachineContext, desired: DesiredMachine, backupId: string): Promise<BackupSnapshots> {
  let record = ctx.store.read();
  ctx.log.action(`backing up ${fullName(record.machineName)} using ID '${backupId}'`);

  if (!sameKeys(desired.disks, record.disks)) {
    ctx.log.warning(
      "the list of disks currently deployed doesn't match the current deployment specification; " +
        "consider running 'deploy' first; the backup may be incomplete"
    );
  }

  const backup: BackupSnapshots = {};
  for (const [id, disk] of Object.entries(record.disks)) {
    ctx.log.action(`snapshotting the BLOB ${id} backing the Azure disk ${disk.name}`);
    backup[id] = await ctx.cloud.blobs.snapshotBlob(resolveBlobRef(id, record.storage), {
      [BACKUP_ID_METADATA]: backupId,
      description: `backup of disk ${disk.name} attached to ${record.machineName ?? ''}`,
    });
    record = { ...record, backups: { ...record.backups, [backupId]: { ...backup } } };
    await ctx.store.commit(record);
  }
  return backup;
}

/**
 * Declaration rebuilt from the record, used to provision the VM again.
 */
export function desiredFromRecord(record: MachineRecord, rootDiskImageUrl: string): DesiredMachine {
  const { machineName, resourceGroup, virtualNetwork, storage, location, size } = record;
  if (
    machineName === null ||
    resourceGroup === null ||
    virtualNetwork === null ||
    storage === null ||
    location === null ||
    size === null
  ) {
    throw new InvariantError('a deployed machine must have its identity and size recorded');
  }
  const disks: Record<string, DiskSpec> = {};
  for (const [id, disk] of Object.entries(record.disks)) {
    disks[id] = attachedRecord(disk);
  }
  return {
    machineName,
    resourceGroup,
    virtualNetwork,
    storage,
    location,
    size,
    obtainIp: record.obtainIp ?? false,
    availabilitySet: record.availabilitySet,
    rootDiskImageUrl,
    disks,
  };
}

function selected(id: string, disk: DiskSpec, devices: readonly string[]): boolean {
  return devices.length === 0 || devices.includes(id) || devices.includes(disk.name) || devices.includes(disk.device);
}

/**
 * Restore disks from a backup and provision the VM again.
 *
 * @param devices - Disk ids, names or device paths to restore; empty for all
 * @throws ResourceMissingError if the backup is not recorded
 */
export async function restoreMachine(
  ctx: MachineContext,
  desired: DesiredMachine,
  backupId: string,
  devices: readonly string[] = []
): Promise<void> {
  let record = ctx.store.read();
  const name = fullName(record.machineName);
  const snapshots = record.backups[backupId];
  if (!snapshots) {
    throw new ResourceMissingError(`backup '${backupId}' of ${name} not found`, "Run 'vmconverge backups' to list the recorded backups.");
  }
  ctx.log.action(`restoring ${name} to backup '${backupId}'`);

  if (record.vmId !== null) {
    await stopMachine(ctx);
    ctx.log.action(`temporarily deprovisioning ${name}`);
    const { machineName, resourceGroup } = recordedIdentity(record);
    await ctx.cloud.compute.deleteVM(resourceGroup, machineName);
    record = markResourceDeleted(ctx.store.read());
    await ctx.store.commit(record);
  }

  for (const [id, disk] of Object.entries(record.disks)) {
    const snapshotId = snapshots[id];
    if (snapshotId === undefined || !selected(id, disk, devices)) {
      continue;
    }
    if (!parseBlobUrl(id)) {
      ctx.log.warning(`failed to parse BLOB URL ${id}; skipping`);
      continue;
    }
    const blob = resolveBlobRef(id, record.storage);
    if (!(await ctx.cloud.blobs.getProperties({ ...blob, snapshot: snapshotId }))) {
      ctx.log.warning(`snapshot ${snapshotId} for disk ${id} is missing; skipping`);
      continue;
    }
    ctx.log.action(`restoring BLOB ${id} from snapshot ${snapshotId}`);
    await ctx.cloud.blobs.copyBlob(blob, snapshotUrl(id, snapshotId));
  }

  await provisionMachine(ctx, desiredFromRecord(record, desired.rootDiskImageUrl));
}

/**
 * Delete every snapshot of a backup and forget it.
 */
export async function removeBackup(ctx: MachineContext, backupId: string): Promise<void> {
  const record = ctx.store.read();
  ctx.log.action(`removing backup ${backupId}`);
  const snapshots = record.backups[backupId];
  if (!snapshots) {
    ctx.log.warning(`backup ${backupId} not found; skipping`);
    return;
  }

  for (const [url, snapshotId] of Object.entries(snapshots)) {
    ctx.log.action(`removing snapshot ${snapshotId} of BLOB ${url}`);
    if (!parseBlobUrl(url)) {
      ctx.log.warning(`failed to parse BLOB URL ${url}; skipping`);
      continue;
    }
    const deleted = await ctx.cloud.blobs.deleteBlob({ ...resolveBlobRef(url, record.storage), snapshot: snapshotId });
    if (!deleted) {
      ctx.log.warning(`snapshot ${snapshotId} of BLOB ${url} does not exist; skipping`);
    }
  }

  const { [backupId]: _removed, ...backups } = record.backups;
  await ctx.store.commit({ ...record, backups });
}

/**
 * Status of every recorded backup against the currently recorded disks.
 *
 * @param machine - Machine name used in info lines
 */
export async function describeBackups(
  record: MachineRecord,
  blobs: BlobApi,
  machine: string
): Promise<Record<string, BackupDescription>> {
  const result: Record<string, BackupDescription> = {};

  for (const [backupId, snapshots] of Object.entries(record.backups)) {
    let status: BackupStatus = 'complete';
    const info: string[] = [];
    const processed = new Set<string>();

    for (const id of Object.keys(record.disks)) {
      const snapshotId = snapshots[id];
      if (snapshotId === undefined) {
        status = 'incomplete';
        info.push(`${machine} - ${id} - not available in backup`);
        continue;
      }
      processed.add(id);
      const blob = parseBlobUrl(id);
      if (!blob) {
        info.push(`failed to parse BLOB URL ${id}`);
        status = 'unavailable';
      } else if (blob.storage !== record.storage) {
        info.push(
          `storage ${record.storage ?? '(none)'} provided in the deployment specification doesn't match the storage of BLOB ${id}`
        );
        status = 'unavailable';
      } else if (!(await blobs.getProperties({ ...blob, snapshot: snapshotId }))) {
        info.push(`${machine} - ${id} - ${snapshotId} - snapshot has disappeared`);
        status = 'unavailable';
      }
    }

    for (const [url, snapshotId] of Object.entries(snapshots)) {
      if (!processed.has(url)) {
        info.push(`${machine} - ${url} - ${snapshotId} - a snapshot of a disk that is not or no longer deployed`);
      }
    }
    result[backupId] = { status, info };
  }

  return result;
}
