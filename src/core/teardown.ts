/**
 * Disk teardown
 *
 * Releases recorded disks the declaration no longer names. Runs after the
 * machine has been reconfigured, so the disks are already unused; every
 * cleanup step is best-effort and one disk failing does not stop the others.
 */

import type { MachineContext } from './context.js';
import { fullName } from './context.js';
import { diskLabel, isAttached, withDisk, withoutDisk } from './disks.js';
import { getLiveVM, recordedIdentity } from './machine.js';
import { resolveBlobRef } from './blob-url.js';
import { deviceToSlot } from './slots.js';
import type { DesiredMachine, DiskRecord, MachineRecord } from './types.js';

/**
 * Run a command on the machine, logging instead of throwing on failure.
 *
 * Does nothing when no shell is configured or the machine has no address.
 */
export async function runBestEffort(ctx: MachineContext, record: MachineRecord, command: string): Promise<void> {
  if (!ctx.shell || record.publicIpv4 === null) {
    return;
  }
  try {
    await ctx.shell(record.publicIpv4).run(command);
  } catch (error) {
    ctx.log.warning(`command '${command}' failed: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Delete a disk's backing store after asking the operator.
 */
export async function deleteVolume(ctx: MachineContext, record: MachineRecord, id: string, disk: DiskRecord): Promise<void> {
  const question = `are you sure you want to destroy the contents(BLOB) of Azure disk ${diskLabel(disk, id)}?`;
  if (!(await ctx.confirm(question))) {
    ctx.log.info(`keeping the Azure disk BLOB ${id}...`);
    return;
  }
  ctx.log.action(`destroying Azure disk BLOB ${id}...`);
  const deleted = await ctx.cloud.blobs.deleteBlob(resolveBlobRef(id, record.storage));
  if (!deleted) {
    ctx.log.warning(`disk BLOB ${id} seems to have been destroyed already`);
  }
}

/**
 * Drop the generated key of a disk after asking the operator.
 *
 * @returns The record without the key, or unchanged when declined or absent
 */
export async function deleteEncryptionKey(ctx: MachineContext, record: MachineRecord, id: string): Promise<MachineRecord> {
  if (record.generatedEncryptionKeys[id] === undefined) {
    return record;
  }
  const confirmed = await ctx.confirm(
    `Azure disk ${id} has an automatically generated encryption key; if the key is deleted, ` +
      'the data will be lost even if you have a copy of the disk contents; ' +
      'are you sure you want to delete the encryption key?'
  );
  if (!confirmed) {
    return record;
  }
  const { [id]: _dropped, ...keys } = record.generatedEncryptionKeys;
  return { ...record, generatedEncryptionKeys: keys };
}

async function unmount(ctx: MachineContext, record: MachineRecord, disk: DiskRecord): Promise<void> {
  if (disk.encrypt) {
    const mapped = `/dev/mapper/${disk.name}`;
    ctx.log.action(`unmounting device '${mapped}'...`);
    await runBestEffort(ctx, record, `umount -l ${mapped}`);
    await runBestEffort(ctx, record, `cryptsetup luksClose ${mapped}`);
  } else {
    ctx.log.action(`unmounting device '${disk.device}'...`);
    await runBestEffort(ctx, record, `umount -l ${disk.device}`);
  }
}

/**
 * Detach a data disk from the live VM.
 *
 * @returns false when the detach failed and the disk must be kept
 */
async function detach(ctx: MachineContext, record: MachineRecord, id: string, disk: DiskRecord): Promise<boolean> {
  ctx.log.action(`detaching Azure disk ${diskLabel(disk, id)}...`);
  try {
    const vm = await getLiveVM(ctx, record);
    if (!vm) {
      ctx.log.warning(`${fullName(record.machineName)} seems to have been destroyed already`);
      return true;
    }
    vm.dataDisks = vm.dataDisks.filter((d) => d.vhdUri !== id);
    await ctx.cloud.compute.createOrUpdateVM(recordedIdentity(record).resourceGroup, vm);
    return true;
  } catch (error) {
    ctx.log.warning(
      `failed to detach disk ${diskLabel(disk, id)}: ${error instanceof Error ? error.message : String(error)}`
    );
    return false;
  }
}

/**
 * Release every recorded disk absent from the declaration.
 *
 * @returns Ids of the disks dropped from the record
 */
export async function releaseRemovedDisks(ctx: MachineContext, desired: DesiredMachine): Promise<string[]> {
  const released: string[] = [];

  for (const id of Object.keys(ctx.store.read().disks)) {
    if (desired.disks[id] !== undefined) {
      continue;
    }
    let record = ctx.store.read();
    const disk = record.disks[id];
    if (!disk) {
      continue;
    }

    if (isAttached(disk) && deviceToSlot(disk.device) !== null) {
      await unmount(ctx, record, disk);
      if (!(await detach(ctx, record, id, disk))) {
        continue;
      }
      record = { ...record, disks: withDisk(record.disks, id, { ...disk, needsAttach: true }) };
      await ctx.store.commit(record);
    }

    if (disk.isEphemeral) {
      await deleteVolume(ctx, record, id, disk);
    }

    await runBestEffort(ctx, record, `sg_scan ${disk.device}`);

    record = { ...record, disks: withoutDisk(record.disks, id) };
    record = await deleteEncryptionKey(ctx, record, id);
    await ctx.store.commit(record);
    released.push(id);
  }

  return released;
}
