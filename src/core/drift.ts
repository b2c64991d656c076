/**
 * Drift Detector
 *
 * Compares a fresh snapshot of the live VM with the state record. Safe
 * divergences are corrected in the record, unsafe ones are reported,
 * disks at the wrong slot and disks nobody declared are detached.
 * Backing stores are never deleted here.
 */

import type { CloudDataDisk, CloudVM } from '../cloud/types.js';
import type { MachineContext } from './context.js';
import { fullName } from './context.js';
import { diskLabel, findAttachedRootDisk, withDisk, withoutDisk } from './disks.js';
import { InvariantError } from './errors.js';
import { blobExists, fetchPublicIp, recordedIdentity, warnIfChanged } from './machine.js';
import { deviceToSlot } from './slots.js';
import type { MachineRecord } from './types.js';

/**
 * What a drift pass found and did
 */
export interface DriftReport {
  /** Warnings emitted during the pass, in order */
  warnings: string[];
  /** Backing-store URLs detached from the live VM */
  detached: string[];
}

/**
 * Reconcile the record with the live VM and persist the result.
 *
 * Idempotent: a second pass with no remote change in between emits no
 * warnings and makes no remote calls.
 */
export async function detectDrift(ctx: MachineContext, vm: CloudVM): Promise<DriftReport> {
  const warningsBefore = ctx.log.getWarnings().length;
  const detached: string[] = [];
  let record = ctx.store.read();
  const { resourceGroup } = recordedIdentity(record);
  const name = fullName(record.machineName);

  if (vm.provisioningState === 'Failed') {
    ctx.log.warning('vm resource exists, but is in a failed state');
  }
  record.size = warnIfChanged(ctx, name, 'size', record.size, vm.size);
  record.publicIpv4 = warnIfChanged(ctx, name, 'public_ipv4', record.publicIpv4, await fetchPublicIp(ctx, record));

  checkRootDisk(ctx, record, vm);

  for (const [id, recorded] of Object.entries(record.disks)) {
    const slot = deviceToSlot(recorded.device);
    if (slot === null) {
      continue;
    }
    const disk = { ...recorded };
    const label = `data disk ${diskLabel(disk, id)}`;
    const live = vm.dataDisks.find((d) => d.vhdUri === id);

    if (live) {
      disk.cachingMode = warnIfChanged(ctx, label, 'host_caching', disk.cachingMode, live.caching);
      disk.size = warnIfChanged(ctx, label, 'size', disk.size, live.diskSizeGB);
      warnIfChanged(ctx, label, 'name', disk.name, live.name, false);
      if (disk.needsAttach === true) {
        ctx.log.warning(`disk ${diskLabel(disk, id)} was not supposed to be attached`);
        delete disk.needsAttach;
      }
      if (live.lun !== slot) {
        ctx.log.warning(
          `disk ${diskLabel(disk, id)} is attached to this instance at a wrong LUN ${live.lun} instead of ${slot}`
        );
        ctx.log.action(`detaching disk ${diskLabel(disk, id)}...`);
        vm.dataDisks = vm.dataDisks.filter((d) => d !== live);
        await ctx.cloud.compute.createOrUpdateVM(resourceGroup, vm);
        detached.push(id);
        disk.needsAttach = true;
      }
      record = { ...record, disks: withDisk(record.disks, id, disk) };
    } else {
      if (disk.needsAttach !== true) {
        ctx.log.warning(`disk ${diskLabel(disk, id)} has been unexpectedly detached`);
        disk.needsAttach = true;
      }
      if (await blobExists(ctx, record.storage, id)) {
        record = { ...record, disks: withDisk(record.disks, id, disk) };
      } else {
        ctx.log.warning(`disk BLOB ${diskLabel(disk, id)} has been unexpectedly deleted`);
        record = { ...record, disks: withoutDisk(record.disks, id) };
      }
    }
    await ctx.store.commit(record);
  }

  const unexpected = vm.dataDisks.filter((d) => record.disks[d.vhdUri] === undefined);
  if (unexpected.length > 0) {
    for (const disk of unexpected) {
      ctx.log.warning(`unexpected disk ${disk.name}(${disk.vhdUri}) is attached to this virtual machine`);
    }
    ctx.log.action('detaching unexpected disk(s)...');
    vm.dataDisks = vm.dataDisks.filter((d: CloudDataDisk) => !unexpected.includes(d));
    await ctx.cloud.compute.createOrUpdateVM(resourceGroup, vm);
    detached.push(...unexpected.map((d) => d.vhdUri));
  }

  await ctx.store.commit(record);
  return { warnings: ctx.log.getWarnings().slice(warningsBefore), detached };
}

function checkRootDisk(ctx: MachineContext, record: MachineRecord, vm: CloudVM): void {
  const rootId = findAttachedRootDisk(record.disks);
  const root = rootId === null ? undefined : record.disks[rootId];
  if (rootId === null || !root) {
    throw new InvariantError(`${fullName(record.machineName)} is deployed without a recorded root disk`);
  }
  const label = `OS disk of ${fullName(record.machineName)}`;
  warnIfChanged(ctx, label, 'host_caching', root.cachingMode, vm.osDisk.caching, false);
  warnIfChanged(ctx, label, 'name', root.name, vm.osDisk.name, false);
  warnIfChanged(ctx, label, 'media_link', rootId, vm.osDisk.vhdUri, false);
}
