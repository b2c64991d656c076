/**
 * Status check
 *
 * Reads the live VM, updates the recorded lifecycle and address, and
 * reports disks that are not where the record expects them.
 */

import type { MachineContext } from './context.js';
import { fullName } from './context.js';
import { diskLabel } from './disks.js';
import { blobExists, fetchPublicIp, getLiveVM, warnIfChanged } from './machine.js';
import { deviceToSlot } from './slots.js';

export interface MachineStatus {
  exists: boolean;
  /** Provisioning of the VM resource succeeded */
  isUp: boolean;
  /** Null when the disks were not inspected */
  disksOk: boolean | null;
  messages: string[];
}

export async function checkMachine(ctx: MachineContext): Promise<MachineStatus> {
  let record = ctx.store.read();
  const status: MachineStatus = { exists: false, isUp: false, disksOk: null, messages: [] };

  const vm = record.machineName === null || record.resourceGroup === null ? null : await getLiveVM(ctx, record);
  if (!vm) {
    await ctx.store.commit({ ...record, lifecycle: 'missing' });
    return status;
  }

  status.exists = true;
  status.isUp = vm.provisioningState === 'Succeeded';
  if (vm.provisioningState === 'Failed') {
    status.messages.push('vm resource exists, but is in a failed state');
  }
  if (!status.isUp) {
    await ctx.store.commit({ ...record, lifecycle: 'stopped' });
    return status;
  }

  status.disksOk = true;
  for (const [id, disk] of Object.entries(record.disks)) {
    if (deviceToSlot(disk.device) === null) {
      if (vm.osDisk.vhdUri !== id) {
        status.disksOk = false;
        status.messages.push(`different root disk instead of ${id}`);
      }
      continue;
    }
    if (vm.dataDisks.every((d) => d.vhdUri !== id)) {
      status.disksOk = false;
      status.messages.push(`disk ${diskLabel(disk, id)} is detached`);
      if (!(await blobExists(ctx, record.storage, id))) {
        status.messages.push(`disk ${diskLabel(disk, id)} is destroyed`);
      }
    }
  }

  record = {
    ...record,
    lifecycle: 'running',
    publicIpv4: warnIfChanged(
      ctx,
      fullName(record.machineName),
      'public_ipv4',
      record.publicIpv4,
      await fetchPublicIp(ctx, record)
    ),
  };
  await ctx.store.commit(record);
  return status;
}
