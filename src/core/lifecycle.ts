/**
 * Resource Lifecycle Driver
 *
 * start, stop, reboot and destroy of a deployed machine and their effect
 * on the record.
 *
 * Transitions:
 *   provisionMachine       missing|stopped -> provisioning
 *   startMachine           any -> provisioning
 *   stopMachine            any -> stopping -> stopped
 *   rebootMachine          any -> provisioning
 *   markResourceDeleted    any -> stopped
 *   checkMachine           -> running | stopped | missing, from the live resource
 */

import type { MachineContext } from './context.js';
import { fullName } from './context.js';
import { markAllNeedsAttach, withoutDisk } from './disks.js';
import { RemoteError, VmconvergeError } from './errors.js';
import { getLiveVM, recordedIdentity } from './machine.js';
import { deleteEncryptionKey, deleteVolume, runBestEffort } from './teardown.js';
import type { MachineRecord } from './types.js';

/**
 * Record state once the VM resource is gone: every disk needs an attach
 * and the address is released. Disk records and backing stores survive.
 */
export function markResourceDeleted(record: MachineRecord): MachineRecord {
  return {
    ...record,
    vmId: null,
    lifecycle: 'stopped',
    disks: markAllNeedsAttach(record.disks),
    publicIpv4: null,
  };
}

export async function startMachine(ctx: MachineContext): Promise<void> {
  const record = ctx.store.read();
  if (record.vmId === null) {
    return;
  }
  const { machineName, resourceGroup } = recordedIdentity(record);
  await ctx.store.commit({ ...record, lifecycle: 'provisioning' });
  ctx.log.action('starting Azure machine...');
  await ctx.cloud.compute.startVM(resourceGroup, machineName);
}

export async function stopMachine(ctx: MachineContext): Promise<void> {
  const record = ctx.store.read();
  if (record.vmId === null) {
    return;
  }
  const { machineName, resourceGroup } = recordedIdentity(record);
  ctx.log.action('stopping Azure machine...');
  await ctx.store.commit({ ...record, lifecycle: 'stopping' });
  await ctx.cloud.compute.powerOffVM(resourceGroup, machineName);
  await ctx.store.commit({ ...ctx.store.read(), lifecycle: 'stopped' });
}

/**
 * Reboot the machine: a hard reset through the compute API, or a
 * `systemctl reboot` over the machine shell.
 *
 * @throws RemoteError for a soft reboot of a machine without an address
 */
export async function rebootMachine(ctx: MachineContext, hard = false): Promise<void> {
  const record = ctx.store.read();
  if (record.vmId === null) {
    ctx.log.warning(`${fullName(record.machineName)} is not deployed; nothing to reboot`);
    return;
  }
  const { machineName, resourceGroup } = recordedIdentity(record);
  if (hard) {
    ctx.log.action('sending hard reset to Azure machine...');
    await ctx.cloud.compute.restartVM(resourceGroup, machineName);
  } else {
    if (!ctx.shell || record.publicIpv4 === null) {
      throw new RemoteError(`${fullName(machineName)} does not have a public IPv4 address and is not reachable`);
    }
    ctx.log.action('rebooting...');
    // The connection drops while the command runs
    await runBestEffort(ctx, record, 'systemctl reboot');
  }
  await ctx.store.commit({ ...ctx.store.read(), lifecycle: 'provisioning' });
}

/**
 * Destroy the VM, its ephemeral backing stores, network interface and
 * public IP.
 *
 * @returns false when the operator declined; nothing was touched then
 * @throws VmconvergeError if the operator refuses to drop generated keys
 */
export async function destroyMachine(ctx: MachineContext): Promise<boolean> {
  let record = ctx.store.read();
  const name = fullName(record.machineName);

  if (record.vmId !== null) {
    const { machineName, resourceGroup } = recordedIdentity(record);
    const vm = await getLiveVM(ctx, record);
    if (vm) {
      if (!(await ctx.confirm(`are you sure you want to destroy ${name}?`))) {
        return false;
      }
      ctx.log.action('destroying the Azure machine...');
      await ctx.cloud.compute.deleteVM(resourceGroup, machineName);
    } else {
      ctx.log.warning(`${name} seems to have been destroyed already`);
    }
  }
  record = markResourceDeleted(record);
  await ctx.store.commit(record);

  for (const [id, disk] of Object.entries(record.disks)) {
    if (disk.isEphemeral) {
      await deleteVolume(ctx, record, id, disk);
    }
    record = await deleteEncryptionKey(ctx, { ...record, disks: withoutDisk(record.disks, id) }, id);
    await ctx.store.commit(record);
  }

  if (record.networkInterface !== null && record.resourceGroup !== null) {
    ctx.log.action('destroying the network interface...');
    if (!(await ctx.cloud.network.deleteNetworkInterface(record.resourceGroup, record.networkInterface))) {
      ctx.log.warning('network interface seems to have been destroyed already');
    }
    record = { ...record, networkInterface: null };
    await ctx.store.commit(record);
  }

  if (record.publicIp !== null && record.resourceGroup !== null) {
    ctx.log.action('releasing the ip address...');
    if (!(await ctx.cloud.network.deletePublicIp(record.resourceGroup, record.publicIp))) {
      ctx.log.warning('ip address seems to have been released already');
    }
    record = { ...record, publicIp: null, obtainIp: null };
    await ctx.store.commit(record);
  }

  const keptKeys = Object.keys(record.generatedEncryptionKeys);
  if (keptKeys.length > 0) {
    const confirmed = await ctx.confirm(
      `${name} resource still stores generated encryption keys for disks ${keptKeys.join(', ')}; ` +
        "if the resource is deleted, the keys are deleted along with it and the data will be lost even if you have a copy of the disks' contents; " +
        'are you sure you want to delete the encryption keys?'
    );
    if (!confirmed) {
      throw new VmconvergeError(
        `cannot destroy ${name} while it stores generated encryption keys`,
        'CONFIRMATION_DECLINED',
        "Run 'vmconverge keys' to save the keys before destroying the machine."
      );
    }
  }
  return true;
}
