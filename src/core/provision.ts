/**
 * Network and VM provisioning
 *
 * Ensures the public IP and network interface exist, then creates the VM
 * with its whole declared disk set in a single request.
 */

import type { CloudDataDisk, CloudVM, OperationHandle, OperationStatus } from '../cloud/types.js';
import type { MachineContext } from './context.js';
import { fullName } from './context.js';
import { attachedRecord, findDeclaredRootDisk, withDisk } from './disks.js';
import { InvariantError, ProvisioningError, ResourceMissingError, VmconvergeError } from './errors.js';
import { blobExists, fetchPublicIp, getLiveVM } from './machine.js';
import { pollUntil } from './poll.js';
import { deviceToSlot } from './slots.js';
import type { DesiredMachine, MachineRecord } from './types.js';

/** Idle timeout of the public IP in minutes */
export const PUBLIC_IP_IDLE_TIMEOUT = 4;

/** Admin user set on machines created from an image; login goes through ssh keys */
const PLACEHOLDER_ADMIN_USER = 'randomuser';

/**
 * Copy the reboot-sensitive properties of the declaration into the record.
 */
export function copyProperties(record: MachineRecord, desired: DesiredMachine): MachineRecord {
  return {
    ...record,
    size: desired.size,
    obtainIp: desired.obtainIp,
    availabilitySet: desired.availabilitySet,
  };
}

/**
 * Whether any reboot-sensitive property differs from the record.
 */
export function propertiesChanged(record: MachineRecord, desired: DesiredMachine): boolean {
  return (
    record.size !== desired.size ||
    record.obtainIp !== desired.obtainIp ||
    record.availabilitySet !== desired.availabilitySet
  );
}

/**
 * Create missing network resources and, when no VM is recorded, the VM.
 *
 * Completion is signalled by whichever comes first: a public IP being
 * assigned or the create operation leaving the in-progress state. A
 * failure recorded after the IP is assigned goes unnoticed here.
 *
 * @throws ProvisioningError if the create operation failed
 * @throws OperationTimeoutError if neither signal arrives in time
 */
export async function provisionMachine(ctx: MachineContext, desired: DesiredMachine): Promise<void> {
  let record = ctx.store.read();
  const resourceGroup = desired.resourceGroup;
  const machineName = desired.machineName;

  if (record.publicIp === null && desired.obtainIp) {
    ctx.log.action('getting an IP address');
    await ctx.cloud.network.createOrUpdatePublicIp(resourceGroup, machineName, {
      location: desired.location,
      allocationMethod: 'Dynamic',
      idleTimeoutInMinutes: PUBLIC_IP_IDLE_TIMEOUT,
    });
    record = { ...record, publicIp: machineName, obtainIp: desired.obtainIp };
    await ctx.store.commit(record);
  }

  if (record.networkInterface === null) {
    ctx.log.action('creating a network interface');
    let publicIpId: string | null = null;
    if (record.publicIp !== null) {
      const ip = await ctx.cloud.network.getPublicIp(resourceGroup, record.publicIp);
      if (!ip) {
        throw new ResourceMissingError(`public IP '${record.publicIp}' of ${fullName(machineName)} not found`);
      }
      publicIpId = ip.id;
    }
    const subnet = await ctx.cloud.network.getSubnet(
      resourceGroup,
      desired.virtualNetwork,
      desired.virtualNetwork
    );
    if (!subnet) {
      throw new ResourceMissingError(
        `subnet '${desired.virtualNetwork}' of virtual network '${desired.virtualNetwork}' not found`,
        'Create a subnet named after its virtual network before deploying machines into it.'
      );
    }
    await ctx.cloud.network.createOrUpdateNetworkInterface(resourceGroup, machineName, {
      location: desired.location,
      subnetId: subnet.id,
      publicIpId,
    });
    record = { ...record, networkInterface: machineName };
    await ctx.store.commit(record);
  }

  if (record.vmId !== null) {
    return;
  }

  if (await getLiveVM(ctx, record)) {
    throw new VmconvergeError(
      'tried creating a virtual machine that already exists',
      'RESOURCE_CONFLICT',
      "Run 'vmconverge deploy --check' to fix this."
    );
  }

  const rootId = findDeclaredRootDisk(desired.disks);
  const root = rootId === null ? undefined : desired.disks[rootId];
  if (rootId === null || !root) {
    throw new InvariantError(`declaration of ${fullName(machineName)} has no root disk`);
  }

  ctx.log.action(`creating ${fullName(machineName)}...`);
  const nic = await ctx.cloud.network.getNetworkInterface(resourceGroup, record.networkInterface ?? machineName);
  if (!nic) {
    throw new ResourceMissingError(`network interface of ${fullName(machineName)} not found`);
  }

  const dataDisks: CloudDataDisk[] = [];
  for (const [id, disk] of Object.entries(desired.disks)) {
    const lun = deviceToSlot(disk.device);
    if (lun === null) {
      continue;
    }
    dataDisks.push({
      lun,
      name: disk.name,
      vhdUri: id,
      caching: disk.cachingMode,
      createOption: (await blobExists(ctx, desired.storage, id)) ? 'Attach' : 'Empty',
      diskSizeGB: disk.size,
    });
  }

  const rootExists = await blobExists(ctx, desired.storage, rootId);
  const vm: CloudVM = {
    name: machineName,
    location: desired.location,
    size: desired.size,
    availabilitySet: desired.availabilitySet,
    provisioningState: 'Creating',
    networkInterfaceId: nic.id,
    osProfile: rootExists
      ? null
      : {
          computerName: machineName,
          adminUsername: PLACEHOLDER_ADMIN_USER,
          adminPassword: `aA9+${ctx.randomSecret(32)}`,
        },
    osDisk: {
      name: root.name,
      vhdUri: rootId,
      caching: root.cachingMode,
      createOption: rootExists ? 'Attach' : 'FromImage',
      sourceImageUri: rootExists ? null : desired.rootDiskImageUrl,
    },
    dataDisks,
  };

  const handle = await ctx.cloud.compute.beginCreateVM(resourceGroup, vm);
  const status = await awaitCreation(ctx, record, handle, machineName);
  if (status.status === 'failed') {
    throw new ProvisioningError(machineName, status.error);
  }

  record = copyProperties({ ...record, vmId: machineName, lifecycle: 'provisioning' }, desired);
  record.publicIpv4 = await fetchPublicIp(ctx, record);
  ctx.log.info(`got IP: ${record.publicIpv4 ?? '(none)'}`);
  for (const [id, disk] of Object.entries(desired.disks)) {
    record.disks = withDisk(record.disks, id, attachedRecord(disk));
  }
  await ctx.store.commit(record);
}

/**
 * Wait for an address or a settled create operation.
 *
 * A settled operation is not polled again: the compute service forgets it
 * once it reports a final status.
 */
async function awaitCreation(
  ctx: MachineContext,
  record: MachineRecord,
  handle: OperationHandle,
  machineName: string
): Promise<OperationStatus> {
  const outcome: { settled: OperationStatus | null } = { settled: null };
  await pollUntil(
    `provisioning of ${fullName(machineName)}`,
    async () => {
      if ((await fetchPublicIp(ctx, record)) !== null) {
        return true;
      }
      const status = await ctx.cloud.compute.pollOperation(handle);
      if (status.status === 'inProgress') {
        return false;
      }
      outcome.settled = status;
      return true;
    },
    ctx.poll
  );
  return outcome.settled ?? ctx.cloud.compute.pollOperation(handle);
}
