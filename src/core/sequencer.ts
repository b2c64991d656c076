/**
 * Convergence Sequencer
 *
 * Drives one machine from its recorded state to its declaration. Steps run
 * in a fixed order and every remote mutation is committed to the record
 * before the next one is issued:
 *
 *   1. immutable-field guard
 *   2. check pass (drift or unexpected deletion), when requested
 *   3. reboot guard
 *   4. disk legality
 *   5. root-disk substitution
 *   6. in-place disk parameter updates
 *   7. network and VM provisioning
 *   8. attach missing or detached disks
 *   9. encryption key generation
 *  10. property sync
 */

import type { MachineContext } from './context.js';
import { fullName } from './context.js';
import { detectDrift } from './drift.js';
import type { DriftReport } from './drift.js';
import {
  attachedRecord,
  diskLabel,
  findAttachedRootDisk,
  findDeclaredRootDisk,
  isAttached,
  withDisk,
} from './disks.js';
import {
  ImmutableFieldError,
  InvariantError,
  PermissionRequiredError,
  ResourceMissingError,
  VmconvergeError,
} from './errors.js';
import { generateMissingEncryptionKeys, keyLogLine } from './keys.js';
import { assertLegalDiskTransition } from './legality.js';
import { markResourceDeleted } from './lifecycle.js';
import { blobExists, getLiveVM, recordedIdentity, requireLiveVM } from './machine.js';
import { copyProperties, propertiesChanged, provisionMachine } from './provision.js';
import { deviceToSlot } from './slots.js';
import type { DesiredMachine, MachineRecord } from './types.js';
import { isDeployed } from './types.js';

export interface ReconcileOptions {
  /** Compare the record with the live resource first */
  check: boolean;
  /** Permit changes that reboot the machine */
  allowReboot: boolean;
  /** Permit destroying and re-creating the VM */
  allowRecreate: boolean;
}

export interface ReconcileResult {
  /** Drift found by the check pass, if one ran against a live VM */
  drift: DriftReport | null;
  /** The VM was destroyed during this run and created again */
  recreated: boolean;
  /** Data disks attached to an existing VM */
  attached: string[];
  /** Disks that received a generated encryption key */
  generatedKeys: string[];
}

const IMMUTABLE_FIELDS = [
  ['instance name', 'machineName'],
  ['resource group', 'resourceGroup'],
  ['virtual network', 'virtualNetwork'],
  ['storage', 'storage'],
  ['location', 'location'],
] as const;

/**
 * Converge one machine towards its declaration.
 *
 * @throws ImmutableFieldError if an identity-defining field changed
 * @throws PermissionRequiredError if a reboot or re-creation is needed but not allowed
 * @throws IllegalTransitionError before any remote mutation when the disk layout cannot be reached
 */
export async function reconcileMachine(
  ctx: MachineContext,
  desired: DesiredMachine,
  options: ReconcileOptions
): Promise<ReconcileResult> {
  const result: ReconcileResult = { drift: null, recreated: false, attached: [], generatedKeys: [] };

  guardImmutableFields(ctx.store.read(), desired);
  await ctx.store.commit({
    ...ctx.store.read(),
    machineName: desired.machineName,
    resourceGroup: desired.resourceGroup,
    virtualNetwork: desired.virtualNetwork,
    storage: desired.storage,
    location: desired.location,
  });

  if (options.check) {
    result.drift = await checkPass(ctx, options);
  }

  let record = ctx.store.read();
  if (record.vmId !== null && !options.allowReboot) {
    if (desired.size !== record.size) {
      throw new PermissionRequiredError('reboot is required to change the virtual machine size', '--allow-reboot');
    }
    if (desired.availabilitySet !== record.availabilitySet) {
      throw new PermissionRequiredError('reboot is required to change the availability set name', '--allow-reboot');
    }
  }

  if (record.vmId !== null && desired.availabilitySet !== record.availabilitySet) {
    // Azure places a VM in an availability set only when it is created
    throw new ImmutableFieldError(
      'availability set',
      record.availabilitySet ?? '(none)',
      desired.availabilitySet ?? '(none)'
    );
  }

  if (record.vmId !== null) {
    assertLegalDiskTransition(desired.disks, record.disks);
    result.recreated = await substituteRootDisk(ctx, desired, options);
  }

  await updateDiskParameters(ctx, desired);
  await provisionMachine(ctx, desired);
  result.attached = await attachMissingDisks(ctx, desired);

  record = ctx.store.read();
  const { keys, generated } = generateMissingEncryptionKeys(record, ctx.randomSecret);
  for (const id of generated) {
    ctx.log.action(keyLogLine(record, id));
  }
  if (generated.length > 0) {
    await ctx.store.commit({ ...record, generatedEncryptionKeys: keys });
  }
  result.generatedKeys = generated;

  record = ctx.store.read();
  if (propertiesChanged(record, desired)) {
    ctx.log.action(`updating properties of ${fullName(desired.machineName)}...`);
    const vm = await requireLiveVM(ctx, record);
    vm.size = desired.size;
    await ctx.cloud.compute.createOrUpdateVM(desired.resourceGroup, vm);
    await ctx.store.commit(copyProperties(record, desired));
  }

  return result;
}

function guardImmutableFields(record: MachineRecord, desired: DesiredMachine): void {
  if (!isDeployed(record)) {
    return;
  }
  for (const [label, field] of IMMUTABLE_FIELDS) {
    const recorded = record[field];
    if (recorded !== null && recorded !== desired[field]) {
      throw new ImmutableFieldError(label, recorded, desired[field]);
    }
  }
}

async function checkPass(ctx: MachineContext, options: ReconcileOptions): Promise<DriftReport | null> {
  const record = ctx.store.read();
  const name = fullName(record.machineName);
  const vm = await getLiveVM(ctx, record);

  if (vm) {
    if (record.vmId !== null) {
      return detectDrift(ctx, vm);
    }
    ctx.log.warning(
      `${name} exists, but isn't supposed to; probably, this is the result of a botched creation attempt ` +
        'and can be fixed by deletion. However, this also could be a resource name collision, ' +
        'and valuable data could be lost; before proceeding, please ensure that this isn\'t so.'
    );
    if (!(await ctx.confirm(`are you sure you want to destroy ${name}?`))) {
      throw new VmconvergeError(`cannot proceed while ${name} exists unrecorded`, 'CONFIRMATION_DECLINED');
    }
    ctx.log.action(`destroying ${name}...`);
    await ctx.cloud.compute.deleteVM(recordedIdentity(record).resourceGroup, vm.name);
    return null;
  }

  if (record.vmId !== null) {
    ctx.log.warning('the instance seems to have been destroyed behind our back');
    if (!options.allowRecreate) {
      throw new PermissionRequiredError(`${name} was deleted outside of vmconverge`, '--allow-recreate');
    }
    await ctx.store.commit(markResourceDeleted(record));
  }
  return null;
}

async function substituteRootDisk(
  ctx: MachineContext,
  desired: DesiredMachine,
  options: ReconcileOptions
): Promise<boolean> {
  const record = ctx.store.read();
  const declaredId = findDeclaredRootDisk(desired.disks);
  const recordedId = findAttachedRootDisk(record.disks);
  const declared = declaredId === null ? undefined : desired.disks[declaredId];
  const recorded = recordedId === null ? undefined : record.disks[recordedId];
  if (!declared || !recorded) {
    throw new InvariantError(`${fullName(record.machineName)} must have a root disk both declared and recorded`);
  }

  if (
    declaredId === recordedId &&
    declared.cachingMode === recorded.cachingMode &&
    declared.name === recorded.name
  ) {
    return false;
  }

  ctx.log.warning('a modification of the root disk is requested that requires that the virtual machine is re-created');
  if (!options.allowRecreate) {
    throw new PermissionRequiredError('changing the root disk requires re-creating the virtual machine', '--allow-recreate');
  }
  ctx.log.action('destroying the virtual machine, but preserving the disk contents...');
  await ctx.cloud.compute.deleteVM(desired.resourceGroup, desired.machineName);
  await ctx.store.commit(markResourceDeleted(record));
  return true;
}

/**
 * Apply what can change on existing data disks.
 *
 * Only the caching mode of an attached disk can change remotely; a
 * detached disk takes every declared attribute.
 */
async function updateDiskParameters(ctx: MachineContext, desired: DesiredMachine): Promise<void> {
  for (const [id, disk] of Object.entries(desired.disks)) {
    let record = ctx.store.read();
    const recorded = record.disks[id];
    if (!recorded || deviceToSlot(disk.device) === null) {
      continue;
    }
    const updated = { ...recorded };

    if (record.vmId !== null && isAttached(recorded)) {
      if (disk.cachingMode !== recorded.cachingMode) {
        ctx.log.action(`changing parameters of the attached disk ${diskLabel(disk, id)}`);
        const vm = await requireLiveVM(ctx, record);
        const live = vm.dataDisks.find((d) => d.vhdUri === id);
        if (!live) {
          throw new ResourceMissingError(
            `disk ${diskLabel(disk, id)} was supposed to be attached at ${disk.device} but wasn't found`
          );
        }
        live.caching = disk.cachingMode;
        await ctx.cloud.compute.createOrUpdateVM(desired.resourceGroup, vm);
        updated.cachingMode = disk.cachingMode;
      }
    } else {
      updated.cachingMode = disk.cachingMode;
      updated.name = disk.name;
      updated.device = disk.device;
    }
    updated.encrypt = disk.encrypt;
    updated.passphrase = disk.passphrase;
    updated.isEphemeral = disk.isEphemeral;

    record = { ...record, disks: withDisk(record.disks, id, updated) };
    await ctx.store.commit(record);
  }
}

/**
 * Attach every declared data disk that is new or marked as needing an attach.
 *
 * @returns Ids of the attached disks
 */
async function attachMissingDisks(ctx: MachineContext, desired: DesiredMachine): Promise<string[]> {
  const attached: string[] = [];
  for (const [id, disk] of Object.entries(desired.disks)) {
    const lun = deviceToSlot(disk.device);
    if (lun === null) {
      continue;
    }
    const record = ctx.store.read();
    const recorded = record.disks[id];
    if (recorded && isAttached(recorded)) {
      continue;
    }

    ctx.log.action(`attaching data disk ${diskLabel(disk, id)}`);
    const vm = await requireLiveVM(ctx, record);
    vm.dataDisks.push({
      lun,
      name: disk.name,
      vhdUri: id,
      caching: disk.cachingMode,
      createOption: (await blobExists(ctx, desired.storage, id)) ? 'Attach' : 'Empty',
      diskSizeGB: disk.size,
    });
    await ctx.cloud.compute.createOrUpdateVM(desired.resourceGroup, vm);
    await ctx.store.commit({ ...record, disks: withDisk(record.disks, id, attachedRecord(disk)) });
    attached.push(id);
  }
  return attached;
}
