/**
 * Remote lookups shared by the reconciliation steps.
 */

import type { CloudVM } from '../cloud/types.js';
import type { MachineContext } from './context.js';
import { fullName } from './context.js';
import { InvariantError, ResourceMissingError } from './errors.js';
import { resolveBlobRef } from './blob-url.js';
import type { MachineRecord } from './types.js';

/**
 * Identity of a machine the record knows about
 */
export interface RecordedIdentity {
  machineName: string;
  resourceGroup: string;
}

/**
 * Resource name and group of a recorded machine.
 *
 * @throws InvariantError if the record was never deployed
 */
export function recordedIdentity(record: MachineRecord): RecordedIdentity {
  if (record.machineName === null || record.resourceGroup === null) {
    throw new InvariantError('machine name and resource group must be recorded before remote calls');
  }
  return { machineName: record.machineName, resourceGroup: record.resourceGroup };
}

/**
 * Fetch the live VM, or null when it does not exist.
 */
export async function getLiveVM(ctx: MachineContext, record: MachineRecord): Promise<CloudVM | null> {
  const { machineName, resourceGroup } = recordedIdentity(record);
  return ctx.cloud.compute.getVM(resourceGroup, machineName);
}

/**
 * Fetch the live VM and complain when the record expects it to exist.
 *
 * @throws ResourceMissingError if the VM is gone
 */
export async function requireLiveVM(ctx: MachineContext, record: MachineRecord): Promise<CloudVM> {
  const vm = await getLiveVM(ctx, record);
  if (!vm) {
    throw new ResourceMissingError(
      `${fullName(record.machineName)} has been deleted behind our back`
    );
  }
  return vm;
}

/**
 * Currently assigned public IPv4 address, if the machine has a public IP.
 */
export async function fetchPublicIp(ctx: MachineContext, record: MachineRecord): Promise<string | null> {
  if (record.publicIp === null || record.resourceGroup === null) {
    return null;
  }
  const ip = await ctx.cloud.network.getPublicIp(record.resourceGroup, record.publicIp);
  return ip?.ipAddress ?? null;
}

/**
 * Whether the backing store at `url` exists.
 *
 * @throws ConfigError if the URL is outside the machine's storage account
 */
export async function blobExists(ctx: MachineContext, storage: string | null, url: string): Promise<boolean> {
  const props = await ctx.cloud.blobs.getProperties(resolveBlobRef(url, storage));
  return props !== null;
}

/**
 * Warn when a live value differs from the expected one.
 *
 * @returns The live value
 */
export function warnIfChanged<T>(
  ctx: MachineContext,
  resourceName: string,
  property: string,
  expected: T,
  actual: T,
  canFix = true
): T {
  if (expected !== actual) {
    ctx.log.warning(
      `${resourceName} ${property} has changed to '${String(actual)}'; expected it to be '${String(expected)}'` +
        (canFix ? '' : '; cannot fix this automatically')
    );
  }
  return actual;
}
