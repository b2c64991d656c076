/**
 * Disk Record Model
 *
 * Helpers over declared and recorded disk maps. None of them mutate
 * their input; callers commit the returned maps to the record.
 */

import type { DiskMap, DiskRecord, DiskSpec } from './types.js';
import { isRootDevice } from './slots.js';

export function isAttached(disk: DiskRecord): boolean {
  return disk.needsAttach !== true;
}

/**
 * Id of the root disk in a declaration.
 */
export function findDeclaredRootDisk(disks: Record<string, DiskSpec>): string | null {
  const entry = Object.entries(disks).find(([, disk]) => isRootDevice(disk.device));
  return entry ? entry[0] : null;
}

/**
 * Id of the root disk attached to the deployed VM.
 *
 * A detached old root disk may still be recorded, so only attached
 * records count.
 */
export function findAttachedRootDisk(disks: DiskMap): string | null {
  const entry = Object.entries(disks).find(
    ([, disk]) => isRootDevice(disk.device) && isAttached(disk)
  );
  return entry ? entry[0] : null;
}

/**
 * Id of the recorded disk occupying a device path, if any.
 */
export function findDiskAtDevice(disks: DiskMap, device: string): string | null {
  const entry = Object.entries(disks).find(([, disk]) => disk.device === device);
  return entry ? entry[0] : null;
}

export function cloneDisk<T extends DiskSpec>(disk: T): T {
  return { ...disk };
}

export function withDisk(disks: DiskMap, id: string, disk: DiskRecord): DiskMap {
  return { ...disks, [id]: cloneDisk(disk) };
}

export function withoutDisk(disks: DiskMap, id: string): DiskMap {
  const { [id]: _removed, ...rest } = disks;
  return rest;
}

/**
 * Record for a declared disk that is now attached.
 */
export function attachedRecord(spec: DiskSpec): DiskRecord {
  const { id, device, name, size, cachingMode, isEphemeral, encrypt, passphrase } = spec;
  return { id, device, name, size, cachingMode, isEphemeral, encrypt, passphrase };
}

/**
 * Every disk marked as needing an attach; used once the VM is gone.
 */
export function markAllNeedsAttach(disks: DiskMap): DiskMap {
  const marked: DiskMap = {};
  for (const [id, disk] of Object.entries(disks)) {
    marked[id] = { ...disk, needsAttach: true };
  }
  return marked;
}

/**
 * Human label used in log lines: name(id)
 */
export function diskLabel(disk: Pick<DiskSpec, 'name'>, id: string): string {
  return `${disk.name}(${id})`;
}
