/**
 * Slot Addressing
 *
 * Maps logical device paths to data-disk attachment slots (LUNs) and back.
 */

/** Device path of the root (OS) disk */
export const ROOT_DEVICE = '/dev/sda';

/** Highest attachment slot a data disk may use */
export const MAX_SLOT = 31;

const SLOT_DEVICE_PATTERN = /^\/dev\/disk\/by-lun\/(\d+)$/;

/**
 * Slot of a data-disk device path, or null for the root path, a malformed
 * path or a slot above MAX_SLOT.
 */
export function deviceToSlot(device: string): number | null {
  const match = SLOT_DEVICE_PATTERN.exec(device);
  if (!match?.[1]) {
    return null;
  }
  const slot = Number.parseInt(match[1], 10);
  return slot > MAX_SLOT ? null : slot;
}

export function slotToDevice(slot: number): string {
  return `/dev/disk/by-lun/${slot}`;
}

export function isRootDevice(device: string): boolean {
  return device === ROOT_DEVICE;
}

/**
 * Whether a device path is one a declaration may use.
 */
export function isValidDevice(device: string): boolean {
  return isRootDevice(device) || deviceToSlot(device) !== null;
}
