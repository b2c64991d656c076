/**
 * Legality Checker
 *
 * Rejects disk layout changes the live VM cannot reach in one deployment:
 * new disks are attached first, the machine unmounts the old ones, and
 * only then are they detached. A slot can therefore not be handed to a
 * different disk, nor an attached disk moved or renamed, in one step.
 */

import { IllegalTransitionError } from './errors.js';
import type { DiskViolation } from './errors.js';
import { diskLabel, findDiskAtDevice, isAttached } from './disks.js';
import { deviceToSlot } from './slots.js';
import type { DiskMap, DiskSpec } from './types.js';

/**
 * Find every disk change that cannot be applied in one step.
 *
 * @param desired - Declared disks keyed by backing-store URL
 * @param current - Recorded disks of the deployed VM
 */
export function findDiskTransitionViolations(
  desired: Record<string, DiskSpec>,
  current: DiskMap
): IllegalTransitionError[] {
  const violations: IllegalTransitionError[] = [];

  for (const [id, disk] of Object.entries(desired)) {
    const occupantId = findDiskAtDevice(current, disk.device);
    const occupant = occupantId === null ? undefined : current[occupantId];
    if (
      occupantId !== null &&
      occupant &&
      occupantId !== id &&
      deviceToSlot(disk.device) !== null &&
      isAttached(occupant)
    ) {
      violations.push(
        violation(
          `can't attach Azure disk ${diskLabel(disk, id)} because the target LUN ${disk.device} is already occupied by Azure disk ${occupantId}`,
          'slot-occupied',
          id,
          disk.device,
          'Deploy a configuration with this LUN left empty before using it to attach a different data disk.',
          occupantId
        )
      );
    }

    const recorded = current[id];
    if (!recorded || deviceToSlot(recorded.device) === null || !isAttached(recorded)) {
      continue;
    }
    if (recorded.device !== disk.device) {
      violations.push(
        violation(
          `can't reattach Azure disk ${diskLabel(disk, id)} to a different LUN in one step`,
          'slot-reassignment',
          id,
          recorded.device,
          `Deploy a configuration with this disk detached from ${recorded.device} before attaching it to ${disk.device}.`
        )
      );
    }
    if (recorded.name !== disk.name) {
      violations.push(
        violation(
          `cannot change the name of the attached disk ${diskLabel(recorded, id)}`,
          'name-change',
          id,
          recorded.device,
          `Keep the name '${recorded.name}' while the disk is attached, or detach it first.`
        )
      );
    }
  }

  return violations;
}

/**
 * Throw the first disk change that cannot be applied in one step.
 *
 * @throws IllegalTransitionError
 */
export function assertLegalDiskTransition(desired: Record<string, DiskSpec>, current: DiskMap): void {
  const [first] = findDiskTransitionViolations(desired, current);
  if (first) {
    throw first;
  }
}

function violation(
  message: string,
  kind: DiskViolation,
  diskId: string,
  device: string,
  suggestion: string,
  otherDiskId?: string
): IllegalTransitionError {
  return new IllegalTransitionError(message, kind, diskId, device, suggestion, otherDiskId);
}
