/**
 * Encryption keys
 *
 * Generates keys for encrypted disks declared without a passphrase and
 * exports them for the machine's own configuration.
 */

import type { MachineRecord } from './types.js';
import { diskLabel } from './disks.js';

/** Length of a generated disk encryption key */
export const GENERATED_KEY_LENGTH = 256;

/** Priority of the forced passphrase override (lower wins) */
export const PASSPHRASE_OVERRIDE_PRIORITY = 10;

/**
 * Secret file descriptor delivered to the machine
 */
export interface SecretFile {
  text: string;
  user: string;
  group: string;
  permissions: string;
}

/**
 * Activation export for generated keys
 */
export interface KeyExport {
  /** Device path -> forced passphrase override */
  blockDeviceMapping: Record<string, { passphrase: { priority: number; value: string } }>;
  /** Secret file name -> descriptor */
  keys: Record<string, SecretFile>;
}

function usesGeneratedKey(record: MachineRecord, diskId: string): boolean {
  const disk = record.disks[diskId];
  return disk !== undefined && disk.encrypt && disk.passphrase === '';
}

/**
 * Ids of disks that need a generated key but have none yet.
 */
export function disksMissingKeys(record: MachineRecord): string[] {
  return Object.keys(record.disks).filter(
    (id) => usesGeneratedKey(record, id) && record.generatedEncryptionKeys[id] === undefined
  );
}

/**
 * Generate keys for every disk that needs one and has none yet.
 *
 * Never regenerates an existing key.
 *
 * @returns The updated keys map and the ids that received a key
 */
export function generateMissingEncryptionKeys(
  record: MachineRecord,
  randomSecret: (length: number) => string
): { keys: Record<string, string>; generated: string[] } {
  const keys = { ...record.generatedEncryptionKeys };
  const generated = disksMissingKeys(record);
  for (const id of generated) {
    keys[id] = randomSecret(GENERATED_KEY_LENGTH);
  }
  return { keys, generated };
}

/**
 * Describe a disk for key-generation log lines.
 */
export function keyLogLine(record: MachineRecord, diskId: string): string {
  const disk = record.disks[diskId];
  return `generating an encryption key for disk ${disk ? diskLabel(disk, diskId) : diskId}`;
}

/**
 * Export generated keys as configuration overrides and secret files.
 */
export function exportGeneratedKeys(record: MachineRecord): KeyExport {
  const result: KeyExport = { blockDeviceMapping: {}, keys: {} };
  for (const [id, disk] of Object.entries(record.disks)) {
    const key = record.generatedEncryptionKeys[id];
    if (!usesGeneratedKey(record, id) || key === undefined) {
      continue;
    }
    result.blockDeviceMapping[disk.device] = {
      passphrase: { priority: PASSPHRASE_OVERRIDE_PRIORITY, value: key },
    };
    result.keys[`luks-${disk.name}`] = {
      text: key,
      user: 'root',
      group: 'root',
      permissions: '0600',
    };
  }
  return result;
}
