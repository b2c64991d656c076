/**
 * State Types for vmconverge
 *
 * These types represent the persisted state file structure for tracking
 * deployed machines.
 */

import type { MachineRecord } from '../core/types.js';

/**
 * Root state file structure persisted as .vmconverge/state.json
 */
export interface StateFile {
  /** Schema version for migrations */
  version: 1;
  /** Absolute path to YAML config file */
  configPath: string;
  /** Deployment name from config */
  deployment: string;
  /** ISO timestamp of first creation */
  createdAt: string;
  /** ISO timestamp of last modification */
  updatedAt: string;
  /** Machine records, keyed by machine name from config */
  machines: Record<string, MachineRecord>;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Structural check of a parsed state file.
 */
export function isStateFile(value: unknown): value is StateFile {
  if (!isObject(value) || value['version'] !== 1 || !isObject(value['machines'])) {
    return false;
  }
  for (const key of ['configPath', 'deployment', 'createdAt', 'updatedAt']) {
    if (typeof value[key] !== 'string') {
      return false;
    }
  }
  return Object.values(value['machines']).every(
    (record) =>
      isObject(record) &&
      typeof record['lifecycle'] === 'string' &&
      isObject(record['disks']) &&
      isObject(record['generatedEncryptionKeys']) &&
      isObject(record['backups'])
  );
}
