/**
 * Resource Naming Utilities
 *
 * Generates deterministic, unique Azure resource names from the deployment
 * name, the machine name and a hash of the config file path.
 */

import { resolve } from 'node:path';

import { shortHash } from '../lib/hash.js';

/**
 * Generate a deterministic resource name for a machine.
 *
 * The hash keeps two checkouts of the same deployment file from fighting
 * over one VM, while the same file always maps to the same name.
 *
 * @param configPath - Path to the config file (will be resolved to absolute)
 */
export function generateMachineName(
  deploymentName: string,
  machineName: string,
  configPath: string
): string {
  const hash = computePathHash(resolve(configPath));
  return `${deploymentName}-${machineName}-${hash}`;
}

/**
 * Compute an 8-character hash of a file path.
 *
 * The path is normalized to forward slashes for cross-platform consistency.
 */
export function computePathHash(path: string): string {
  return shortHash(path.replace(/\\/g, '/').toLowerCase());
}

/**
 * Name of a disk on the VM: the machine's resource name, then the declared name.
 */
export function diskResourceName(machineName: string, diskName: string): string {
  return `${machineName}-${diskName}`;
}
