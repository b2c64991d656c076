/**
 * Path Utilities
 *
 * Provides path resolution for configuration and state files.
 */

import { dirname, join, resolve } from 'node:path';

/** Directory holding vmconverge's files, next to the config file */
export const STATE_DIR_NAME = '.vmconverge';

/**
 * Get the state file path for a given config file.
 *
 * @param configPath - Path to the configuration file
 * @returns Absolute path to .vmconverge/state.json in the config file's directory
 */
export function getStatePath(configPath: string): string {
  return join(getStateDir(configPath), 'state.json');
}

/**
 * Get the state directory path for a given config file.
 *
 * @param configPath - Path to the configuration file
 * @returns Absolute path to the .vmconverge directory
 */
export function getStateDir(configPath: string): string {
  const absoluteConfigPath = resolve(configPath);
  return join(dirname(absoluteConfigPath), STATE_DIR_NAME);
}
