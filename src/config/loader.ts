/**
 * Configuration Loader
 *
 * Loads YAML configuration files from the filesystem.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

import { ConfigError } from '../core/errors.js';

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends ConfigError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_YAML',
    public readonly filePath: string,
    public readonly detail?: Error
  ) {
    super(
      message,
      code,
      code === 'CONFIG_NOT_FOUND'
        ? 'Check the path to the deployment file.'
        : 'Fix the YAML syntax at the reported position.',
      filePath
    );
    this.name = 'ConfigLoadError';
    Object.setPrototypeOf(this, ConfigLoadError.prototype);
  }
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Load and parse a YAML configuration file.
 *
 * @param filePath - Path to the YAML configuration file
 * @returns Parsed YAML content as unknown (requires validation)
 * @throws ConfigLoadError if the file cannot be read or parsed
 */
export async function loadYamlFile(filePath: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const err = error instanceof Error ? error : undefined;
    switch (errnoCode(error)) {
      case 'ENOENT':
        throw new ConfigLoadError(`Configuration file not found: ${filePath}`, 'CONFIG_NOT_FOUND', filePath, err);
      case 'EACCES':
        throw new ConfigLoadError(
          `Permission denied reading configuration file: ${filePath}`,
          'CONFIG_NOT_FOUND',
          filePath,
          err
        );
      default:
        throw new ConfigLoadError(`Failed to read configuration file: ${filePath}`, 'CONFIG_NOT_FOUND', filePath, err);
    }
  }

  try {
    return yaml.load(content);
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new ConfigLoadError(
        `Invalid YAML syntax in ${filePath}: ${error.message}`,
        'CONFIG_INVALID_YAML',
        filePath,
        error
      );
    }
    throw error;
  }
}
