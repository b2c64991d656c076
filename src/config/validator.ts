/**
 * Configuration Validator
 *
 * Validates configuration data against the JSON Schema using Ajv.
 */

import Ajv, { type ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';

import type { ConfigIssue } from '../core/errors.js';
import type { VmconvergeConfig } from './types.js';
import configSchema from './schema.json' with { type: 'json' };

/**
 * Validation error details
 */
export interface ValidationError extends ConfigIssue {
  /** Additional error parameters from Ajv */
  params: Record<string, unknown>;
}

/**
 * Validation result - either success with config or failure with errors
 */
export type ValidationResult =
  | { valid: true; config: VmconvergeConfig }
  | { valid: false; errors: ValidationError[] };

// Strict mode is off so schema keywords Ajv does not know are ignored rather than rejected
const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
  strict: false,
});
addFormats.default(ajv);

// Compile the schema once
const validate = ajv.compile<VmconvergeConfig>(configSchema);

/**
 * Validate configuration data against the JSON Schema.
 *
 * @param data - Parsed YAML/JSON data to validate
 * @returns Validation result with either the typed config or detailed errors
 */
export function validateConfig(data: unknown): ValidationResult {
  if (validate(data)) {
    return { valid: true, config: data };
  }

  const errors: ValidationError[] = (validate.errors ?? []).map((error: ErrorObject) => ({
    path: error.instancePath || '/',
    message: error.message ?? 'Unknown validation error',
    params: { ...error.params },
  }));

  return { valid: false, errors };
}

/**
 * Format validation errors into human-readable messages.
 *
 * @param errors - Array of validation errors
 * @returns Formatted error string with one error per line
 */
export function formatValidationErrors(errors: ConfigIssue[]): string {
  return errors
    .map((error) => {
      const path = error.path || '/';
      return `  - ${path}: ${error.message}`;
    })
    .join('\n');
}
