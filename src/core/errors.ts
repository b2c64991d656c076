/**
 * Error Types for vmconverge
 *
 * Closed set of error codes with exit codes. User-facing errors carry a
 * suggestion; internal invariant violations are kept apart from them.
 */

/**
 * Error codes for all vmconverge errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED'
  | 'STATE_CORRUPTED'
  | 'STATE_NOT_FOUND'
  | 'IMMUTABLE_FIELD_CHANGED'
  | 'ILLEGAL_DISK_TRANSITION'
  | 'REBOOT_REQUIRED'
  | 'RECREATE_REQUIRED'
  | 'RESOURCE_MISSING'
  | 'RESOURCE_CONFLICT'
  | 'CONFIRMATION_DECLINED'
  | 'PROVISIONING_FAILED'
  | 'OPERATION_TIMEOUT'
  | 'REMOTE_ERROR'
  | 'INTERNAL_INVARIANT';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_YAML: 1,
  CONFIG_VALIDATION_FAILED: 1,
  STATE_CORRUPTED: 2,
  STATE_NOT_FOUND: 1,
  IMMUTABLE_FIELD_CHANGED: 1,
  ILLEGAL_DISK_TRANSITION: 1,
  REBOOT_REQUIRED: 1,
  RECREATE_REQUIRED: 1,
  RESOURCE_MISSING: 1,
  RESOURCE_CONFLICT: 1,
  CONFIRMATION_DECLINED: 1,
  PROVISIONING_FAILED: 2,
  OPERATION_TIMEOUT: 2,
  REMOTE_ERROR: 2,
  INTERNAL_INVARIANT: 3,
};

/**
 * Base error class for all vmconverge errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class VmconvergeError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'VmconvergeError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, VmconvergeError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * A single semantic or schema problem found in the deployment file.
 */
export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Error for configuration-related issues.
 */
export class ConfigError extends VmconvergeError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_YAML' | 'CONFIG_VALIDATION_FAILED',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: ConfigIssue[]
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * Error for state-related issues.
 */
export class StateError extends VmconvergeError {
  constructor(
    message: string,
    code: 'STATE_CORRUPTED' | 'STATE_NOT_FOUND',
    suggestion?: string,
    public readonly statePath?: string
  ) {
    super(message, code, suggestion);
    this.name = 'StateError';
    Object.setPrototypeOf(this, StateError.prototype);
  }
}

/**
 * An identity-defining machine attribute differs from the recorded one.
 */
export class ImmutableFieldError extends VmconvergeError {
  constructor(
    public readonly field: string,
    public readonly recorded: string,
    public readonly declared: string
  ) {
    super(
      `cannot change the ${field} of a deployed machine from '${recorded}' to '${declared}'`,
      'IMMUTABLE_FIELD_CHANGED',
      `Destroy the machine first, or declare a new machine with the ${field} '${declared}'.`
    );
    this.name = 'ImmutableFieldError';
    Object.setPrototypeOf(this, ImmutableFieldError.prototype);
  }
}

/**
 * Kinds of disk layout changes that cannot be applied in one step.
 */
export type DiskViolation = 'slot-occupied' | 'slot-reassignment' | 'name-change';

/**
 * Error for a declared disk layout that the live VM cannot reach in one step.
 */
export class IllegalTransitionError extends VmconvergeError {
  constructor(
    message: string,
    public readonly violation: DiskViolation,
    public readonly diskId: string,
    public readonly device: string,
    suggestion: string,
    public readonly otherDiskId?: string
  ) {
    super(message, 'ILLEGAL_DISK_TRANSITION', suggestion);
    this.name = 'IllegalTransitionError';
    Object.setPrototypeOf(this, IllegalTransitionError.prototype);
  }
}

/**
 * Override flags an operator can pass to authorize disruptive changes.
 */
export type OverrideFlag = '--allow-reboot' | '--allow-recreate';

/**
 * The requested change needs a reboot or a re-creation the operator did not allow.
 */
export class PermissionRequiredError extends VmconvergeError {
  constructor(message: string, public readonly flag: OverrideFlag) {
    super(
      message,
      flag === '--allow-reboot' ? 'REBOOT_REQUIRED' : 'RECREATE_REQUIRED',
      `Re-run with ${flag} to allow this change.`
    );
    this.name = 'PermissionRequiredError';
    Object.setPrototypeOf(this, PermissionRequiredError.prototype);
  }
}

/**
 * A resource the state record says exists could not be found.
 */
export class ResourceMissingError extends VmconvergeError {
  constructor(message: string, suggestion = "Run 'vmconverge deploy --check' to reconcile the state record.") {
    super(message, 'RESOURCE_MISSING', suggestion);
    this.name = 'ResourceMissingError';
    Object.setPrototypeOf(this, ResourceMissingError.prototype);
  }
}

/**
 * Error for failed VM provisioning. Carries the provider's error payload as-is.
 */
export class ProvisioningError extends VmconvergeError {
  constructor(
    public readonly machineName: string,
    public readonly providerError: unknown
  ) {
    super(
      `failed to provision virtual machine '${machineName}'; ${describeProviderError(providerError)}`,
      'PROVISIONING_FAILED'
    );
    this.name = 'ProvisioningError';
    Object.setPrototypeOf(this, ProvisioningError.prototype);
  }
}

/**
 * A bounded polling loop ran out of attempts.
 */
export class OperationTimeoutError extends VmconvergeError {
  constructor(
    public readonly operation: string,
    public readonly attempts: number
  ) {
    super(`${operation} did not complete after ${attempts} attempts`, 'OPERATION_TIMEOUT');
    this.name = 'OperationTimeoutError';
    Object.setPrototypeOf(this, OperationTimeoutError.prototype);
  }
}

/**
 * Error returned by a cloud API call other than "not found".
 */
export class RemoteError extends VmconvergeError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly detail?: unknown
  ) {
    super(message, 'REMOTE_ERROR');
    this.name = 'RemoteError';
    Object.setPrototypeOf(this, RemoteError.prototype);
  }
}

/**
 * A programming assertion failed (e.g. a validated declaration without a root disk).
 */
export class InvariantError extends VmconvergeError {
  constructor(message: string) {
    super(`internal invariant violated: ${message}`, 'INTERNAL_INVARIANT');
    this.name = 'InvariantError';
    Object.setPrototypeOf(this, InvariantError.prototype);
  }
}

/**
 * Render a provider error payload verbatim.
 */
export function describeProviderError(payload: unknown): string {
  if (payload instanceof Error) {
    return payload.message;
  }
  if (typeof payload === 'string') {
    return payload;
  }
  return JSON.stringify(payload) ?? String(payload);
}

/**
 * Check if an error is a VmconvergeError.
 */
export function isVmconvergeError(error: unknown): error is VmconvergeError {
  return error instanceof VmconvergeError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isVmconvergeError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}
