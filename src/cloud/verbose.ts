/**
 * Verbose Output Helpers
 *
 * Formats cloud API calls and remote commands for --verbose CLI output,
 * printed to stderr before each call is made.
 */

/** Prefix of Azure API call lines */
export const AZURE_PREFIX = '[AZ] ';

/** Prefix of remote shell command lines */
export const SSH_PREFIX = '[SSH] ';

/**
 * ANSI SGR 90: bright black (gray) foreground.
 */
const ANSI_GRAY = '\x1b[90m';

/**
 * ANSI SGR 0: reset all attributes.
 */
const ANSI_RESET = '\x1b[0m';

/**
 * Check whether stderr supports ANSI escape codes.
 *
 * Returns true when stderr is a TTY (interactive terminal).
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Format a command for verbose output.
 *
 * The first line carries the prefix, continuation lines are indented to
 * its width, and the block is optionally wrapped in ANSI gray.
 *
 * @returns Formatted string ready for `process.stderr.write()`
 */
export function formatCommand(text: string, ansi: boolean, prefix: string = AZURE_PREFIX): string {
  const indent = ' '.repeat(prefix.length);
  const body = text
    .split('\n')
    .map((line, i) => `${i === 0 ? prefix : indent}${line}\n`)
    .join('');

  return ansi ? `${ANSI_GRAY}${body}${ANSI_RESET}` : body;
}

/**
 * Describe an API call as `operation arg1 arg2 ...`, skipping empty arguments.
 */
export function describeCall(operation: string, ...args: Array<string | null | undefined>): string {
  return [operation, ...args.filter((arg): arg is string => typeof arg === 'string' && arg !== '')].join(' ');
}

/**
 * Write a call description to stderr.
 */
export function echoCall(description: string, prefix: string = AZURE_PREFIX): void {
  process.stderr.write(formatCommand(description, supportsAnsi(), prefix));
}
