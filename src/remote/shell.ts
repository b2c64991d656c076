/**
 * Machine Shell
 *
 * Runs commands on a deployed machine over ssh. Used for best-effort
 * housekeeping (unmounting disks about to be detached, soft reboots);
 * keys and known hosts come from the operator's ssh configuration.
 */

import { spawn } from 'node:child_process';

import { RemoteError } from '../core/errors.js';
import { echoCall, SSH_PREFIX } from '../cloud/verbose.js';

/**
 * Something that can run a command on one machine.
 */
export interface MachineShell {
  run(command: string): Promise<void>;
}

/**
 * Failure classes for remote commands
 */
export type ShellErrorCode = 'UNREACHABLE' | 'AUTH_FAILED' | 'TIMEOUT' | 'COMMAND_FAILED' | 'SSH_NOT_AVAILABLE';

/**
 * Error thrown when a remote command fails
 */
export class ShellError extends RemoteError {
  constructor(
    message: string,
    public readonly shellCode: ShellErrorCode,
    public readonly exitStatus: number | null,
    public readonly stderr: string,
    public readonly command: string
  ) {
    super(message);
    this.name = 'ShellError';
    Object.setPrototypeOf(this, ShellError.prototype);
  }
}

/**
 * Options for constructing an SshShell
 */
export interface SshShellOptions {
  /** Path to the ssh executable (default: 'ssh') */
  sshPath?: string;
  /** Remote user (default: 'root') */
  user?: string;
  /** Seconds to wait for the connection (default: 10) */
  connectTimeout?: number;
  /** Milliseconds before the command is abandoned (default: 60000) */
  timeout?: number;
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
}

/**
 * Arguments passed to ssh for one command.
 */
export function buildSshArgs(host: string, user: string, connectTimeout: number, command: string): string[] {
  return [
    '-o', 'BatchMode=yes',
    '-o', `ConnectTimeout=${connectTimeout}`,
    `${user}@${host}`,
    '--',
    command,
  ];
}

/**
 * Classify a failed ssh invocation from its stderr and exit status.
 *
 * ssh exits with 255 for its own errors; any other status is the remote command's.
 */
export function classifyShellFailure(stderr: string, exitStatus: number | null): ShellErrorCode {
  if (exitStatus !== 255) {
    return 'COMMAND_FAILED';
  }
  const lower = stderr.toLowerCase();
  if (lower.includes('permission denied') || lower.includes('host key verification failed')) {
    return 'AUTH_FAILED';
  }
  if (lower.includes('timed out')) {
    return 'TIMEOUT';
  }
  return 'UNREACHABLE';
}

/**
 * Last non-empty stderr line, with ANSI codes and carriage returns removed.
 */
export function summarizeStderr(stderr: string): string {
  // eslint-disable-next-line no-control-regex
  const clean = stderr.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, '').replace(/\r/g, '');
  const lines = clean.split('\n').map((line) => line.trim()).filter(Boolean);
  return lines[lines.length - 1] ?? '';
}

/**
 * Runs commands on one machine through the system ssh client.
 */
export class SshShell implements MachineShell {
  private readonly sshPath: string;
  private readonly user: string;
  private readonly connectTimeout: number;
  private readonly timeout: number;
  private readonly verbose: boolean;

  constructor(
    private readonly host: string,
    options: SshShellOptions = {}
  ) {
    this.sshPath = options.sshPath ?? 'ssh';
    this.user = options.user ?? 'root';
    this.connectTimeout = options.connectTimeout ?? 10;
    this.timeout = options.timeout ?? 60000;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Run a command and wait for it to finish.
   *
   * @throws ShellError if ssh cannot run or the command exits non-zero
   */
  async run(command: string): Promise<void> {
    if (this.verbose) {
      echoCall(`${this.user}@${this.host} ${command}`, SSH_PREFIX);
    }

    return new Promise<void>((resolve, reject) => {
      const child = spawn(this.sshPath, buildSshArgs(this.host, this.user, this.connectTimeout, command), {
        stdio: ['ignore', 'ignore', 'pipe'],
      });

      let stderr = '';
      let killed = false;

      const timeoutId = setTimeout(() => {
        killed = true;
        child.kill('SIGTERM');
        reject(new ShellError(`command timed out after ${this.timeout}ms: ${command}`, 'TIMEOUT', null, stderr, command));
      }, this.timeout);

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error: Error) => {
        clearTimeout(timeoutId);
        if (!killed) {
          reject(new ShellError(`Failed to spawn ssh: ${error.message}`, 'SSH_NOT_AVAILABLE', null, stderr, command));
        }
      });

      child.on('close', (code: number | null) => {
        clearTimeout(timeoutId);
        if (killed) return;

        if (code === 0) {
          resolve();
          return;
        }
        const summary = summarizeStderr(stderr);
        reject(
          new ShellError(
            summary ? `${command}: ${summary}` : `${command} exited with code ${String(code)}`,
            classifyShellFailure(stderr, code),
            code,
            stderr,
            command
          )
        );
      });
    });
  }
}
