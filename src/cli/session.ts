/**
 * Command Session
 *
 * Shared plumbing for every command: load and resolve the deployment file,
 * open the state file, build the per-machine context and turn errors into
 * output and an exit code.
 */

import { resolve } from 'node:path';

import { createAzureCloud } from '../cloud/azure.js';
import type { CloudApi } from '../cloud/types.js';
import { loadYamlFile } from '../config/loader.js';
import { resolveConfig } from '../config/resolver.js';
import type { ResolvedConfig, ResolvedMachine } from '../config/types.js';
import { validateConfig } from '../config/validator.js';
import type { Confirm, MachineContext } from '../core/context.js';
import { generateRandomString } from '../core/context.js';
import { ConfigError, getExitCode, isVmconvergeError } from '../core/errors.js';
import { DEFAULT_POLL_OPTIONS } from '../core/poll.js';
import { Logger } from '../lib/logger.js';
import { createConfirm } from '../lib/prompt.js';
import { SshShell } from '../remote/shell.js';
import { StateManager } from '../state/manager.js';

/**
 * Options every command accepts
 */
export interface CommonOptions {
  json?: boolean;
  verbose?: boolean;
}

/**
 * Options of commands that can ask for confirmation
 */
export interface ConfirmingOptions extends CommonOptions {
  yes?: boolean;
}

/**
 * Load, validate and resolve a deployment file.
 *
 * @throws ConfigLoadError if the file cannot be read or parsed
 * @throws ConfigError listing schema or semantic problems
 */
export async function loadDeployment(file: string): Promise<ResolvedConfig> {
  const configPath = resolve(file);
  const raw = await loadYamlFile(configPath);
  const result = validateConfig(raw);
  if (!result.valid) {
    throw new ConfigError(
      `Configuration is invalid: ${result.errors.length} problem(s) in ${configPath}`,
      'CONFIG_VALIDATION_FAILED',
      'Fix the listed problems and run validate again.',
      configPath,
      result.errors.map(({ path, message }) => ({ path, message }))
    );
  }
  return resolveConfig(result.config, configPath);
}

/**
 * Machines named on the command line, or every declared machine when none are.
 *
 * @throws ConfigError if a name is not declared
 */
export function selectMachines(config: ResolvedConfig, names: readonly string[]): ResolvedMachine[] {
  if (names.length === 0) {
    return config.machines;
  }
  return names.map((name) => {
    const machine = config.machines.find((m) => m.name === name);
    if (!machine) {
      throw new ConfigError(
        `Machine '${name}' is not declared in ${config.configPath}`,
        'CONFIG_VALIDATION_FAILED',
        `Declared machines: ${config.machines.map((m) => m.name).join(', ')}`
      );
    }
    return machine;
  });
}

/**
 * Everything a command needs to act on the machines of one deployment.
 */
export class Session {
  constructor(
    readonly config: ResolvedConfig,
    readonly state: StateManager,
    readonly cloud: CloudApi,
    readonly log: Logger,
    private readonly confirm: Confirm,
    private readonly verbose: boolean
  ) {}

  /**
   * Context for one machine; also points the logger at it.
   */
  contextFor(machine: string): MachineContext {
    this.log.setMachine(machine);
    const { ssh, sshConnectTimeout } = this.config;
    return {
      name: machine,
      cloud: this.cloud,
      store: this.state.recordStore(machine),
      log: this.log,
      confirm: this.confirm,
      shell: ssh ? (host) => new SshShell(host, { connectTimeout: sshConnectTimeout, verbose: this.verbose }) : undefined,
      poll: DEFAULT_POLL_OPTIONS,
      randomSecret: generateRandomString,
    };
  }

  /**
   * Run `body` for each machine in turn, with the logger prefixed by its name.
   */
  async forEachMachine(
    machines: readonly string[],
    body: (ctx: MachineContext, name: string) => Promise<void>
  ): Promise<void> {
    try {
      for (const name of machines) {
        await body(this.contextFor(name), name);
      }
    } finally {
      this.log.setMachine(null);
    }
  }
}

/**
 * Open a session on a deployment file.
 *
 * @param requireState - Fail with STATE_NOT_FOUND instead of creating an empty state file
 */
export async function openSession(
  file: string,
  log: Logger,
  options: ConfirmingOptions,
  requireState = false
): Promise<Session> {
  const config = await loadDeployment(file);
  const state = new StateManager(config.configPath);
  if (requireState) {
    await state.load();
  } else {
    await state.loadOrCreate(config.deployment.name);
  }

  const cloud = createAzureCloud({
    ...config.azure,
    clientSecret: process.env['AZURE_CLIENT_SECRET'],
    storageKey: process.env['AZURE_STORAGE_KEY'],
    verbose: options.verbose,
  });
  return new Session(config, state, cloud, log, createConfirm({ yes: options.yes }), options.verbose ?? false);
}

/**
 * Report an error and exit with its code.
 */
export function handleError(log: Logger, error: unknown): never {
  log.setMachine(null);
  if (error instanceof ConfigError && error.validationErrors && error.validationErrors.length > 0) {
    log.validationError(error.validationErrors);
    if (log.getMode() === 'human' && error.suggestion) {
      console.error(`  Fix: ${error.suggestion}`);
    }
  } else if (isVmconvergeError(error)) {
    log.error(error.message, error);
  } else if (error instanceof Error) {
    log.error(error.message);
  } else {
    log.error(String(error));
  }

  log.flush();
  process.exit(getExitCode(error));
}

/**
 * Run a command body with a logger, flushing JSON output at the end.
 */
export async function runCommand(
  name: string,
  options: CommonOptions,
  body: (log: Logger) => Promise<void>
): Promise<void> {
  const log = Logger.fromOptions(options);
  log.setCommand(name);
  try {
    await body(log);
  } catch (error) {
    handleError(log, error);
  }
  log.flush();
}
