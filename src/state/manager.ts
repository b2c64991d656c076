/**
 * State Manager
 *
 * Manages persisted state for tracking deployed machines.
 * Uses atomic writes to prevent corruption from concurrent access.
 */

import { mkdir, readFile, rename, stat, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { StateError } from '../core/errors.js';
import { createEmptyRecord } from '../core/types.js';
import type { MachineRecord, RecordStore } from '../core/types.js';
import { getStateDir, getStatePath } from '../lib/paths.js';
import { isStateFile } from './types.js';
import type { StateFile } from './types.js';

/**
 * Manages state persistence for vmconverge.
 *
 * State is stored in .vmconverge/state.json relative to the config file.
 * All writes are atomic (write to temp, then rename) to prevent corruption.
 */
export class StateManager {
  private readonly configPath: string;
  private readonly statePath: string;
  private readonly stateDir: string;
  private state: StateFile | null = null;

  constructor(configPath: string) {
    this.configPath = resolve(configPath);
    this.statePath = getStatePath(this.configPath);
    this.stateDir = getStateDir(this.configPath);
  }

  /**
   * Check if a state file exists for this config.
   */
  async exists(): Promise<boolean> {
    try {
      await stat(this.statePath);
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Load state from disk.
   *
   * @throws StateError if the state file is missing or invalid; other read
   *   failures are rethrown as they are
   */
  async load(): Promise<StateFile> {
    let content: string;
    try {
      content = await readFile(this.statePath, 'utf-8');
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
      throw new StateError(
        `State file not found: ${this.statePath}`,
        'STATE_NOT_FOUND',
        "Run 'vmconverge deploy' first.",
        this.statePath
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      parsed = undefined;
    }
    if (!isStateFile(parsed)) {
      throw new StateError(
        `State file is corrupted: ${this.statePath}`,
        'STATE_CORRUPTED',
        'Restore the file from a backup, or remove it after checking the Azure resources by hand.',
        this.statePath
      );
    }
    this.state = parsed;
    return parsed;
  }

  /**
   * Load the state file, creating it when it does not exist yet.
   */
  async loadOrCreate(deploymentName: string): Promise<StateFile> {
    return (await this.exists()) ? this.load() : this.create(deploymentName);
  }

  /**
   * Get currently loaded state without reading from disk.
   *
   * @throws If state hasn't been loaded yet
   */
  getState(): StateFile {
    if (!this.state) {
      throw new Error('State not loaded. Call load() or create() first.');
    }
    return this.state;
  }

  /**
   * Save current state to disk using atomic write.
   *
   * Writes to a temp file first, then renames to ensure atomicity.
   */
  async save(): Promise<void> {
    const state = this.getState();
    state.updatedAt = new Date().toISOString();

    await mkdir(this.stateDir, { recursive: true });

    const tempPath = `${this.statePath}.tmp`;
    await writeFile(tempPath, JSON.stringify(state, null, 2), 'utf-8');
    await rename(tempPath, this.statePath);
  }

  /**
   * Create a new state file for a deployment.
   *
   * @returns The newly created state
   */
  async create(deploymentName: string): Promise<StateFile> {
    const now = new Date().toISOString();

    this.state = {
      version: 1,
      configPath: this.configPath,
      deployment: deploymentName,
      createdAt: now,
      updatedAt: now,
      machines: {},
    };

    await this.save();
    return this.state;
  }

  /**
   * Copy of a machine's record; an empty record when none is stored.
   */
  getRecord(name: string): MachineRecord {
    const record = this.getState().machines[name];
    return record ? structuredClone(record) : createEmptyRecord();
  }

  /**
   * Replace a machine's record and persist the state.
   */
  async setRecord(name: string, record: MachineRecord): Promise<void> {
    this.getState().machines[name] = structuredClone(record);
    await this.save();
  }

  /**
   * Forget a machine and persist the state.
   *
   * @returns Whether a record was stored
   */
  async removeRecord(name: string): Promise<boolean> {
    const machines = this.getState().machines;
    if (!(name in machines)) {
      return false;
    }
    delete machines[name];
    await this.save();
    return true;
  }

  /**
   * Names of every machine with a stored record.
   */
  getMachineNames(): string[] {
    return Object.keys(this.getState().machines);
  }

  /**
   * Record access for one machine, handed to the core.
   */
  recordStore(name: string): RecordStore {
    return {
      read: () => this.getRecord(name),
      commit: (record) => this.setRecord(name, record),
    };
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
