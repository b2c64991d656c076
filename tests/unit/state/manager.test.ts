/**
 * Unit tests for State Manager
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, rm, writeFile, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { StateError } from '../../../src/core/errors.js';
import { createEmptyRecord } from '../../../src/core/types.js';
import type { MachineRecord } from '../../../src/core/types.js';
import { StateManager } from '../../../src/state/manager.js';

// Create a unique temp directory for each test run
function createTempDir(): string {
  return join(tmpdir(), `vmconverge-test-${randomUUID()}`);
}

function runningRecord(): MachineRecord {
  return {
    ...createEmptyRecord(),
    machineName: 'demo-web',
    resourceGroup: 'rg-demo',
    vmId: 'demo-web',
    lifecycle: 'running',
  };
}

describe('StateManager', () => {
  let tempDir: string;
  let configPath: string;
  let statePath: string;

  beforeEach(async () => {
    tempDir = createTempDir();
    await mkdir(tempDir, { recursive: true });
    configPath = join(tempDir, 'deploy.yaml');
    statePath = join(tempDir, '.vmconverge', 'state.json');

    await writeFile(configPath, 'deployment:\n  name: demo\nmachines: []');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('exists', () => {
    it('should return false when state file does not exist', async () => {
      assert.strictEqual(await new StateManager(configPath).exists(), false);
    });

    it('should return true after create', async () => {
      const manager = new StateManager(configPath);
      await manager.create('demo');

      assert.strictEqual(await manager.exists(), true);
    });
  });

  describe('create', () => {
    it('should create an empty state for the deployment', async () => {
      const manager = new StateManager(configPath);
      const state = await manager.create('demo');

      assert.strictEqual(state.version, 1);
      assert.strictEqual(state.deployment, 'demo');
      assert.strictEqual(state.configPath, configPath);
      assert.deepStrictEqual(state.machines, {});
    });

    it('should write the file without leaving the temp file behind', async () => {
      const manager = new StateManager(configPath);
      await manager.create('demo');

      await stat(statePath);
      await assert.rejects(stat(`${statePath}.tmp`));
    });
  });

  describe('load', () => {
    it('should load existing state', async () => {
      const created = await new StateManager(configPath).create('demo');

      const loaded = await new StateManager(configPath).load();

      assert.deepStrictEqual(loaded, created);
    });

    it('should throw STATE_NOT_FOUND for a missing file', async () => {
      await assert.rejects(new StateManager(configPath).load(), (error: unknown) => {
        assert.ok(error instanceof StateError);
        assert.strictEqual(error.code, 'STATE_NOT_FOUND');
        return true;
      });
    });

    it('should pass through read failures other than a missing file', async () => {
      await mkdir(statePath, { recursive: true });

      await assert.rejects(new StateManager(configPath).load(), (error: unknown) => {
        assert.ok(!(error instanceof StateError));
        assert.ok(error instanceof Error && 'code' in error);
        assert.strictEqual(error.code, 'EISDIR');
        return true;
      });
    });

    it('should throw STATE_CORRUPTED for invalid JSON', async () => {
      const manager = new StateManager(configPath);
      await mkdir(join(tempDir, '.vmconverge'));
      await writeFile(statePath, '{ not json');

      await assert.rejects(manager.load(), (error: unknown) => {
        assert.ok(error instanceof StateError);
        assert.strictEqual(error.code, 'STATE_CORRUPTED');
        assert.strictEqual(error.statePath, statePath);
        return true;
      });
    });

    it('should throw STATE_CORRUPTED for a record without disks', async () => {
      const manager = new StateManager(configPath);
      const state = await manager.create('demo');
      const { disks: _disks, ...broken } = runningRecord();
      await writeFile(statePath, JSON.stringify({ ...state, machines: { web: broken } }));

      await assert.rejects(new StateManager(configPath).load(), StateError);
    });
  });

  describe('loadOrCreate', () => {
    it('should create the state on first use and load it afterwards', async () => {
      const first = await new StateManager(configPath).loadOrCreate('demo');
      const second = await new StateManager(configPath).loadOrCreate('other');

      assert.strictEqual(second.deployment, 'demo');
      assert.strictEqual(second.createdAt, first.createdAt);
    });
  });

  describe('getState', () => {
    it('should throw if state not loaded', () => {
      assert.throws(() => new StateManager(configPath).getState(), /State not loaded/);
    });
  });

  describe('records', () => {
    it('should return an empty record for an unknown machine', async () => {
      const manager = new StateManager(configPath);
      await manager.create('demo');

      assert.deepStrictEqual(manager.getRecord('web'), createEmptyRecord());
    });

    it('should persist a record and read it back', async () => {
      const manager = new StateManager(configPath);
      await manager.create('demo');
      await manager.setRecord('web', runningRecord());

      const reloaded = new StateManager(configPath);
      await reloaded.load();

      assert.deepStrictEqual(reloaded.getRecord('web'), runningRecord());
      assert.deepStrictEqual(reloaded.getMachineNames(), ['web']);
    });

    it('should hand out copies', async () => {
      const manager = new StateManager(configPath);
      await manager.create('demo');
      await manager.setRecord('web', runningRecord());

      const copy = manager.getRecord('web');
      copy.lifecycle = 'stopped';

      assert.strictEqual(manager.getRecord('web').lifecycle, 'running');
    });

    it('should remove a record', async () => {
      const manager = new StateManager(configPath);
      await manager.create('demo');
      await manager.setRecord('web', runningRecord());

      assert.strictEqual(await manager.removeRecord('web'), true);
      assert.strictEqual(await manager.removeRecord('web'), false);
      assert.deepStrictEqual(manager.getMachineNames(), []);
    });

    it('should read and commit through a record store', async () => {
      const manager = new StateManager(configPath);
      await manager.create('demo');
      const store = manager.recordStore('web');

      await store.commit(runningRecord());

      assert.strictEqual(store.read().vmId, 'demo-web');
      const onDisk: unknown = JSON.parse(await readFile(statePath, 'utf-8'));
      assert.ok(onDisk !== null && typeof onDisk === 'object' && 'machines' in onDisk);
      assert.deepStrictEqual(onDisk.machines, { web: runningRecord() });
    });
  });
});
