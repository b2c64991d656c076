/**
 * Unit tests for the drift detector
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';

import type { CloudVM } from '../../../src/cloud/types.js';
import { detectDrift } from '../../../src/core/drift.js';
import type { DesiredMachine } from '../../../src/core/types.js';
import {
  blobUrl,
  cloudWithNetwork,
  createTestContext,
  deployedRecord,
  desiredMachine,
  diskSpec,
  liveVM,
  MACHINE_NAME,
  RESOURCE_GROUP,
} from '../../helpers/context.js';
import type { TestContext } from '../../helpers/context.js';
import { seedDeployment } from '../../helpers/context.js';

const A = blobUrl('a');
const B = blobUrl('b');
const C = blobUrl('c');
const NAME_A = `${MACHINE_NAME}-a`;

describe('detectDrift', () => {
  let desired: DesiredMachine;
  let t: TestContext;
  let vm: CloudVM;

  beforeEach(() => {
    desired = desiredMachine([diskSpec(A, '/dev/disk/by-lun/0', 'a'), diskSpec(B, '/dev/disk/by-lun/1', 'b')]);
    const cloud = cloudWithNetwork();
    seedDeployment(cloud, desired);
    t = createTestContext({ cloud, record: deployedRecord(desired) });
    vm = liveVM(desired);
  });

  it('should report nothing when the live VM matches the record', async () => {
    const report = await detectDrift(t.ctx, vm);

    assert.deepStrictEqual(report, { warnings: [], detached: [] });
    assert.deepStrictEqual(t.cloud.mutations(), []);
    assert.deepStrictEqual(t.store.record, deployedRecord(desired));
  });

  it('should take over a changed caching mode', async () => {
    const live = vm.dataDisks[0];
    assert.ok(live);
    live.caching = 'ReadOnly';

    const report = await detectDrift(t.ctx, vm);

    assert.deepStrictEqual(report.warnings, [
      `data disk ${NAME_A}(${A}) host_caching has changed to 'ReadOnly'; expected it to be 'None'`,
    ]);
    assert.strictEqual(t.store.record.disks[A]?.cachingMode, 'ReadOnly');
    assert.deepStrictEqual(t.cloud.mutations(), []);
  });

  it('should take over a changed machine size', async () => {
    vm.size = 'Standard_A2';

    const report = await detectDrift(t.ctx, vm);

    assert.deepStrictEqual(report.warnings, [
      "Azure machine 'demo-web-0a1b2c3d' size has changed to 'Standard_A2'; expected it to be 'Standard_A1'",
    ]);
    assert.strictEqual(t.store.record.size, 'Standard_A2');
  });

  it('should warn about a root disk change it cannot fix', async () => {
    vm.osDisk.name = 'other-root';

    const report = await detectDrift(t.ctx, vm);

    assert.deepStrictEqual(report.warnings, [
      "OS disk of Azure machine 'demo-web-0a1b2c3d' name has changed to 'other-root'; " +
        "expected it to be 'demo-web-0a1b2c3d-root'; cannot fix this automatically",
    ]);
  });

  it('should warn when the VM is in a failed state', async () => {
    vm.provisioningState = 'Failed';

    const report = await detectDrift(t.ctx, vm);

    assert.deepStrictEqual(report.warnings, ['vm resource exists, but is in a failed state']);
  });

  it('should detach a disk found at the wrong LUN and mark it for attach', async () => {
    const live = vm.dataDisks[0];
    assert.ok(live);
    live.lun = 5;

    const report = await detectDrift(t.ctx, vm);

    assert.deepStrictEqual(report.warnings, [
      `disk ${NAME_A}(${A}) is attached to this instance at a wrong LUN 5 instead of 0`,
    ]);
    assert.deepStrictEqual(report.detached, [A]);
    assert.deepStrictEqual(t.cloud.mutations(), [`compute.createOrUpdateVM ${MACHINE_NAME}`]);
    assert.deepStrictEqual(
      t.cloud.compute.updates[0]?.dataDisks.map((d) => d.vhdUri),
      [B]
    );
    assert.strictEqual(t.store.record.disks[A]?.needsAttach, true);
  });

  it('should be idempotent after detaching', async () => {
    const live = vm.dataDisks[0];
    assert.ok(live);
    live.lun = 5;
    await detectDrift(t.ctx, vm);
    const callsAfterFirstPass = t.cloud.mutations().length;

    const current = await t.cloud.compute.getVM(RESOURCE_GROUP, MACHINE_NAME);
    assert.ok(current);
    const report = await detectDrift(t.ctx, current);

    assert.deepStrictEqual(report, { warnings: [], detached: [] });
    assert.strictEqual(t.cloud.mutations().length, callsAfterFirstPass);
  });

  it('should mark an unexpectedly detached disk once', async () => {
    vm.dataDisks = vm.dataDisks.filter((d) => d.vhdUri !== A);

    const report = await detectDrift(t.ctx, vm);

    assert.deepStrictEqual(report.warnings, [`disk ${NAME_A}(${A}) has been unexpectedly detached`]);
    assert.strictEqual(t.store.record.disks[A]?.needsAttach, true);
    assert.deepStrictEqual(t.cloud.mutations(), []);
  });

  it('should drop a detached disk whose backing store is gone', async () => {
    vm.dataDisks = vm.dataDisks.filter((d) => d.vhdUri !== A);
    t.cloud.blobs.blobs.clear();
    for (const id of Object.keys(desired.disks).filter((id) => id !== A)) {
      t.cloud.blobs.add(id);
    }

    const report = await detectDrift(t.ctx, vm);

    assert.deepStrictEqual(report.warnings, [
      `disk ${NAME_A}(${A}) has been unexpectedly detached`,
      `disk BLOB ${NAME_A}(${A}) has been unexpectedly deleted`,
    ]);
    assert.strictEqual(t.store.record.disks[A], undefined);
    assert.deepStrictEqual(t.cloud.mutations(), []);
  });

  it('should detach unexpected disks in one request', async () => {
    vm.dataDisks.push(
      { lun: 3, name: 'stray-1', vhdUri: C, caching: 'None', createOption: 'Attach', diskSizeGB: 10 },
      { lun: 4, name: 'stray-2', vhdUri: blobUrl('d'), caching: 'None', createOption: 'Attach', diskSizeGB: 10 }
    );

    const report = await detectDrift(t.ctx, vm);

    assert.deepStrictEqual(report.warnings, [
      `unexpected disk stray-1(${C}) is attached to this virtual machine`,
      `unexpected disk stray-2(${blobUrl('d')}) is attached to this virtual machine`,
    ]);
    assert.deepStrictEqual(report.detached, [C, blobUrl('d')]);
    assert.deepStrictEqual(t.cloud.mutations(), [`compute.createOrUpdateVM ${MACHINE_NAME}`]);
    assert.deepStrictEqual(
      t.cloud.compute.updates[0]?.dataDisks.map((d) => d.vhdUri),
      [A, B]
    );
  });

  it('should never delete a backing store', async () => {
    vm.dataDisks = [];

    await detectDrift(t.ctx, vm);

    assert.deepStrictEqual(t.cloud.callsOf('blobs.deleteBlob'), []);
    assert.ok(t.cloud.blobs.has(A));
    assert.ok(t.cloud.blobs.has(B));
  });
});
