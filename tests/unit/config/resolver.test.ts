/**
 * Unit tests for Configuration Resolver
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { join } from 'node:path';
import { loadYamlFile } from '../../../src/config/loader.js';
import { validateConfig } from '../../../src/config/validator.js';
import { resolveAzure, resolveConfig } from '../../../src/config/resolver.js';
import type { VmconvergeConfig } from '../../../src/config/types.js';
import { ConfigError } from '../../../src/core/errors.js';
import { generateMachineName } from '../../../src/core/naming.js';

const FIXTURES_DIR = join(import.meta.dirname, '../../fixtures');
const VALID_CONFIGS = join(FIXTURES_DIR, 'valid-configs');
const INVALID_CONFIGS = join(FIXTURES_DIR, 'invalid-configs');
const MINIMAL = join(VALID_CONFIGS, 'minimal.yaml');

const NO_ENV: NodeJS.ProcessEnv = {};

async function loadAndValidate(path: string): Promise<VmconvergeConfig> {
  const data = await loadYamlFile(path);
  const result = validateConfig(data);
  if (!result.valid) {
    throw new Error(`Validation failed: ${JSON.stringify(result.errors)}`);
  }
  return result.config;
}

/** Resolve a config expected to be invalid and return its issues */
async function resolveIssues(config: VmconvergeConfig, path: string): Promise<Array<[string, string]>> {
  try {
    await resolveConfig(config, path, NO_ENV);
  } catch (error) {
    assert.ok(error instanceof ConfigError);
    return (error.validationErrors ?? []).map((issue) => [issue.path, issue.message]);
  }
  assert.fail('expected resolveConfig to reject');
}

describe('resolveConfig', () => {
  describe('defaults application', () => {
    it('should resolve a machine entirely from defaults', async () => {
      const config = await loadAndValidate(MINIMAL);
      const resolved = await resolveConfig(config, MINIMAL, NO_ENV);
      const machineName = generateMachineName('demo', 'web', MINIMAL);
      const root = 'https://demostore.blob.core.windows.net/vhds/web-root.vhd';

      assert.deepStrictEqual(resolved.machines, [
        {
          name: 'web',
          machineName,
          resourceGroup: 'rg-demo',
          virtualNetwork: 'vnet-demo',
          storage: 'demostore',
          location: 'westeurope',
          size: 'Standard_A1',
          obtainIp: true,
          availabilitySet: null,
          rootDiskImageUrl: 'https://demostore.blob.core.windows.net/images/base.vhd',
          disks: {
            [root]: {
              id: root,
              device: '/dev/sda',
              name: `${machineName}-root`,
              size: null,
              cachingMode: 'None',
              isEphemeral: false,
              encrypt: false,
              passphrase: '',
            },
          },
        },
      ]);
    });

    it('should default the ssh settings', async () => {
      const config = await loadAndValidate(MINIMAL);
      const resolved = await resolveConfig(config, MINIMAL, NO_ENV);

      assert.strictEqual(resolved.ssh, true);
      assert.strictEqual(resolved.sshConnectTimeout, 10);
    });
  });

  describe('per-machine overrides', () => {
    it('should let machines override defaults', async () => {
      const path = join(VALID_CONFIGS, 'two-vms.yaml');
      const resolved = await resolveConfig(await loadAndValidate(path), path, NO_ENV);
      const [web, db] = resolved.machines;

      assert.strictEqual(web?.machineName, 'shop-web');
      assert.strictEqual(web?.availabilitySet, 'shop-frontend');
      assert.strictEqual(web?.size, 'Standard_A1');
      assert.strictEqual(db?.size, 'Standard_D2');
      assert.strictEqual(db?.obtainIp, false);
      assert.strictEqual(resolved.ssh, false);
      assert.strictEqual(resolved.sshConnectTimeout, 30);
    });

    it('should place disks without media_link under the ephemeral disk URL', async () => {
      const path = join(VALID_CONFIGS, 'two-vms.yaml');
      const resolved = await resolveConfig(await loadAndValidate(path), path, NO_ENV);
      const data = 'https://shopstore.blob.core.windows.net/ephemeral/shop-db-data.vhd';

      assert.deepStrictEqual(resolved.machines[1]?.disks[data], {
        id: data,
        device: '/dev/disk/by-lun/0',
        name: 'shop-db-data',
        size: 10,
        cachingMode: 'None',
        isEphemeral: true,
        encrypt: true,
        passphrase: '',
      });
    });
  });

  describe('azure account', () => {
    it('should prefer the file over the environment', async () => {
      const path = join(VALID_CONFIGS, 'two-vms.yaml');
      const config = await loadAndValidate(path);

      assert.deepStrictEqual(resolveAzure(config, { AZURE_SUBSCRIPTION_ID: 'env-sub', AZURE_CLIENT_ID: 'env-client' }), {
        subscriptionId: '00000000-0000-0000-0000-000000000001',
        tenantId: 'test-tenant',
        clientId: 'env-client',
      });
    });

    it('should leave unset values null', async () => {
      const resolved = await resolveConfig(await loadAndValidate(MINIMAL), MINIMAL, NO_ENV);

      assert.deepStrictEqual(resolved.azure, { subscriptionId: null, tenantId: null, clientId: null });
    });
  });

  describe('semantic checks', () => {
    it('should report every disk problem with its path', async () => {
      const path = join(INVALID_CONFIGS, 'bad-disks.yaml');
      const issues = await resolveIssues(await loadAndValidate(path), path);

      assert.deepStrictEqual(issues, [
        [
          '/machines/0/block_device_mapping/~1dev~1sda',
          'expected storage to be demostore in BLOB URL https://otherstore.blob.core.windows.net/vhds/web-root.vhd',
        ],
        ['/machines/0', 'demo-web needs a root disk'],
        [
          '/machines/1/block_device_mapping/~1dev~1sdb',
          'block_device_mapping only supports /dev/sda and /dev/disk/by-lun/X block devices, where X is in 0..31 range',
        ],
        ['/machines/1', 'demo-db needs a root disk'],
      ]);
    });

    it('should require the machine attributes somewhere', async () => {
      const config: VmconvergeConfig = {
        deployment: { name: 'demo' },
        defaults: { size: 'Standard_A1', location: 'westeurope', resource_group: 'rg-demo' },
        machines: [{ name: 'web', block_device_mapping: { '/dev/sda': { name: 'root' } } }],
      };

      assert.deepStrictEqual(await resolveIssues(config, MINIMAL), [
        ['/machines/0', 'virtual_network must be set on the machine or in defaults'],
        ['/machines/0', 'storage must be set on the machine or in defaults'],
        ['/machines/0', 'root_disk_image_url must be set on the machine or in defaults'],
      ]);
    });

    it('should require media_link when there is no ephemeral disk URL', async () => {
      const config = await loadAndValidate(MINIMAL);
      config.machines = [{ name: 'web', machine_name: 'demo-web', block_device_mapping: { '/dev/sda': { name: 'root' } } }];

      assert.deepStrictEqual(await resolveIssues(config, MINIMAL), [
        ['/machines/0/block_device_mapping/~1dev~1sda', 'ephemeral disk root must specify media_link'],
        ['/machines/0', 'demo-web needs a root disk'],
      ]);
    });

    it('should reject plain http backing stores', async () => {
      const config = await loadAndValidate(MINIMAL);
      const url = 'http://demostore.blob.core.windows.net/vhds/web-root.vhd';
      config.machines = [
        { name: 'web', machine_name: 'demo-web', block_device_mapping: { '/dev/sda': { name: 'root', media_link: url } } },
      ];

      const issues = await resolveIssues(config, MINIMAL);

      assert.deepStrictEqual(issues[0], ['/machines/0/block_device_mapping/~1dev~1sda', `please use https in BLOB URL ${url}`]);
    });

    it('should reject duplicate machine names', async () => {
      const config = await loadAndValidate(MINIMAL);
      const [web] = config.machines;
      assert.ok(web);
      config.machines = [web, { ...web, machine_name: 'demo-web-2' }];

      const issues = await resolveIssues(config, MINIMAL);

      assert.deepStrictEqual(issues, [['/machines/1/name', "duplicate machine name 'web'"]]);
    });
  });

  describe('config path', () => {
    it('should carry the absolute path of the file', async () => {
      const resolved = await resolveConfig(await loadAndValidate(MINIMAL), MINIMAL, NO_ENV);

      assert.strictEqual(resolved.configPath, MINIMAL);
    });
  });
});
