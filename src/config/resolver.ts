/**
 * Configuration Resolver
 *
 * Applies defaults, merges per-machine overrides, and checks what the
 * schema cannot: backing-store URLs, device paths and the root disk.
 */

import { dirname, resolve } from 'node:path';

import { parseBlobUrl } from '../core/blob-url.js';
import { ConfigError, type ConfigIssue } from '../core/errors.js';
import { diskResourceName, generateMachineName } from '../core/naming.js';
import { isRootDevice, isValidDevice } from '../core/slots.js';
import type { DiskSpec } from '../core/types.js';
import type {
  BlockDeviceConfig,
  MachineConfig,
  ResolvedAzure,
  ResolvedConfig,
  ResolvedMachine,
  VmconvergeConfig,
} from './types.js';

/**
 * Default values when not specified in config
 */
const DEFAULTS = {
  obtainIp: true,
  hostCaching: 'None' as const,
  isEphemeral: false,
  encrypt: false,
  passphrase: '',
  ssh: true,
  sshConnectTimeout: 10,
};

const REQUIRED_FIELDS = [
  'size',
  'location',
  'resource_group',
  'virtual_network',
  'storage',
  'root_disk_image_url',
] as const;

/**
 * Resolve a declared block device into a disk keyed by its backing-store URL.
 *
 * @returns The disk, or null after recording why it is invalid
 */
function resolveDisk(
  device: string,
  disk: BlockDeviceConfig,
  machineName: string,
  storage: string,
  baseEphemeralDiskUrl: string | undefined,
  path: string,
  issues: ConfigIssue[]
): DiskSpec | null {
  let mediaLink = disk.media_link;
  if (!mediaLink && baseEphemeralDiskUrl) {
    mediaLink = `${baseEphemeralDiskUrl}${machineName}-${disk.name}.vhd`;
  }
  if (!mediaLink) {
    issues.push({ path, message: `ephemeral disk ${disk.name} must specify media_link` });
    return null;
  }
  const blob = parseBlobUrl(mediaLink);
  if (!blob) {
    issues.push({ path, message: `malformed BLOB URL ${mediaLink}` });
    return null;
  }
  if (mediaLink.startsWith('http:')) {
    issues.push({ path, message: `please use https in BLOB URL ${mediaLink}` });
    return null;
  }
  if (blob.storage !== storage) {
    issues.push({ path, message: `expected storage to be ${storage} in BLOB URL ${mediaLink}` });
    return null;
  }
  return {
    id: mediaLink,
    device,
    name: diskResourceName(machineName, disk.name),
    size: disk.size ?? null,
    cachingMode: disk.host_caching ?? DEFAULTS.hostCaching,
    isEphemeral: disk.is_ephemeral ?? DEFAULTS.isEphemeral,
    encrypt: disk.encrypt ?? DEFAULTS.encrypt,
    passphrase: disk.passphrase ?? DEFAULTS.passphrase,
  };
}

/**
 * Resolve a machine configuration by applying defaults.
 *
 * @param index - Position in the machines list, for issue paths
 * @returns Resolved machine, or null after recording its issues
 */
function resolveMachine(
  machine: MachineConfig,
  index: number,
  config: VmconvergeConfig,
  configPath: string,
  issues: ConfigIssue[]
): ResolvedMachine | null {
  const defaults = config.defaults ?? {};
  const path = `/machines/${index}`;
  const before = issues.length;

  const fields: Partial<Record<(typeof REQUIRED_FIELDS)[number], string>> = {};
  for (const field of REQUIRED_FIELDS) {
    const value = machine[field] ?? defaults[field];
    if (value === undefined) {
      issues.push({ path, message: `${field} must be set on the machine or in defaults` });
    } else {
      fields[field] = value;
    }
  }
  const { size, location, resource_group, virtual_network, storage, root_disk_image_url } = fields;
  if (
    size === undefined ||
    location === undefined ||
    resource_group === undefined ||
    virtual_network === undefined ||
    storage === undefined ||
    root_disk_image_url === undefined
  ) {
    return null;
  }

  const machineName = machine.machine_name ?? generateMachineName(config.deployment.name, machine.name, configPath);
  const baseEphemeralDiskUrl = machine.base_ephemeral_disk_url ?? defaults.base_ephemeral_disk_url;

  const disks: Record<string, DiskSpec> = {};
  let duplicates = false;
  for (const [device, declared] of Object.entries(machine.block_device_mapping)) {
    const diskPath = `${path}/block_device_mapping/${device.replace(/~/g, '~0').replace(/\//g, '~1')}`;
    const disk = resolveDisk(device, declared, machineName, storage, baseEphemeralDiskUrl, diskPath, issues);
    if (!disk) {
      continue;
    }
    if (disks[disk.id] !== undefined) {
      duplicates = true;
    }
    disks[disk.id] = disk;
    if (!isValidDevice(device)) {
      issues.push({
        path: diskPath,
        message:
          'block_device_mapping only supports /dev/sda and /dev/disk/by-lun/X block devices, where X is in 0..31 range',
      });
    }
  }
  if (duplicates) {
    issues.push({ path, message: `${machineName} has duplicate disk BLOB URLs` });
  }
  if (!Object.values(disks).some((disk) => isRootDevice(disk.device))) {
    issues.push({ path, message: `${machineName} needs a root disk` });
  }

  if (issues.length > before) {
    return null;
  }
  return {
    name: machine.name,
    machineName,
    resourceGroup: resource_group,
    virtualNetwork: virtual_network,
    storage,
    location,
    size,
    obtainIp: machine.obtain_ip ?? defaults.obtain_ip ?? DEFAULTS.obtainIp,
    availabilitySet: machine.availability_set ?? null,
    rootDiskImageUrl: root_disk_image_url,
    disks,
  };
}

/**
 * Azure account settings, falling back to the environment.
 */
export function resolveAzure(config: VmconvergeConfig, env: NodeJS.ProcessEnv = process.env): ResolvedAzure {
  return {
    subscriptionId: config.azure?.subscription_id ?? env['AZURE_SUBSCRIPTION_ID'] ?? null,
    tenantId: config.azure?.tenant_id ?? env['AZURE_TENANT_ID'] ?? null,
    clientId: config.azure?.client_id ?? env['AZURE_CLIENT_ID'] ?? null,
  };
}

/**
 * Resolve a complete configuration with all defaults applied.
 *
 * @param config - Validated configuration from YAML
 * @param configPath - Path to the configuration file
 * @throws ConfigError listing every semantic problem found
 */
export async function resolveConfig(
  config: VmconvergeConfig,
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<ResolvedConfig> {
  const absoluteConfigPath = resolve(configPath);
  const issues: ConfigIssue[] = [];

  const seen = new Set<string>();
  config.machines.forEach((machine, index) => {
    if (seen.has(machine.name)) {
      issues.push({ path: `/machines/${index}/name`, message: `duplicate machine name '${machine.name}'` });
    }
    seen.add(machine.name);
  });

  const machines: ResolvedMachine[] = [];
  config.machines.forEach((machine, index) => {
    const resolved = resolveMachine(machine, index, config, absoluteConfigPath, issues);
    if (resolved) {
      machines.push(resolved);
    }
  });

  if (issues.length > 0) {
    throw new ConfigError(
      `Configuration is invalid: ${issues.length} problem(s) in ${absoluteConfigPath}`,
      'CONFIG_VALIDATION_FAILED',
      'Fix the listed problems and run validate again.',
      dirname(absoluteConfigPath),
      issues
    );
  }

  return {
    deployment: { name: config.deployment.name },
    azure: resolveAzure(config, env),
    machines,
    ssh: config.settings?.ssh ?? DEFAULTS.ssh,
    sshConnectTimeout: config.settings?.ssh_connect_timeout ?? DEFAULTS.sshConnectTimeout,
    configPath: absoluteConfigPath,
  };
}
