/**
 * Configuration Types for vmconverge
 *
 * These types represent the YAML deployment file and the resolved
 * configuration with defaults applied.
 */

import type { CachingMode, DesiredMachine } from '../core/types.js';

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Root configuration object parsed from the deployment file
 */
export interface VmconvergeConfig {
  deployment: DeploymentConfig;
  azure?: AzureConfig;
  defaults?: DefaultsConfig;
  machines: MachineConfig[];
  settings?: SettingsConfig;
}

export interface DeploymentConfig {
  /** Deployment name, used in resource naming. 1-32 chars, alphanumeric + hyphen */
  name: string;
}

/**
 * Azure account; the client secret only ever comes from the environment
 */
export interface AzureConfig {
  subscription_id?: string;
  tenant_id?: string;
  client_id?: string;
}

/**
 * Machine attributes that may be shared through `defaults`
 */
export interface MachineDefaults {
  size?: string;
  location?: string;
  resource_group?: string;
  virtual_network?: string;
  /** Storage account holding the disk backing stores */
  storage?: string;
  root_disk_image_url?: string;
  /** Prefix for backing stores of disks declared without media_link */
  base_ephemeral_disk_url?: string;
  obtain_ip?: boolean;
}

export type DefaultsConfig = MachineDefaults;

/**
 * Declared block device
 */
export interface BlockDeviceConfig {
  /** Disk name; the machine's resource name is prepended */
  name: string;
  /** Backing-store URL */
  media_link?: string;
  /** Size in GB */
  size?: number;
  is_ephemeral?: boolean;
  host_caching?: CachingMode;
  encrypt?: boolean;
  passphrase?: string;
}

/**
 * Individual machine definition
 */
export interface MachineConfig extends MachineDefaults {
  /** Machine name, unique within the deployment */
  name: string;
  /** Azure resource name. Default: {deployment}-{name}-{hash8} */
  machine_name?: string;
  availability_set?: string;
  /** Device path -> disk */
  block_device_mapping: Record<string, BlockDeviceConfig>;
}

/**
 * Optional global settings
 */
export interface SettingsConfig {
  /** Run best-effort commands on machines over ssh. Default: true */
  ssh?: boolean;
  /** Seconds before an ssh connection attempt is abandoned. Default: 10 */
  ssh_connect_timeout?: number;
}

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * Machine declaration with all defaults applied
 */
export interface ResolvedMachine extends DesiredMachine {
  /** Machine name from config */
  name: string;
}

export interface ResolvedAzure {
  subscriptionId: string | null;
  tenantId: string | null;
  clientId: string | null;
}

/**
 * Fully resolved configuration ready for execution
 */
export interface ResolvedConfig {
  deployment: {
    name: string;
  };
  azure: ResolvedAzure;
  machines: ResolvedMachine[];
  ssh: boolean;
  sshConnectTimeout: number;
  /** Absolute path to the YAML config file */
  configPath: string;
}
