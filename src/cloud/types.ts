/**
 * Cloud API Types
 *
 * Provider-neutral view of the compute, network and blob services the
 * core drives. Lookups return null (or false for deletes) when the
 * resource does not exist; every other failure is thrown.
 */

import type { BlobRef } from '../core/blob-url.js';
import type { CachingMode } from '../core/types.js';

/**
 * How a disk is brought into a VM request
 */
export type DiskCreateOption = 'Attach' | 'Empty' | 'FromImage';

/**
 * Provisioning state reported for a VM resource
 */
export type ProvisioningState =
  | 'Creating'
  | 'Updating'
  | 'Succeeded'
  | 'Failed'
  | 'Deleting'
  | 'Unknown';

/**
 * Data disk entry of a VM storage profile
 */
export interface CloudDataDisk {
  lun: number;
  name: string;
  /** Backing-store URL */
  vhdUri: string;
  caching: CachingMode;
  createOption: DiskCreateOption;
  diskSizeGB: number | null;
}

/**
 * OS disk entry of a VM storage profile
 */
export interface CloudOsDisk {
  name: string;
  vhdUri: string;
  caching: CachingMode;
  createOption: DiskCreateOption;
  /** Image the disk is cloned from when createOption is FromImage */
  sourceImageUri: string | null;
}

/**
 * Guest OS settings for a VM created from an image
 */
export interface CloudOsProfile {
  computerName: string;
  adminUsername: string;
  adminPassword: string;
}

/**
 * Whole-object VM payload, as read and as written
 */
export interface CloudVM {
  name: string;
  location: string;
  size: string;
  /** Availability set name */
  availabilitySet: string | null;
  provisioningState: ProvisioningState;
  /** Network interface resource id */
  networkInterfaceId: string | null;
  /** Only sent when the OS disk is created from an image */
  osProfile: CloudOsProfile | null;
  osDisk: CloudOsDisk;
  dataDisks: CloudDataDisk[];
}

/**
 * Handle of a long-running VM operation
 */
export interface OperationHandle {
  readonly id: string;
}

/**
 * Status of a long-running operation
 */
export type OperationStatus =
  | { status: 'inProgress' }
  | { status: 'succeeded' }
  | { status: 'failed'; error: unknown };

export interface ComputeApi {
  getVM(resourceGroup: string, name: string): Promise<CloudVM | null>;
  /** Create or update and wait for the request to complete */
  createOrUpdateVM(resourceGroup: string, vm: CloudVM): Promise<void>;
  /** Submit a create request without waiting for it */
  beginCreateVM(resourceGroup: string, vm: CloudVM): Promise<OperationHandle>;
  pollOperation(handle: OperationHandle): Promise<OperationStatus>;
  /** False when the VM did not exist */
  deleteVM(resourceGroup: string, name: string): Promise<boolean>;
  startVM(resourceGroup: string, name: string): Promise<void>;
  powerOffVM(resourceGroup: string, name: string): Promise<void>;
  restartVM(resourceGroup: string, name: string): Promise<void>;
}

export interface PublicIp {
  id: string;
  /** Null until the address has been assigned */
  ipAddress: string | null;
}

export interface PublicIpParams {
  location: string;
  allocationMethod: 'Dynamic' | 'Static';
  idleTimeoutInMinutes: number;
}

export interface NetworkInterfaceParams {
  location: string;
  subnetId: string;
  publicIpId: string | null;
}

export interface NetworkApi {
  getPublicIp(resourceGroup: string, name: string): Promise<PublicIp | null>;
  createOrUpdatePublicIp(resourceGroup: string, name: string, params: PublicIpParams): Promise<void>;
  deletePublicIp(resourceGroup: string, name: string): Promise<boolean>;
  getNetworkInterface(resourceGroup: string, name: string): Promise<{ id: string } | null>;
  createOrUpdateNetworkInterface(
    resourceGroup: string,
    name: string,
    params: NetworkInterfaceParams
  ): Promise<void>;
  deleteNetworkInterface(resourceGroup: string, name: string): Promise<boolean>;
  getSubnet(resourceGroup: string, virtualNetwork: string, subnet: string): Promise<{ id: string } | null>;
}

export interface BlobProperties {
  contentLength: number | null;
  metadata: Record<string, string>;
}

export interface BlobApi {
  getProperties(blob: BlobRef): Promise<BlobProperties | null>;
  /** False when the blob (or snapshot) did not exist */
  deleteBlob(blob: BlobRef): Promise<boolean>;
  /** Returns the snapshot id */
  snapshotBlob(blob: BlobRef, metadata: Record<string, string>): Promise<string>;
  /** Overwrite `target` with the contents at `sourceUrl` and wait for the copy */
  copyBlob(target: BlobRef, sourceUrl: string): Promise<void>;
}

/**
 * All services a machine reconciliation needs
 */
export interface CloudApi {
  compute: ComputeApi;
  network: NetworkApi;
  blobs: BlobApi;
}
