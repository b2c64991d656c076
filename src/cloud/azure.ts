/**
 * Azure Cloud Adapter
 *
 * Implements the compute, network and blob interfaces with the Azure SDK.
 * 404 responses become null (lookups) or false (deletes); every other
 * failure is rethrown as a RemoteError.
 */

import { ComputeManagementClient } from '@azure/arm-compute';
import type { DataDisk, VirtualMachine } from '@azure/arm-compute';
import { NetworkManagementClient } from '@azure/arm-network';
import { ClientSecretCredential, DefaultAzureCredential } from '@azure/identity';
import type { TokenCredential } from '@azure/identity';
import { BlobServiceClient, StorageSharedKeyCredential } from '@azure/storage-blob';
import type { BlobClient } from '@azure/storage-blob';

import type { BlobRef } from '../core/blob-url.js';
import { ConfigError, InvariantError, RemoteError } from '../core/errors.js';
import type { CachingMode } from '../core/types.js';
import type {
  BlobApi,
  BlobProperties,
  CloudApi,
  CloudDataDisk,
  CloudVM,
  ComputeApi,
  DiskCreateOption,
  NetworkApi,
  NetworkInterfaceParams,
  OperationHandle,
  OperationStatus,
  ProvisioningState,
  PublicIp,
  PublicIpParams,
} from './types.js';
import { describeCall, echoCall } from './verbose.js';

/**
 * Account and credentials for the adapter
 */
export interface AzureCloudOptions {
  subscriptionId: string | null;
  tenantId: string | null;
  clientId: string | null;
  /** Service principal secret; DefaultAzureCredential is used without one */
  clientSecret?: string;
  /** Shared key for blob access; the token credential is used without one */
  storageKey?: string;
  /** Echo every API call to stderr */
  verbose?: boolean;
}

type CreatePoller = Awaited<ReturnType<ComputeManagementClient['virtualMachines']['beginCreateOrUpdate']>>;

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'statusCode' in error && error.statusCode === 404;
}

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

function toCaching(value: string | undefined): CachingMode {
  return value === 'ReadOnly' || value === 'ReadWrite' ? value : 'None';
}

function toCreateOption(value: string | undefined): DiskCreateOption {
  return value === 'FromImage' || value === 'Empty' ? value : 'Attach';
}

const PROVISIONING_STATES: readonly ProvisioningState[] = ['Creating', 'Updating', 'Succeeded', 'Failed', 'Deleting'];

function toProvisioningState(value: string | undefined): ProvisioningState {
  return PROVISIONING_STATES.find((state) => state === value) ?? 'Unknown';
}

/**
 * Last segment of an Azure resource id.
 */
export function resourceNameFromId(id: string | undefined): string | null {
  if (!id) {
    return null;
  }
  const segments = id.split('/').filter(Boolean);
  return segments[segments.length - 1] ?? null;
}

/**
 * Provider-neutral view of an SDK virtual machine.
 */
export function fromSdkVM(vm: VirtualMachine, fallbackName: string): CloudVM {
  const osDisk = vm.storageProfile?.osDisk;
  return {
    name: vm.name ?? fallbackName,
    location: vm.location,
    size: vm.hardwareProfile?.vmSize ?? '',
    availabilitySet: resourceNameFromId(vm.availabilitySet?.id),
    provisioningState: toProvisioningState(vm.provisioningState),
    networkInterfaceId: vm.networkProfile?.networkInterfaces?.[0]?.id ?? null,
    osProfile: vm.osProfile
      ? {
          computerName: vm.osProfile.computerName ?? '',
          adminUsername: vm.osProfile.adminUsername ?? '',
          adminPassword: '',
        }
      : null,
    osDisk: {
      name: osDisk?.name ?? '',
      vhdUri: osDisk?.vhd?.uri ?? '',
      caching: toCaching(osDisk?.caching),
      createOption: toCreateOption(osDisk?.createOption),
      sourceImageUri: osDisk?.image?.uri ?? null,
    },
    dataDisks: (vm.storageProfile?.dataDisks ?? []).map(
      (disk): CloudDataDisk => ({
        lun: disk.lun,
        name: disk.name ?? '',
        vhdUri: disk.vhd?.uri ?? '',
        caching: toCaching(disk.caching),
        createOption: toCreateOption(disk.createOption),
        diskSizeGB: disk.diskSizeGB ?? null,
      })
    ),
  };
}

/**
 * SDK payload for a VM, laid over the live resource when there is one so
 * settings this tool does not manage are sent back unchanged.
 */
export function toSdkVM(vm: CloudVM, availabilitySetId: string | null, base?: VirtualMachine): VirtualMachine {
  const dataDisks: DataDisk[] = vm.dataDisks.map((disk) => ({
    lun: disk.lun,
    name: disk.name,
    vhd: { uri: disk.vhdUri },
    caching: disk.caching,
    createOption: disk.createOption,
    diskSizeGB: disk.diskSizeGB ?? undefined,
  }));

  return {
    ...base,
    location: vm.location,
    hardwareProfile: { ...base?.hardwareProfile, vmSize: vm.size },
    availabilitySet: availabilitySetId ? { id: availabilitySetId } : undefined,
    networkProfile: vm.networkInterfaceId
      ? { networkInterfaces: [{ id: vm.networkInterfaceId, primary: true }] }
      : base?.networkProfile,
    osProfile: vm.osProfile
      ? {
          computerName: vm.osProfile.computerName,
          adminUsername: vm.osProfile.adminUsername,
          adminPassword: vm.osProfile.adminPassword,
        }
      : base?.osProfile,
    storageProfile: {
      ...base?.storageProfile,
      osDisk: {
        ...base?.storageProfile?.osDisk,
        name: vm.osDisk.name,
        vhd: { uri: vm.osDisk.vhdUri },
        caching: vm.osDisk.caching,
        createOption: vm.osDisk.createOption,
        image: vm.osDisk.sourceImageUri ? { uri: vm.osDisk.sourceImageUri } : undefined,
        osType: 'Linux',
      },
      dataDisks,
    },
  };
}

/**
 * Shared call wrapper: verbose echo, 404 passthrough, RemoteError otherwise.
 */
export class AzureCaller {
  constructor(private readonly verbose: boolean) {}

  async call<T>(description: string, fn: () => Promise<T>): Promise<T> {
    if (this.verbose) {
      echoCall(description);
    }
    try {
      return await fn();
    } catch (error) {
      if (isNotFound(error) || error instanceof RemoteError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new RemoteError(`${description} failed: ${message}`, statusCodeOf(error), error);
    }
  }

  /** Like call(), with a 404 turned into null */
  async lookup<T>(description: string, fn: () => Promise<T>): Promise<T | null> {
    try {
      return await this.call(description, fn);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }
}

export class AzureCompute implements ComputeApi {
  private readonly pollers = new Map<string, CreatePoller>();
  private nextHandle = 0;

  constructor(
    private readonly client: ComputeManagementClient,
    private readonly subscriptionId: string,
    private readonly caller: AzureCaller
  ) {}

  private availabilitySetId(resourceGroup: string, name: string | null): string | null {
    return name === null
      ? null
      : `/subscriptions/${this.subscriptionId}/resourceGroups/${resourceGroup}/providers/Microsoft.Compute/availabilitySets/${name}`;
  }

  private async getRaw(resourceGroup: string, name: string): Promise<VirtualMachine | null> {
    return this.caller.lookup(describeCall('vm get', resourceGroup, name), () =>
      this.client.virtualMachines.get(resourceGroup, name)
    );
  }

  async getVM(resourceGroup: string, name: string): Promise<CloudVM | null> {
    const vm = await this.getRaw(resourceGroup, name);
    return vm ? fromSdkVM(vm, name) : null;
  }

  async createOrUpdateVM(resourceGroup: string, vm: CloudVM): Promise<void> {
    const base = (await this.getRaw(resourceGroup, vm.name)) ?? undefined;
    const payload = toSdkVM(vm, this.availabilitySetId(resourceGroup, vm.availabilitySet), base);
    await this.caller.call(describeCall('vm create-or-update', resourceGroup, vm.name), () =>
      this.client.virtualMachines.beginCreateOrUpdateAndWait(resourceGroup, vm.name, payload)
    );
  }

  async beginCreateVM(resourceGroup: string, vm: CloudVM): Promise<OperationHandle> {
    const payload = toSdkVM(vm, this.availabilitySetId(resourceGroup, vm.availabilitySet));
    const poller = await this.caller.call(describeCall('vm create', resourceGroup, vm.name), () =>
      this.client.virtualMachines.beginCreateOrUpdate(resourceGroup, vm.name, payload)
    );
    const handle: OperationHandle = { id: `${resourceGroup}/${vm.name}#${++this.nextHandle}` };
    this.pollers.set(handle.id, poller);
    return handle;
  }

  async pollOperation(handle: OperationHandle): Promise<OperationStatus> {
    const poller = this.pollers.get(handle.id);
    if (!poller) {
      throw new InvariantError(`unknown operation ${handle.id}`);
    }
    if (!poller.isDone()) {
      try {
        await poller.poll();
      } catch (error) {
        this.pollers.delete(handle.id);
        return { status: 'failed', error };
      }
    }
    if (!poller.isDone()) {
      return { status: 'inProgress' };
    }
    this.pollers.delete(handle.id);
    const { error } = poller.getOperationState();
    return error ? { status: 'failed', error } : { status: 'succeeded' };
  }

  async deleteVM(resourceGroup: string, name: string): Promise<boolean> {
    const deleted = await this.caller.lookup(describeCall('vm delete', resourceGroup, name), async () => {
      await this.client.virtualMachines.beginDeleteAndWait(resourceGroup, name);
      return true;
    });
    return deleted ?? false;
  }

  async startVM(resourceGroup: string, name: string): Promise<void> {
    await this.caller.call(describeCall('vm start', resourceGroup, name), () =>
      this.client.virtualMachines.beginStartAndWait(resourceGroup, name)
    );
  }

  async powerOffVM(resourceGroup: string, name: string): Promise<void> {
    await this.caller.call(describeCall('vm power-off', resourceGroup, name), () =>
      this.client.virtualMachines.beginPowerOffAndWait(resourceGroup, name)
    );
  }

  async restartVM(resourceGroup: string, name: string): Promise<void> {
    await this.caller.call(describeCall('vm restart', resourceGroup, name), () =>
      this.client.virtualMachines.beginRestartAndWait(resourceGroup, name)
    );
  }
}

export class AzureNetwork implements NetworkApi {
  constructor(
    private readonly client: NetworkManagementClient,
    private readonly caller: AzureCaller
  ) {}

  async getPublicIp(resourceGroup: string, name: string): Promise<PublicIp | null> {
    const ip = await this.caller.lookup(describeCall('public-ip get', resourceGroup, name), () =>
      this.client.publicIPAddresses.get(resourceGroup, name)
    );
    if (!ip) {
      return null;
    }
    if (!ip.id) {
      throw new RemoteError(`public IP '${name}' has no resource id`);
    }
    return { id: ip.id, ipAddress: ip.ipAddress ?? null };
  }

  async createOrUpdatePublicIp(resourceGroup: string, name: string, params: PublicIpParams): Promise<void> {
    await this.caller.call(describeCall('public-ip create-or-update', resourceGroup, name), () =>
      this.client.publicIPAddresses.beginCreateOrUpdateAndWait(resourceGroup, name, {
        location: params.location,
        publicIPAllocationMethod: params.allocationMethod,
        idleTimeoutInMinutes: params.idleTimeoutInMinutes,
      })
    );
  }

  async deletePublicIp(resourceGroup: string, name: string): Promise<boolean> {
    if (!(await this.getPublicIp(resourceGroup, name))) {
      return false;
    }
    await this.caller.call(describeCall('public-ip delete', resourceGroup, name), () =>
      this.client.publicIPAddresses.beginDeleteAndWait(resourceGroup, name)
    );
    return true;
  }

  async getNetworkInterface(resourceGroup: string, name: string): Promise<{ id: string } | null> {
    const nic = await this.caller.lookup(describeCall('nic get', resourceGroup, name), () =>
      this.client.networkInterfaces.get(resourceGroup, name)
    );
    return nic?.id ? { id: nic.id } : null;
  }

  async createOrUpdateNetworkInterface(
    resourceGroup: string,
    name: string,
    params: NetworkInterfaceParams
  ): Promise<void> {
    await this.caller.call(describeCall('nic create-or-update', resourceGroup, name), () =>
      this.client.networkInterfaces.beginCreateOrUpdateAndWait(resourceGroup, name, {
        location: params.location,
        ipConfigurations: [
          {
            name: 'default',
            privateIPAllocationMethod: 'Dynamic',
            subnet: { id: params.subnetId },
            publicIPAddress: params.publicIpId ? { id: params.publicIpId } : undefined,
          },
        ],
      })
    );
  }

  async deleteNetworkInterface(resourceGroup: string, name: string): Promise<boolean> {
    if (!(await this.getNetworkInterface(resourceGroup, name))) {
      return false;
    }
    await this.caller.call(describeCall('nic delete', resourceGroup, name), () =>
      this.client.networkInterfaces.beginDeleteAndWait(resourceGroup, name)
    );
    return true;
  }

  async getSubnet(resourceGroup: string, virtualNetwork: string, subnet: string): Promise<{ id: string } | null> {
    const found = await this.caller.lookup(describeCall('subnet get', resourceGroup, virtualNetwork, subnet), () =>
      this.client.subnets.get(resourceGroup, virtualNetwork, subnet)
    );
    return found?.id ? { id: found.id } : null;
  }
}

export class AzureBlobs implements BlobApi {
  private readonly services = new Map<string, BlobServiceClient>();

  constructor(
    private readonly credential: TokenCredential,
    private readonly caller: AzureCaller,
    private readonly storageKey?: string
  ) {}

  private blobClient(ref: BlobRef): BlobClient {
    let service = this.services.get(ref.storage);
    if (!service) {
      const url = `https://${ref.storage}.blob.core.windows.net`;
      service = this.storageKey
        ? new BlobServiceClient(url, new StorageSharedKeyCredential(ref.storage, this.storageKey))
        : new BlobServiceClient(url, this.credential);
      this.services.set(ref.storage, service);
    }
    const blob = service.getContainerClient(ref.container).getBlobClient(ref.name);
    return ref.snapshot ? blob.withSnapshot(ref.snapshot) : blob;
  }

  private describe(operation: string, ref: BlobRef): string {
    return describeCall(operation, `${ref.storage}/${ref.container}/${ref.name}`, ref.snapshot);
  }

  async getProperties(ref: BlobRef): Promise<BlobProperties | null> {
    const props = await this.caller.lookup(this.describe('blob properties', ref), () =>
      this.blobClient(ref).getProperties()
    );
    return props ? { contentLength: props.contentLength ?? null, metadata: props.metadata ?? {} } : null;
  }

  async deleteBlob(ref: BlobRef): Promise<boolean> {
    const result = await this.caller.call(this.describe('blob delete', ref), () =>
      this.blobClient(ref).deleteIfExists()
    );
    return result.succeeded;
  }

  async snapshotBlob(ref: BlobRef, metadata: Record<string, string>): Promise<string> {
    const result = await this.caller.call(this.describe('blob snapshot', ref), () =>
      this.blobClient(ref).createSnapshot({ metadata })
    );
    if (!result.snapshot) {
      throw new RemoteError(`snapshot of ${ref.container}/${ref.name} returned no snapshot id`);
    }
    return result.snapshot;
  }

  async copyBlob(target: BlobRef, sourceUrl: string): Promise<void> {
    await this.caller.call(this.describe('blob copy', target), async () => {
      const poller = await this.blobClient(target).beginCopyFromURL(sourceUrl);
      await poller.pollUntilDone();
    });
  }
}

/**
 * Credential for the configured account.
 */
export function createCredential(options: AzureCloudOptions): TokenCredential {
  if (options.clientSecret && options.tenantId && options.clientId) {
    return new ClientSecretCredential(options.tenantId, options.clientId, options.clientSecret);
  }
  return new DefaultAzureCredential();
}

/**
 * Cloud API backed by Azure.
 *
 * @throws ConfigError if no subscription is configured
 */
export function createAzureCloud(options: AzureCloudOptions): CloudApi {
  if (!options.subscriptionId) {
    throw new ConfigError(
      'No Azure subscription configured',
      'CONFIG_VALIDATION_FAILED',
      'Set azure.subscription_id in the deployment file or the AZURE_SUBSCRIPTION_ID environment variable.'
    );
  }
  const credential = createCredential(options);
  const caller = new AzureCaller(options.verbose ?? false);
  return {
    compute: new AzureCompute(
      new ComputeManagementClient(credential, options.subscriptionId),
      options.subscriptionId,
      caller
    ),
    network: new AzureNetwork(new NetworkManagementClient(credential, options.subscriptionId), caller),
    blobs: new AzureBlobs(credential, caller, options.storageKey),
  };
}
