/**
 * Machine contexts over an in-memory record store and the fake cloud.
 */

import type { CloudVM } from '../../src/cloud/types.js';
import type { MachineContext } from '../../src/core/context.js';
import { attachedRecord } from '../../src/core/disks.js';
import { deviceToSlot } from '../../src/core/slots.js';
import type { PollOptions } from '../../src/core/poll.js';
import type { DesiredMachine, DiskSpec, MachineRecord, RecordStore } from '../../src/core/types.js';
import { createEmptyRecord } from '../../src/core/types.js';
import { Logger } from '../../src/lib/logger.js';
import type { MachineShell } from '../../src/remote/shell.js';
import { FakeCloud } from './fake-cloud.js';

export const STORAGE = 'teststore';
export const RESOURCE_GROUP = 'rg-test';
export const VNET = 'vnet-test';
export const MACHINE_NAME = 'demo-web-0a1b2c3d';
export const IMAGE_URL = 'https://teststore.blob.core.windows.net/images/base.vhd';

export function blobUrl(name: string): string {
  return `https://${STORAGE}.blob.core.windows.net/vhds/${name}.vhd`;
}

export const ROOT_URL = blobUrl('root');

export class MemoryStore implements RecordStore {
  commits = 0;

  constructor(public record: MachineRecord = createEmptyRecord()) {}

  read(): MachineRecord {
    return structuredClone(this.record);
  }

  async commit(record: MachineRecord): Promise<void> {
    this.record = structuredClone(record);
    this.commits++;
  }
}

export class FakeShell {
  readonly commands: string[] = [];
  readonly failing = new Set<string>();

  forHost(host: string): MachineShell {
    return {
      run: async (command: string): Promise<void> => {
        this.commands.push(`${host}: ${command}`);
        if (this.failing.has(command)) {
          throw new Error('connection refused');
        }
      },
    };
  }
}

export const NO_WAIT: PollOptions = {
  intervalMs: 0,
  maxAttempts: 3,
  clock: { sleep: async () => {} },
};

export interface TestContextOptions {
  record?: MachineRecord;
  answers?: boolean | ((question: string) => boolean);
  shell?: FakeShell;
  cloud?: FakeCloud;
}

export interface TestContext {
  ctx: MachineContext;
  cloud: FakeCloud;
  store: MemoryStore;
  log: Logger;
  /** Every question the operator was asked */
  questions: string[];
}

/**
 * Context for a machine named `web`; confirmations default to yes.
 */
export function createTestContext(options: TestContextOptions = {}): TestContext {
  const cloud = options.cloud ?? new FakeCloud();
  const store = new MemoryStore(options.record);
  const log = new Logger('json');
  const questions: string[] = [];
  const answers = options.answers ?? true;
  const shell = options.shell;

  const ctx: MachineContext = {
    name: 'web',
    cloud,
    store,
    log,
    confirm: async (question) => {
      questions.push(question);
      return typeof answers === 'function' ? answers(question) : answers;
    },
    shell: shell ? (host) => shell.forHost(host) : undefined,
    poll: NO_WAIT,
    randomSecret: (length) => 'k'.repeat(length),
  };
  return { ctx, cloud, store, log, questions };
}

export function diskSpec(id: string, device: string, name: string, overrides: Partial<DiskSpec> = {}): DiskSpec {
  return {
    id,
    device,
    name: `${MACHINE_NAME}-${name}`,
    size: null,
    cachingMode: 'None',
    isEphemeral: false,
    encrypt: false,
    passphrase: '',
    ...overrides,
  };
}

export function rootDisk(overrides: Partial<DiskSpec> = {}): DiskSpec {
  return diskSpec(ROOT_URL, '/dev/sda', 'root', { cachingMode: 'ReadWrite', ...overrides });
}

/**
 * Declaration with a root disk plus the given data disks.
 */
export function desiredMachine(dataDisks: DiskSpec[] = [], overrides: Partial<DesiredMachine> = {}): DesiredMachine {
  const disks: Record<string, DiskSpec> = { [ROOT_URL]: rootDisk() };
  for (const disk of dataDisks) {
    disks[disk.id] = disk;
  }
  return {
    machineName: MACHINE_NAME,
    resourceGroup: RESOURCE_GROUP,
    virtualNetwork: VNET,
    storage: STORAGE,
    location: 'westeurope',
    size: 'Standard_A1',
    obtainIp: true,
    availabilitySet: null,
    rootDiskImageUrl: IMAGE_URL,
    disks,
    ...overrides,
  };
}

/**
 * Fake cloud with the subnet the declarations use.
 */
export function cloudWithNetwork(): FakeCloud {
  const cloud = new FakeCloud();
  cloud.network.addSubnet(RESOURCE_GROUP, VNET, VNET);
  return cloud;
}

export const PUBLIC_ADDRESS = '203.0.113.10';

/**
 * Record of a machine deployed exactly as declared.
 */
export function deployedRecord(desired: DesiredMachine): MachineRecord {
  const disks: MachineRecord['disks'] = {};
  for (const [id, disk] of Object.entries(desired.disks)) {
    disks[id] = attachedRecord(disk);
  }
  return {
    ...createEmptyRecord(),
    machineName: desired.machineName,
    resourceGroup: desired.resourceGroup,
    virtualNetwork: desired.virtualNetwork,
    storage: desired.storage,
    location: desired.location,
    size: desired.size,
    obtainIp: desired.obtainIp,
    availabilitySet: desired.availabilitySet,
    vmId: desired.machineName,
    lifecycle: 'running',
    publicIpv4: PUBLIC_ADDRESS,
    publicIp: desired.machineName,
    networkInterface: desired.machineName,
    disks,
  };
}

/**
 * Live VM matching a declaration.
 */
export function liveVM(desired: DesiredMachine): CloudVM {
  const root = desired.disks[ROOT_URL];
  const vm: CloudVM = {
    name: desired.machineName,
    location: desired.location,
    size: desired.size,
    availabilitySet: desired.availabilitySet,
    provisioningState: 'Succeeded',
    networkInterfaceId: `nic:${desired.machineName}`,
    osProfile: null,
    osDisk: {
      name: root?.name ?? '',
      vhdUri: ROOT_URL,
      caching: root?.cachingMode ?? 'None',
      createOption: 'Attach',
      sourceImageUri: null,
    },
    dataDisks: [],
  };
  for (const [id, disk] of Object.entries(desired.disks)) {
    const lun = deviceToSlot(disk.device);
    if (lun !== null) {
      vm.dataDisks.push({ lun, name: disk.name, vhdUri: id, caching: disk.cachingMode, createOption: 'Attach', diskSizeGB: disk.size });
    }
  }
  return vm;
}

/**
 * Put a machine deployed as declared into the fake cloud: VM, address,
 * network interface and every backing store.
 */
export function seedDeployment(cloud: FakeCloud, desired: DesiredMachine): void {
  cloud.compute.vms.set(`${desired.resourceGroup}/${desired.machineName}`, liveVM(desired));
  cloud.network.publicIps.set(`${desired.resourceGroup}/${desired.machineName}`, {
    id: `ip:${desired.machineName}`,
    ipAddress: PUBLIC_ADDRESS,
  });
  cloud.network.nics.set(`${desired.resourceGroup}/${desired.machineName}`, {
    id: `nic:${desired.machineName}`,
    params: { location: desired.location, subnetId: `subnet:${desired.resourceGroup}/${desired.virtualNetwork}/${desired.virtualNetwork}`, publicIpId: `ip:${desired.machineName}` },
  });
  for (const id of Object.keys(desired.disks)) {
    cloud.blobs.add(id);
  }
}
