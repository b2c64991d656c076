/**
 * Core Types for vmconverge
 *
 * Disk records, machine records and the lifecycle states the core
 * reconciles between.
 */

/**
 * Host caching mode of an attached disk
 */
export type CachingMode = 'None' | 'ReadOnly' | 'ReadWrite';

/**
 * Declared block device, keyed by its backing-store URL.
 */
export interface DiskSpec {
  /** Backing-store (blob) URL; the disk's identity, stable across VM re-creation */
  id: string;
  /** Logical device path: /dev/sda or /dev/disk/by-lun/N */
  device: string;
  /** Disk name on the VM, already prefixed with the machine name */
  name: string;
  /** Size in GB, null to use the backing store's or the image's size */
  size: number | null;
  cachingMode: CachingMode;
  /** Delete the backing store when the disk is torn down */
  isEphemeral: boolean;
  encrypt: boolean;
  /** Empty when the declaration leaves key generation to the tool */
  passphrase: string;
}

/**
 * Recorded state of a disk.
 */
export interface DiskRecord extends DiskSpec {
  /** Should exist per declaration but is not attached to the live VM */
  needsAttach?: boolean;
}

/**
 * Disk records keyed by backing-store URL
 */
export type DiskMap = Record<string, DiskRecord>;

/**
 * Lifecycle of the remote machine as far as the record knows.
 *
 * missing      -> no VM resource (never created, or found gone by a check)
 * provisioning -> created, started or hard-reset; not yet confirmed up
 * running      -> a status check saw provisioning succeed
 * stopping     -> power-off issued
 * stopped      -> powered off, deleted behind our back, or deprovisioned
 */
export type LifecycleState = 'missing' | 'provisioning' | 'running' | 'stopping' | 'stopped';

/**
 * Snapshot ids of one backup, keyed by disk id
 */
export type BackupSnapshots = Record<string, string>;

/**
 * Persisted state of one declared machine.
 */
export interface MachineRecord {
  /** Azure resource name of the VM; null until first deployed */
  machineName: string | null;
  resourceGroup: string | null;
  virtualNetwork: string | null;
  storage: string | null;
  location: string | null;
  size: string | null;
  obtainIp: boolean | null;
  availabilitySet: string | null;
  /** Set once the VM resource has been provisioned */
  vmId: string | null;
  lifecycle: LifecycleState;
  publicIpv4: string | null;
  /** Public IP resource name */
  publicIp: string | null;
  /** Network interface resource name */
  networkInterface: string | null;
  disks: DiskMap;
  /** Disk id -> key material, only for encrypted disks declared without a passphrase */
  generatedEncryptionKeys: Record<string, string>;
  /** Backup id -> snapshots */
  backups: Record<string, BackupSnapshots>;
}

/**
 * Create an empty record for a machine that has never been deployed.
 */
export function createEmptyRecord(): MachineRecord {
  return {
    machineName: null,
    resourceGroup: null,
    virtualNetwork: null,
    storage: null,
    location: null,
    size: null,
    obtainIp: null,
    availabilitySet: null,
    vmId: null,
    lifecycle: 'missing',
    publicIpv4: null,
    publicIp: null,
    networkInterface: null,
    disks: {},
    generatedEncryptionKeys: {},
    backups: {},
  };
}

/**
 * Whether any remote resource is still tracked by the record.
 */
export function isDeployed(record: MachineRecord): boolean {
  return (
    record.vmId !== null ||
    Object.keys(record.disks).length > 0 ||
    record.publicIp !== null ||
    record.networkInterface !== null
  );
}

/**
 * Read and commit access to one machine's record.
 *
 * read() hands out a private copy; nothing is persisted until commit().
 */
export interface RecordStore {
  read(): MachineRecord;
  commit(record: MachineRecord): Promise<void>;
}

/**
 * Declared machine, validated and with defaults applied.
 */
export interface DesiredMachine {
  /** Azure resource name of the VM, also used for its NIC and public IP */
  machineName: string;
  resourceGroup: string;
  virtualNetwork: string;
  storage: string;
  location: string;
  size: string;
  obtainIp: boolean;
  availabilitySet: string | null;
  /** Image the root disk is cloned from when its backing store does not exist yet */
  rootDiskImageUrl: string;
  /** Declared disks keyed by backing-store URL */
  disks: Record<string, DiskSpec>;
}
