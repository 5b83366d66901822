import { NotFoundError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { VirtualizationBackend } from "../proxmox/backend.js";
import type { StoragePool } from "../proxmox/types.js";
import type { BackendClass, DiskFormat, StorageProfile } from "../types.js";

interface ClassTraits {
  diskFormat: DiskFormat;
  supportedFormats: readonly DiskFormat[];
  supportsCloudInit: boolean;
  supportsSnapshotWhileRunning: boolean;
}

const CLASS_TRAITS: Record<BackendClass, ClassTraits> = {
  block: { diskFormat: "raw", supportedFormats: ["raw"], supportsCloudInit: false, supportsSnapshotWhileRunning: true },
  file: {
    diskFormat: "qcow2",
    supportedFormats: ["qcow2", "raw"],
    supportsCloudInit: true,
    supportsSnapshotWhileRunning: true,
  },
};

const BACKEND_TYPES = new Map<string, BackendClass>([
  ["lvm", "block"],
  ["lvmthin", "block"],
  ["zfspool", "block"],
  ["zfs", "block"],
  ["zfs-block", "block"],
  ["rbd", "block"],
  ["iscsi", "block"],
  ["iscsidirect", "block"],
  ["dir", "file"],
  ["nfs", "file"],
  ["cifs", "file"],
  ["btrfs", "file"],
  ["glusterfs", "file"],
  ["cephfs", "file"],
]);

export function classifyBackend(backendType: string): { backendClass: BackendClass; recognized: boolean } {
  const known = BACKEND_TYPES.get(backendType.trim().toLowerCase());
  // Unknown backends fall back to the file-based profile.
  return known ? { backendClass: known, recognized: true } : { backendClass: "file", recognized: false };
}

export function contentTypes(pool: Pick<StoragePool, "content">): string[] {
  return (pool.content ?? "")
    .split(",")
    .map((c) => c.trim())
    .filter(Boolean);
}

export function buildProfile(node: string, pool: StoragePool): StorageProfile {
  const { backendClass, recognized } = classifyBackend(pool.type);
  return Object.freeze({
    poolName: pool.storage,
    node,
    backendType: pool.type,
    backendClass,
    ...CLASS_TRAITS[backendClass],
    content: contentTypes(pool),
    recognized,
  });
}

function usable(pool: StoragePool): boolean {
  // Absent flags count as usable.
  return pool.active !== 0 && pool.enabled !== 0;
}

export class StorageProfileDetector {
  constructor(
    private readonly backend: VirtualizationBackend,
    private readonly logger: Logger
  ) {}

  async detect(node: string, poolName: string): Promise<StorageProfile> {
    const pools = await this.backend.listStorage(node);
    const pool = pools.find((p) => p.storage === poolName);
    if (!pool) {
      throw new NotFoundError(`Storage '${poolName}' not found on node ${node}`);
    }
    return this.profile(node, pool);
  }

  /** First usable pool on the node that accepts the given content type. */
  async pickDefault(node: string, content: string): Promise<StorageProfile> {
    const pools = await this.backend.listStorage(node);
    const pool = pools.find((p) => usable(p) && contentTypes(p).includes(content));
    if (!pool) {
      throw new NotFoundError(`No storage on node ${node} accepts '${content}' content`);
    }
    this.logger.debug("storage auto-selected", { node, storage: pool.storage, content });
    return this.profile(node, pool);
  }

  private profile(node: string, pool: StoragePool): StorageProfile {
    const profile = buildProfile(node, pool);
    if (!profile.recognized) {
      this.logger.warn("unrecognized storage backend, assuming file-based qcow2", {
        node,
        storage: pool.storage,
        type: pool.type,
      });
    }
    return profile;
  }
}
