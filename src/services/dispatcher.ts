import { ConflictError, NotFoundError, UnsupportedOptionError } from "../errors.js";
import type { Logger } from "../logger.js";
import {
  BackendRequestError,
  type BackendCall,
  type CallParams,
  type VirtualizationBackend,
} from "../proxmox/backend.js";
import type { SnapshotEntry, StorageContentItem, StoragePool } from "../proxmox/types.js";
import {
  KIND_PATH,
  VM_ONLY_POWER_ACTIONS,
  type BackupRequest,
  type CreateContainerParams,
  type CreateRequest,
  type CreateVmParams,
  type DeleteRequest,
  type DiskFormat,
  type IsoRequest,
  type OperationOutcome,
  type OperationRequest,
  type PowerRequest,
  type ResourceKind,
  type ResourceRef,
  type SnapshotRequest,
  type StorageProfile,
  type ValidatedRequest,
} from "../types.js";
import { failure, success } from "./normalizer.js";
import type { ResourceResolver } from "./resolver.js";
import { contentTypes, type StorageProfileDetector } from "./storage.js";
import type { TaskTracker } from "./tracker.js";
import type { RequestValidator } from "./validator.js";

export type DispatchState = "validated" | "resolving" | "submitted" | "tracking" | "terminal";

export interface DispatchOptions {
  signal?: AbortSignal;
  /** Overrides the configured task timeout for this request. */
  timeoutSeconds?: number;
}

export interface OperationDispatcherOptions {
  backend: VirtualizationBackend;
  resolver: ResourceResolver;
  storage: StorageProfileDetector;
  validator: RequestValidator;
  tracker: TaskTracker;
  logger: Logger;
  timeouts: { defaultSeconds: number; longSeconds: number };
  onStateChange?: (state: DispatchState, request: Readonly<OperationRequest>) => void;
}

interface TaskStep {
  node: string;
  call: BackendCall;
}

type ContentItem = StorageContentItem & { node: string; storage: string; filename: string };

type Plan =
  | { type: "immediate"; fetch: () => Promise<unknown> }
  | { type: "tasks"; steps: TaskStep[]; result: Record<string, unknown>; long: boolean };

const seg = encodeURIComponent;

function resourcePath(ref: ResourceRef): string {
  return `/nodes/${seg(ref.node)}/${KIND_PATH[ref.kind]}/${ref.id}`;
}

function describe(ref: ResourceRef): string {
  return `${ref.kind === "vm" ? "VM" : "Container"} ${ref.id}${ref.name ? ` (${ref.name})` : ""} on ${ref.node}`;
}

function refFacts(ref: ResourceRef): Record<string, unknown> {
  return { vmid: ref.id, node: ref.node, kind: ref.kind, ...(ref.name ? { name: ref.name } : {}) };
}

function storageFacts(profile: StorageProfile, diskFormat: DiskFormat): Record<string, unknown> {
  return {
    storage: profile.poolName,
    backendType: profile.backendType,
    backendClass: profile.backendClass,
    diskFormat,
  };
}

function requireContent(profile: StorageProfile, content: string): void {
  if (!profile.content.includes(content)) {
    const message = `Storage '${profile.poolName}' on ${profile.node} does not accept '${content}' content`;
    throw new UnsupportedOptionError(message, [{ field: "storage", code: "unsupported_option", message }]);
  }
}

/** Archive names carry the guest type: `vzdump-qemu-...` or `vzdump-lxc-...`. */
export function archiveKind(archive: string): ResourceKind {
  return /vzdump-lxc-|(^|[:/])ct\//i.test(archive) ? "container" : "vm";
}

function fileName(volid: string): string {
  const slash = volid.lastIndexOf("/");
  return slash === -1 ? volid.slice(volid.indexOf(":") + 1) : volid.slice(slash + 1);
}

/**
 * Runs one validated request through resolution, storage detection, submission
 * and task tracking, and reports a single outcome.
 */
export class OperationDispatcher {
  private readonly backend: VirtualizationBackend;
  private readonly resolver: ResourceResolver;
  private readonly storage: StorageProfileDetector;
  private readonly validator: RequestValidator;
  private readonly tracker: TaskTracker;
  private readonly logger: Logger;
  private readonly timeouts: { defaultSeconds: number; longSeconds: number };
  private readonly onStateChange?: (state: DispatchState, request: Readonly<OperationRequest>) => void;

  constructor(options: OperationDispatcherOptions) {
    this.backend = options.backend;
    this.resolver = options.resolver;
    this.storage = options.storage;
    this.validator = options.validator;
    this.tracker = options.tracker;
    this.logger = options.logger;
    this.timeouts = options.timeouts;
    this.onStateChange = options.onStateChange;
  }

  /** Validates, then dispatches. */
  async run(request: OperationRequest, options: DispatchOptions = {}): Promise<OperationOutcome> {
    let validated: ValidatedRequest;
    try {
      const result = await this.validator.validate(request);
      if (!result.ok) return failure(result.error);
      validated = result.value;
    } catch (error) {
      return failure(error);
    }
    return this.dispatch(validated, options);
  }

  /**
   * Never rejects for operation failures; those come back as a failed outcome.
   * Rejects only when `options.signal` aborts.
   */
  async dispatch(validated: ValidatedRequest, options: DispatchOptions = {}): Promise<OperationOutcome> {
    const { request } = validated;
    const enter = (state: DispatchState) => {
      this.logger.debug("state", { op: request.op, state });
      this.onStateChange?.(state, request);
    };

    enter("validated");
    try {
      enter("resolving");
      const plan = await this.plan(request);
      enter("submitted");

      if (plan.type === "immediate") {
        const result = await this.withRetry(plan.fetch);
        enter("terminal");
        return success(result);
      }

      const timeout = options.timeoutSeconds ?? (plan.long ? this.timeouts.longSeconds : this.timeouts.defaultSeconds);
      let last: OperationOutcome | undefined;
      for (const step of plan.steps) {
        const upid = await this.withRetry(() => this.backend.submitTask(step.call));
        if (upid === null) continue;

        enter("tracking");
        const outcome = await this.tracker.track(
          { node: step.node, upid, submittedAt: Date.now() },
          timeout,
          options.signal
        );
        if (outcome.status !== "success") {
          enter("terminal");
          return { ...outcome, result: plan.result };
        }
        last = outcome;
      }

      enter("terminal");
      const exitstatus = last?.task?.exitstatus;
      const warnings = exitstatus?.startsWith("WARNINGS") ? { warnings: exitstatus } : {};
      return success({ ...plan.result, ...warnings }, last?.task);
    } catch (error) {
      enter("terminal");
      if (options.signal?.aborted) throw error;
      this.logger.debug("operation failed", { op: request.op, error });
      return failure(error);
    }
  }

  private async withRetry<T>(submit: () => Promise<T>): Promise<T> {
    try {
      return await submit();
    } catch (error) {
      if (!(error instanceof BackendRequestError) || !error.transient) throw error;
      this.logger.warn("transient backend failure, retrying once", { error });
      return submit();
    }
  }

  private plan(request: Readonly<OperationRequest>): Promise<Plan> {
    switch (request.op) {
      case "create":
        return this.planCreate(request);
      case "delete":
        return this.planDelete(request);
      case "power":
        return this.planPower(request);
      case "snapshot":
        return this.planSnapshot(request);
      case "backup":
        return this.planBackup(request);
      case "iso":
        return this.planIso(request);
    }
  }

  // ==================== Lifecycle ====================

  private planCreate(request: Readonly<CreateRequest>): Promise<Plan> {
    switch (request.kind) {
      case "vm":
        return this.planCreateVm(request.params);
      case "container":
        return this.planCreateContainer(request.params);
    }
  }

  private async planCreateVm(p: CreateVmParams): Promise<Plan> {
    await this.requireNode(p.node);
    const profile = p.storage
      ? await this.storage.detect(p.node, p.storage)
      : await this.storage.pickDefault(p.node, "images");
    requireContent(profile, "images");
    const diskFormat = this.diskFormat(profile, p.disk_format);
    const cloudInit = profile.supportsCloudInit;
    const name = p.name ?? `vm-${p.vmid}`;

    const params: CallParams = {
      vmid: p.vmid,
      name,
      cores: p.cpus,
      sockets: 1,
      memory: p.memory,
      ostype: p.ostype ?? "l26",
      scsihw: "virtio-scsi-pci",
      scsi0: `${profile.poolName}:${p.disk_size},format=${diskFormat}`,
      boot: "order=scsi0",
      net0: "virtio,bridge=vmbr0",
      agent: "enabled=1",
      ide2: cloudInit ? `${profile.poolName}:cloudinit` : undefined,
    };

    return {
      type: "tasks",
      long: false,
      steps: [{ node: p.node, call: { method: "post", path: `/nodes/${seg(p.node)}/qemu`, params } }],
      result: {
        vmid: p.vmid,
        node: p.node,
        kind: "vm",
        name,
        ...storageFacts(profile, diskFormat),
        disk_size: p.disk_size,
        cloudInit,
      },
    };
  }

  private async planCreateContainer(p: CreateContainerParams): Promise<Plan> {
    await this.requireNode(p.node);
    const profile = p.storage
      ? await this.storage.detect(p.node, p.storage)
      : await this.storage.pickDefault(p.node, "rootdir");
    requireContent(profile, "rootdir");
    const unprivileged = p.unprivileged ?? true;

    const params: CallParams = {
      vmid: p.vmid,
      hostname: p.hostname,
      ostemplate: p.ostemplate,
      cores: p.cpus,
      memory: p.memory,
      swap: p.swap ?? 512,
      rootfs: `${profile.poolName}:${p.disk_size}`,
      net0: "name=eth0,bridge=vmbr0,ip=dhcp",
      unprivileged: unprivileged ? 1 : 0,
      password: p.password,
      "ssh-public-keys": p.ssh_public_keys,
    };

    return {
      type: "tasks",
      long: false,
      steps: [{ node: p.node, call: { method: "post", path: `/nodes/${seg(p.node)}/lxc`, params } }],
      result: {
        vmid: p.vmid,
        node: p.node,
        kind: "container",
        name: p.hostname,
        ...storageFacts(profile, profile.diskFormat),
        disk_size: p.disk_size,
        unprivileged,
      },
    };
  }

  private async planDelete(request: Readonly<DeleteRequest>): Promise<Plan> {
    const ref = await this.resolver.resolve(request.target, request.kind);
    const running = await this.isRunning(ref);
    if (running && !request.force) {
      throw new ConflictError(`${describe(ref)} is running; stop it first or pass force`);
    }

    const steps: TaskStep[] = [];
    if (running) {
      steps.push({ node: ref.node, call: { method: "post", path: `${resourcePath(ref)}/status/stop` } });
    }
    steps.push({
      node: ref.node,
      call: { method: "delete", path: resourcePath(ref), params: { purge: request.purge ? 1 : undefined } },
    });
    return { type: "tasks", long: false, steps, result: { ...refFacts(ref), deleted: true, stopped: running } };
  }

  private async planPower(request: Readonly<PowerRequest>): Promise<Plan> {
    const ref = await this.resolver.resolve(request.target, request.kind);
    if (ref.kind === "container" && VM_ONLY_POWER_ACTIONS.includes(request.action)) {
      const message = `'${request.action}' is only available for VMs`;
      throw new UnsupportedOptionError(message, [{ field: "action", code: "unsupported_option", message }]);
    }
    const params: CallParams =
      request.action === "shutdown" || request.action === "reboot" ? { timeout: request.timeout } : {};
    return {
      type: "tasks",
      long: false,
      steps: [{ node: ref.node, call: { method: "post", path: `${resourcePath(ref)}/status/${request.action}`, params } }],
      result: { ...refFacts(ref), action: request.action },
    };
  }

  // ==================== Snapshots ====================

  private async planSnapshot(request: Readonly<SnapshotRequest>): Promise<Plan> {
    const ref = await this.resolver.resolve(request.target, request.kind);
    const base = `${resourcePath(ref)}/snapshot`;
    const task = (call: BackendCall, result: Record<string, unknown>): Plan => ({
      type: "tasks",
      long: false,
      steps: [{ node: ref.node, call }],
      result: { ...refFacts(ref), ...result },
    });

    switch (request.action) {
      case "list":
        return {
          type: "immediate",
          fetch: async () => {
            const entries = await this.backend.request<SnapshotEntry[]>({ method: "get", path: base });
            const snapshots = (entries ?? [])
              .filter((entry) => entry.name !== "current")
              .map((entry) => ({
                name: entry.name,
                description: entry.description ?? "",
                parent: entry.parent,
                snaptime: entry.snaptime,
                vmstate: Boolean(entry.vmstate),
              }));
            return { ...refFacts(ref), snapshots };
          },
        };
      case "create": {
        if (request.vmstate && ref.kind === "container") {
          const message = "memory-state snapshots are only available for VMs";
          throw new UnsupportedOptionError(message, [{ field: "vmstate", code: "unsupported_option", message }]);
        }
        const params: CallParams = {
          snapname: request.snapname,
          description: request.description,
          vmstate: ref.kind === "vm" && request.vmstate ? 1 : undefined,
        };
        return task({ method: "post", path: base, params }, { snapname: request.snapname, vmstate: request.vmstate });
      }
      case "delete":
        return task(
          { method: "delete", path: `${base}/${seg(request.snapname)}` },
          { snapname: request.snapname, deleted: true }
        );
      case "rollback":
        return task(
          { method: "post", path: `${base}/${seg(request.snapname)}/rollback` },
          { snapname: request.snapname, rolledBack: true }
        );
    }
  }

  // ==================== Backups ====================

  private async planBackup(request: Readonly<BackupRequest>): Promise<Plan> {
    switch (request.action) {
      case "list":
        return {
          type: "immediate",
          fetch: async () => {
            const items = await this.collectContent("backup", request.node, request.storage, request.vmid);
            items.sort((a, b) => (b.ctime ?? 0) - (a.ctime ?? 0));
            return { backups: items };
          },
        };
      case "create": {
        const ref = await this.resolver.resolve(request.target, request.kind);
        const profile = await this.storage.detect(ref.node, request.storage);
        requireContent(profile, "backup");
        const params: CallParams = {
          vmid: ref.id,
          storage: request.storage,
          compress: request.compress,
          mode: request.mode,
          "notes-template": request.notes,
        };
        return {
          type: "tasks",
          long: true,
          steps: [{ node: ref.node, call: { method: "post", path: `/nodes/${seg(ref.node)}/vzdump`, params } }],
          result: { ...refFacts(ref), storage: request.storage, compress: request.compress, mode: request.mode },
        };
      }
      case "restore": {
        await this.requireNode(request.node);
        const kind = archiveKind(request.archive);
        let profile: StorageProfile | undefined;
        if (request.storage) {
          profile = await this.storage.detect(request.node, request.storage);
          requireContent(profile, kind === "vm" ? "images" : "rootdir");
        }
        // qemu takes the archive as `archive`; lxc treats it as a template to restore from.
        const params: CallParams =
          kind === "vm"
            ? { vmid: request.vmid, archive: request.archive }
            : { vmid: request.vmid, ostemplate: request.archive, restore: 1 };
        params.storage = request.storage;
        params.unique = request.unique ? 1 : undefined;
        return {
          type: "tasks",
          long: true,
          steps: [
            {
              node: request.node,
              call: { method: "post", path: `/nodes/${seg(request.node)}/${KIND_PATH[kind]}`, params },
            },
          ],
          result: {
            vmid: request.vmid,
            node: request.node,
            kind,
            archive: request.archive,
            ...(profile ? storageFacts(profile, profile.diskFormat) : {}),
          },
        };
      }
      case "delete": {
        const contentPath = `/nodes/${seg(request.node)}/storage/${seg(request.storage)}/content`;
        const items = await this.backend.request<StorageContentItem[]>({
          method: "get",
          path: contentPath,
          params: { content: "backup" },
        });
        const item = (items ?? []).find((entry) => entry.volid === request.volid);
        if (!item) {
          throw new NotFoundError(`Backup '${request.volid}' not found on ${request.storage} (${request.node})`);
        }
        if (item.protected === true || item.protected === 1) {
          throw new ConflictError(`Backup '${request.volid}' is protected; remove the protection first`);
        }
        return {
          type: "tasks",
          long: false,
          steps: [{ node: request.node, call: { method: "delete", path: `${contentPath}/${seg(request.volid)}` } }],
          result: { volid: request.volid, node: request.node, storage: request.storage, deleted: true },
        };
      }
    }
  }

  // ==================== ISO images and templates ====================

  private async planIso(request: Readonly<IsoRequest>): Promise<Plan> {
    switch (request.action) {
      case "list":
      case "list_templates": {
        const content = request.action === "list" ? "iso" : "vztmpl";
        return {
          type: "immediate",
          fetch: async () => {
            const items = await this.collectContent(content, request.node, request.storage);
            items.sort((a, b) => a.volid.localeCompare(b.volid));
            return { [request.action === "list" ? "isos" : "templates"]: items };
          },
        };
      }
      case "download": {
        const profile = await this.storage.detect(request.node, request.storage);
        requireContent(profile, "iso");
        const params: CallParams = {
          url: request.url,
          filename: request.filename,
          content: "iso",
          checksum: request.checksum,
          "checksum-algorithm": request.checksum ? (request.checksum_algorithm ?? "sha256") : undefined,
        };
        return {
          type: "tasks",
          long: true,
          steps: [
            {
              node: request.node,
              call: {
                method: "post",
                path: `/nodes/${seg(request.node)}/storage/${seg(request.storage)}/download-url`,
                params,
              },
            },
          ],
          result: {
            node: request.node,
            storage: request.storage,
            filename: request.filename,
            volid: `${request.storage}:iso/${request.filename}`,
          },
        };
      }
      case "delete": {
        const contentPath = `/nodes/${seg(request.node)}/storage/${seg(request.storage)}/content`;
        const volid = await this.findImage(contentPath, request.filename);
        return {
          type: "tasks",
          long: false,
          steps: [{ node: request.node, call: { method: "delete", path: `${contentPath}/${seg(volid)}` } }],
          result: { volid, node: request.node, storage: request.storage, deleted: true },
        };
      }
    }
  }

  private async findImage(contentPath: string, filename: string): Promise<string> {
    const items = await this.backend.request<StorageContentItem[]>({ method: "get", path: contentPath });
    const match = (items ?? []).find(
      (item) =>
        (item.content === "iso" || item.content === "vztmpl") &&
        (item.volid === filename || fileName(item.volid) === filename)
    );
    if (!match) {
      throw new NotFoundError(`No ISO image or template named '${filename}' at ${contentPath}`);
    }
    return match.volid;
  }

  // ==================== Helpers ====================

  private async requireNode(node: string): Promise<void> {
    const nodes = await this.backend.listNodes();
    if (!nodes.some((n) => n.node === node)) {
      throw new NotFoundError(`Node '${node}' not found`);
    }
  }

  private diskFormat(profile: StorageProfile, requested?: DiskFormat): DiskFormat {
    if (requested === undefined) return profile.diskFormat;
    if (!profile.supportedFormats.includes(requested)) {
      const message = `Storage '${profile.poolName}' (${profile.backendType}) does not support ${requested} disks`;
      throw new UnsupportedOptionError(message, [{ field: "disk_format", code: "unsupported_option", message }]);
    }
    return requested;
  }

  private async isRunning(ref: ResourceRef): Promise<boolean> {
    const current = await this.backend.request<{ status?: string } | undefined>({
      method: "get",
      path: `${resourcePath(ref)}/status/current`,
    });
    return current?.status === "running";
  }

  /**
   * Volumes of one content type across the selected nodes and pools. A node or
   * pool that cannot be listed is logged and skipped unless the caller named it.
   */
  private async collectContent(
    content: string,
    node?: string,
    storage?: string,
    vmid?: number
  ): Promise<ContentItem[]> {
    const nodes = node
      ? [node]
      : (await this.backend.listNodes()).filter((n) => n.status !== "offline").map((n) => n.node);
    const items: ContentItem[] = [];

    for (const name of nodes) {
      let pools: StoragePool[];
      try {
        pools = await this.backend.listStorage(name);
      } catch (error) {
        if (node) throw error;
        this.logger.warn("skipping node whose storage cannot be listed", { node: name, error });
        continue;
      }
      const candidates = pools.filter(
        (pool) => (!storage || pool.storage === storage) && contentTypes(pool).includes(content)
      );
      for (const pool of candidates) {
        let entries: StorageContentItem[] | undefined;
        try {
          entries = await this.backend.request<StorageContentItem[]>({
            method: "get",
            path: `/nodes/${seg(name)}/storage/${seg(pool.storage)}/content`,
            params: { content, vmid },
          });
        } catch (error) {
          if (storage) throw error;
          this.logger.warn("skipping storage whose content cannot be listed", {
            node: name,
            storage: pool.storage,
            error,
          });
          continue;
        }
        for (const entry of entries ?? []) {
          items.push({ ...entry, node: name, storage: pool.storage, filename: fileName(entry.volid) });
        }
      }
    }
    return items;
  }
}
