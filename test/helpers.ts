import { vi } from "vitest";
import { BackendRequestError, type BackendCall, type VirtualizationBackend } from "../src/proxmox/backend.js";
import type { ClusterResource, NodeSummary, StoragePool, TaskStatus } from "../src/proxmox/types.js";
import { createLogger, type Logger, type LogLevel } from "../src/logger.js";

export type PollStep = TaskStatus | "vanished";

/**
 * In-memory Proxmox stand-in. Inventory, storage and read routes are plain
 * fields; task submissions and polls follow scripted queues.
 */
export class FakeBackend implements VirtualizationBackend {
  nodes: NodeSummary[] = [{ node: "pve", status: "online" }];
  storage = new Map<string, StoragePool[]>();
  resources: ClusterResource[] = [];
  /** Read responses keyed by `"<method> <path>"`. Errors are thrown. */
  routes = new Map<string, unknown>();
  /** Answers for successive submissions: a UPID, null, or an error to throw. Defaults to a fresh UPID. */
  submitQueue: Array<string | null | Error> = [];
  /** Successive poll answers per UPID; the last one repeats. Unscripted tasks stop with OK. */
  pollScripts = new Map<string, PollStep[]>();

  readonly submitted: BackendCall[] = [];
  readonly polled: string[] = [];

  readonly request = vi.fn().mockImplementation(async (call: BackendCall) => {
    const key = `${call.method} ${call.path}`;
    if (!this.routes.has(key)) {
      throw new BackendRequestError(`no fake route for ${key}`, { status: 501 });
    }
    const value = this.routes.get(key);
    if (value instanceof Error) throw value;
    return value;
  });

  async listNodes(): Promise<NodeSummary[]> {
    return this.nodes;
  }

  async listStorage(node: string): Promise<StoragePool[]> {
    const pools = this.storage.get(node);
    if (!pools) throw new BackendRequestError(`no such node '${node}'`, { status: 500 });
    return pools;
  }

  async listResources(): Promise<ClusterResource[]> {
    return this.resources;
  }

  async submitTask(call: BackendCall): Promise<string | null> {
    this.submitted.push(call);
    const next = this.submitQueue.shift();
    if (next instanceof Error) throw next;
    return next === undefined ? `UPID:pve:${String(this.submitted.length).padStart(8, "0")}:task:` : next;
  }

  async pollTask(node: string, upid: string): Promise<TaskStatus | undefined> {
    this.polled.push(upid);
    const script = this.pollScripts.get(upid);
    if (!script || script.length === 0) return stopped(upid, "OK", node);
    const step = script.length > 1 ? script.shift() : script[0];
    return step === "vanished" || step === undefined ? undefined : step;
  }

  addVm(vmid: number, name: string, node = "pve", status = "stopped"): void {
    this.resources.push({ id: `qemu/${vmid}`, type: "qemu", node, vmid, name, status });
  }

  addContainer(vmid: number, name: string, node = "pve", status = "stopped"): void {
    this.resources.push({ id: `lxc/${vmid}`, type: "lxc", node, vmid, name, status });
  }
}

export function stopped(upid: string, exitstatus: string, node = "pve"): TaskStatus {
  return { upid, node, status: "stopped", exitstatus };
}

export function running(upid: string, node = "pve"): TaskStatus {
  return { upid, node, status: "running" };
}

export const LOCAL_LVM: StoragePool = { storage: "local-lvm", type: "lvmthin", content: "images,rootdir", active: 1 };
export const LOCAL: StoragePool = { storage: "local", type: "dir", content: "iso,vztmpl,backup", active: 1 };
export const NFS: StoragePool = { storage: "nfs-share", type: "nfs", content: "images,rootdir,backup", active: 1 };

/** Logger that records lines instead of writing them. */
export function memoryLogger(level: LogLevel = "trace"): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: createLogger({ level, json: true, write: (line) => lines.push(line) }), lines };
}
