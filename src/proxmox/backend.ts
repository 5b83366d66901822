import type { BackendPayload } from "../types.js";
import type { ClusterResource, NodeSummary, StoragePool, TaskStatus } from "./types.js";

export type HttpMethod = "get" | "post" | "put" | "delete";

export type CallParams = Record<string, string | number | boolean | readonly string[] | undefined>;

export interface BackendCall {
  method: HttpMethod;
  /** Path below `/api2/json`, e.g. `/nodes/pve/qemu`. */
  path: string;
  params?: CallParams;
}

/**
 * The capability set the orchestration layer needs from the virtualization
 * backend. `ProxmoxClient` is the production implementation; tests use an
 * in-memory fake.
 */
export interface VirtualizationBackend {
  listNodes(): Promise<NodeSummary[]>;
  listStorage(node: string): Promise<StoragePool[]>;
  listResources(): Promise<ClusterResource[]>;
  /** Submits a task-producing call. Resolves to the UPID, or null when the backend finished synchronously. */
  submitTask(call: BackendCall): Promise<string | null>;
  /** Resolves to undefined when the task is unknown to the node. */
  pollTask(node: string, upid: string): Promise<TaskStatus | undefined>;
  /** Immediate read. */
  request<T>(call: BackendCall): Promise<T>;
}

/** A failed HTTP exchange with the backend, before classification. */
export class BackendRequestError extends Error {
  readonly status?: number;
  readonly code?: string;
  readonly errors?: Record<string, string>;
  readonly data?: unknown;

  constructor(
    message: string,
    details: { status?: number; code?: string; errors?: Record<string, string>; data?: unknown } = {}
  ) {
    super(message);
    this.name = "BackendRequestError";
    this.status = details.status;
    this.code = details.code;
    this.errors = details.errors;
    this.data = details.data;
  }

  /** No response at all, or a gateway-level failure in front of pveproxy. */
  get transient(): boolean {
    return this.status === undefined || this.status === 502 || this.status === 503 || this.status === 504;
  }

  toPayload(): BackendPayload {
    return {
      message: this.message,
      ...(this.status !== undefined ? { status: this.status } : {}),
      ...(this.code !== undefined ? { code: this.code } : {}),
      ...(this.errors !== undefined ? { errors: this.errors } : {}),
      ...(this.data !== undefined ? { data: this.data } : {}),
    };
  }
}
