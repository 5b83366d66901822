// Shared data model for the orchestration layer.

export type ResourceKind = "vm" | "container";

// Proxmox path segment per resource kind. The only place the two are related.
export const KIND_PATH = {
  vm: "qemu",
  container: "lxc",
} as const satisfies Record<ResourceKind, string>;

export interface ResourceRef {
  readonly node: string;
  readonly kind: ResourceKind;
  readonly id: number;
  readonly name?: string;
}

export type BackendClass = "block" | "file";

export type DiskFormat = "raw" | "qcow2";

export interface StorageProfile {
  readonly poolName: string;
  readonly node: string;
  /** Backend type token as reported by the node, e.g. `lvmthin` or `dir`. */
  readonly backendType: string;
  readonly backendClass: BackendClass;
  readonly diskFormat: DiskFormat;
  readonly supportedFormats: readonly DiskFormat[];
  readonly supportsCloudInit: boolean;
  readonly supportsSnapshotWhileRunning: boolean;
  /** Content types the pool accepts (`images`, `rootdir`, `iso`, `vztmpl`, `backup`, ...). */
  readonly content: readonly string[];
  /** False when the backend type was not in the classification table. */
  readonly recognized: boolean;
}

// ==================== Requests ====================

export interface CreateVmParams {
  node: string;
  vmid: number;
  name?: string;
  cpus: number;
  memory: number;
  disk_size: number;
  storage?: string;
  ostype?: string;
  disk_format?: DiskFormat;
}

export interface CreateContainerParams {
  node: string;
  vmid: number;
  hostname: string;
  ostemplate: string;
  cpus: number;
  memory: number;
  disk_size: number;
  storage?: string;
  swap?: number;
  password?: string;
  ssh_public_keys?: string;
  unprivileged?: boolean;
}

export interface CreateVmRequest {
  op: "create";
  kind: "vm";
  params: CreateVmParams;
}

export interface CreateContainerRequest {
  op: "create";
  kind: "container";
  params: CreateContainerParams;
}

export type CreateRequest = CreateVmRequest | CreateContainerRequest;

export interface DeleteRequest {
  op: "delete";
  target: string;
  kind?: ResourceKind;
  force: boolean;
  purge: boolean;
}

export type PowerAction = "start" | "stop" | "shutdown" | "reboot" | "reset" | "suspend" | "resume";

// Power actions the container API does not offer.
export const VM_ONLY_POWER_ACTIONS: readonly PowerAction[] = ["reset", "suspend", "resume"];

export interface PowerRequest {
  op: "power";
  action: PowerAction;
  target: string;
  kind?: ResourceKind;
  /** Backend-side timeout for `shutdown` and `reboot`, in seconds. */
  timeout?: number;
}

interface SnapshotTarget {
  op: "snapshot";
  target: string;
  kind?: ResourceKind;
}

export interface ListSnapshotsRequest extends SnapshotTarget {
  action: "list";
}

export interface CreateSnapshotRequest extends SnapshotTarget {
  action: "create";
  snapname: string;
  description?: string;
  vmstate: boolean;
}

export interface DeleteSnapshotRequest extends SnapshotTarget {
  action: "delete";
  snapname: string;
}

export interface RollbackSnapshotRequest extends SnapshotTarget {
  action: "rollback";
  snapname: string;
}

export type SnapshotRequest =
  | ListSnapshotsRequest
  | CreateSnapshotRequest
  | DeleteSnapshotRequest
  | RollbackSnapshotRequest;

export type BackupCompression = "0" | "gzip" | "lz4" | "zstd";
export type BackupMode = "snapshot" | "suspend" | "stop";

export interface ListBackupsRequest {
  op: "backup";
  action: "list";
  node?: string;
  storage?: string;
  vmid?: number;
}

export interface CreateBackupRequest {
  op: "backup";
  action: "create";
  target: string;
  kind?: ResourceKind;
  storage: string;
  compress: BackupCompression;
  mode: BackupMode;
  notes?: string;
}

export interface RestoreBackupRequest {
  op: "backup";
  action: "restore";
  node: string;
  archive: string;
  vmid: number;
  storage?: string;
  unique: boolean;
}

export interface DeleteBackupRequest {
  op: "backup";
  action: "delete";
  node: string;
  storage: string;
  volid: string;
}

export type BackupRequest =
  | ListBackupsRequest
  | CreateBackupRequest
  | RestoreBackupRequest
  | DeleteBackupRequest;

export type ChecksumAlgorithm = "md5" | "sha1" | "sha224" | "sha256" | "sha384" | "sha512";

export interface ListIsosRequest {
  op: "iso";
  action: "list" | "list_templates";
  node?: string;
  storage?: string;
}

export interface DownloadIsoRequest {
  op: "iso";
  action: "download";
  node: string;
  storage: string;
  url: string;
  filename: string;
  checksum?: string;
  checksum_algorithm?: ChecksumAlgorithm;
}

export interface DeleteIsoRequest {
  op: "iso";
  action: "delete";
  node: string;
  storage: string;
  filename: string;
}

export type IsoRequest = ListIsosRequest | DownloadIsoRequest | DeleteIsoRequest;

export type OperationRequest =
  | CreateRequest
  | DeleteRequest
  | PowerRequest
  | SnapshotRequest
  | BackupRequest
  | IsoRequest;

export interface ValidatedRequest {
  readonly request: Readonly<OperationRequest>;
  readonly validatedAt: Date;
}

// ==================== Tasks & outcomes ====================

export interface TaskHandle {
  readonly node: string;
  /** Opaque Proxmox task id (`UPID:node:...`). */
  readonly upid: string;
  /** Epoch milliseconds. */
  readonly submittedAt: number;
}

export type IssueCode =
  | "required"
  | "invalid_type"
  | "out_of_range"
  | "invalid_format"
  | "in_use"
  | "unsupported_option";

export interface ValidationIssue {
  field: string;
  code: IssueCode;
  message: string;
}

export type ErrorKind =
  | "ValidationError"
  | "NotFound"
  | "Ambiguous"
  | "KindMismatch"
  | "UnsupportedOption"
  | "ConflictError"
  | "BackendError"
  | "TimedOut";

export interface BackendPayload {
  status?: number;
  code?: string;
  message: string;
  errors?: Record<string, string>;
  data?: unknown;
}

export interface ErrorDetail {
  kind: ErrorKind;
  message: string;
  issues?: ValidationIssue[];
  candidates?: ResourceRef[];
  backend?: BackendPayload;
}

export type OutcomeStatus = "success" | "failed" | "timed_out";

export interface TaskSummary {
  upid: string;
  node: string;
  exitstatus?: string;
  elapsedMs: number;
}

export interface OperationOutcome {
  status: OutcomeStatus;
  result?: unknown;
  error?: ErrorDetail;
  task?: TaskSummary;
}
