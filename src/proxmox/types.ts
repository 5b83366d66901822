// Type definitions for Proxmox API responses

export interface ProxmoxResponse<T> {
  data?: T;
  errors?: Record<string, string>;
  message?: string;
}

export interface Ticket {
  ticket: string;
  CSRFPreventionToken: string;
  username?: string;
}

export interface NodeSummary {
  node: string;
  status: "online" | "offline" | "unknown";
  cpu?: number;
  maxcpu?: number;
  mem?: number;
  maxmem?: number;
  disk?: number;
  maxdisk?: number;
  uptime?: number;
}

export interface StoragePool {
  storage: string;
  type: string;
  /** Comma separated content types, e.g. `images,rootdir`. */
  content?: string;
  active?: number;
  enabled?: number;
  shared?: number;
  avail?: number;
  used?: number;
  total?: number;
}

/** One row of `GET /cluster/resources?type=vm`. */
export interface ClusterResource {
  id: string;
  type: "qemu" | "lxc";
  node: string;
  vmid: number;
  name?: string;
  status?: string;
  template?: number;
  lock?: string;
}

export interface TaskStatus {
  upid: string;
  node: string;
  status: "running" | "stopped";
  exitstatus?: string;
  type?: string;
  id?: string;
  user?: string;
  starttime?: number;
  pid?: number;
}

export interface SnapshotEntry {
  name: string;
  description?: string;
  parent?: string;
  snaptime?: number;
  vmstate?: number;
}

export interface StorageContentItem {
  volid: string;
  content: string;
  format?: string;
  size?: number;
  ctime?: number;
  vmid?: number;
  notes?: string;
  protected?: number | boolean;
}

/** `GET .../status/current` of a guest. CPU is a fraction of one core set. */
export interface GuestStatus {
  status?: string;
  cpu?: number;
  mem?: number;
  maxmem?: number;
  uptime?: number;
}

export interface ContainerConfig {
  hostname?: string;
  memory?: number;
  swap?: number;
  cores?: number;
  cpulimit?: number | string;
}

export interface RrdSample {
  time?: number;
  cpu?: number;
  mem?: number;
  maxmem?: number;
}

export interface AgentExecStatus {
  exited?: number | boolean;
  exitcode?: number;
  signal?: number;
  "out-data"?: string;
  "err-data"?: string;
  "out-truncated"?: number | boolean;
  "err-truncated"?: number | boolean;
}
