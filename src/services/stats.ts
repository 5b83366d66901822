import type { Logger } from "../logger.js";
import type { VirtualizationBackend } from "../proxmox/backend.js";
import type { ContainerConfig, GuestStatus, RrdSample } from "../proxmox/types.js";

export interface ContainerStats {
  cores: number | null;
  /** Configured memory in MiB; 0 when neither the config nor RRD data name it. */
  memory: number;
  cpu_pct: number;
  mem_bytes: number;
  maxmem_bytes: number;
  mem_pct: number | null;
  unlimited_memory: boolean;
  raw_status?: GuestStatus;
  raw_config?: ContainerConfig;
}

const MIB = 1024 * 1024;

const round2 = (value: number) => Math.round(value * 100) / 100;

/**
 * Live CPU and memory figures for one container. Counters that read zero
 * (a stopped container, or a node that has not sampled yet) are filled from
 * the last hourly RRD sample. Reads that fail count as empty.
 */
export async function readContainerStats(
  backend: VirtualizationBackend,
  logger: Logger,
  node: string,
  vmid: number,
  includeRaw = false
): Promise<ContainerStats> {
  const base = `/nodes/${encodeURIComponent(node)}/lxc/${vmid}`;
  const read = async <T extends object>(path: string, params?: Record<string, string>): Promise<T | undefined> => {
    try {
      return await backend.request<T | undefined>({ method: "get", path: `${base}${path}`, params });
    } catch (error) {
      logger.debug("container stats read failed", { node, vmid, path, error });
      return undefined;
    }
  };

  const [status, config] = await Promise.all([read<GuestStatus>("/status/current"), read<ContainerConfig>("/config")]);

  let cpuPct = round2((status?.cpu ?? 0) * 100);
  let memBytes = status?.mem ?? 0;
  let maxmemBytes = status?.maxmem ?? 0;
  let memory = Number(config?.memory ?? 0) || 0;
  const unlimited = (config?.swap ?? 0) === 0 && memory === 0;

  const cpulimit = Number(config?.cpulimit ?? 0);
  const cores = config?.cores !== undefined ? Number(config.cores) : cpulimit > 0 ? cpulimit : null;

  if (memBytes === 0 || maxmemBytes === 0 || cpuPct === 0) {
    const samples = await read<RrdSample[]>("/rrddata", { timeframe: "hour", cf: "AVERAGE" });
    const last = samples?.[samples.length - 1];
    if (last) {
      if (cpuPct === 0 && last.cpu !== undefined) cpuPct = round2(last.cpu * 100);
      if (memBytes === 0 && last.mem !== undefined) memBytes = last.mem;
      if (maxmemBytes === 0 && last.maxmem) {
        maxmemBytes = last.maxmem;
        if (memory === 0) memory = Math.round(maxmemBytes / MIB);
      }
    }
  }

  return {
    cores,
    memory,
    cpu_pct: cpuPct,
    mem_bytes: memBytes,
    maxmem_bytes: maxmemBytes,
    mem_pct: maxmemBytes > 0 ? round2((memBytes / maxmemBytes) * 100) : null,
    unlimited_memory: unlimited,
    ...(includeRaw ? { raw_status: status ?? {}, raw_config: config ?? {} } : {}),
  };
}
