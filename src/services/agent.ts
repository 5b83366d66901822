import { BackendError, TimedOutError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { VirtualizationBackend } from "../proxmox/backend.js";
import type { AgentExecStatus } from "../proxmox/types.js";
import type { OperationOutcome } from "../types.js";
import { failure, interrupted, success } from "./normalizer.js";
import type { ResourceResolver } from "./resolver.js";
import { defaultSleep, type Sleep } from "./tracker.js";

export interface GuestCommandRunnerOptions {
  backend: VirtualizationBackend;
  resolver: ResourceResolver;
  logger: Logger;
  pollIntervalMs: number;
  defaultTimeoutSeconds: number;
  sleep?: Sleep;
  now?: () => number;
}

export interface GuestCommand {
  node: string;
  vmid: number;
  command: string;
}

const flag = (value: number | boolean | undefined) => value === true || value === 1;

/**
 * Runs shell commands inside a VM through the QEMU guest agent. `agent/exec`
 * answers with a pid, not a task UPID, so completion is read from
 * `agent/exec-status` on the same fixed interval as tasks.
 */
export class GuestCommandRunner {
  private readonly backend: VirtualizationBackend;
  private readonly resolver: ResourceResolver;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly defaultTimeoutSeconds: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(options: GuestCommandRunnerOptions) {
    this.backend = options.backend;
    this.resolver = options.resolver;
    this.logger = options.logger;
    this.pollIntervalMs = options.pollIntervalMs;
    this.defaultTimeoutSeconds = options.defaultTimeoutSeconds;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async run(
    request: GuestCommand,
    { signal, timeoutSeconds = this.defaultTimeoutSeconds }: { signal?: AbortSignal; timeoutSeconds?: number } = {}
  ): Promise<OperationOutcome> {
    let pid: number;
    let base: string;
    try {
      const ref = await this.resolver.resolve(`${request.node}:${request.vmid}`, "vm");
      base = `/nodes/${encodeURIComponent(ref.node)}/qemu/${ref.id}/agent`;
      const started = await this.backend.request<{ pid?: number } | undefined>({
        method: "post",
        path: `${base}/exec`,
        params: { command: ["/bin/sh", "-c", request.command] },
      });
      if (started?.pid === undefined) {
        throw new BackendError("Guest agent did not return a process id");
      }
      pid = started.pid;
    } catch (error) {
      if (signal?.aborted) throw error;
      return failure(error);
    }

    this.logger.debug("guest command started", { node: request.node, vmid: request.vmid, pid });
    const subject = `Command ${pid} in VM ${request.vmid}`;
    const facts = { node: request.node, vmid: request.vmid, pid };
    const deadline = this.now() + timeoutSeconds * 1000;

    for (;;) {
      signal?.throwIfAborted();
      let status: AgentExecStatus | undefined;
      try {
        status = await this.backend.request<AgentExecStatus | undefined>({
          method: "get",
          path: `${base}/exec-status`,
          params: { pid },
        });
      } catch (error) {
        if (signal?.aborted) throw error;
        this.logger.warn("guest command status failed", { ...facts, error });
        return { ...interrupted(error, subject), result: facts };
      }

      if (status && flag(status.exited)) {
        return success({
          ...facts,
          exitcode: status.exitcode ?? null,
          ...(status.signal !== undefined ? { signal: status.signal } : {}),
          stdout: status["out-data"] ?? "",
          stderr: status["err-data"] ?? "",
          truncated: flag(status["out-truncated"]) || flag(status["err-truncated"]),
        });
      }

      if (this.now() >= deadline) {
        return {
          status: "timed_out",
          error: new TimedOutError(
            `${subject} did not finish within ${timeoutSeconds}s. ` +
              "It was not cancelled and may still complete; re-check the resource state."
          ).toDetail(),
          result: facts,
        };
      }
      await this.sleep(this.pollIntervalMs, signal);
    }
  }
}
