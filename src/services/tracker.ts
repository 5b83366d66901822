import { setTimeout as delay } from "node:timers/promises";
import { ConflictError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { VirtualizationBackend } from "../proxmox/backend.js";
import type { TaskStatus } from "../proxmox/types.js";
import type { OperationOutcome, TaskHandle, TaskSummary } from "../types.js";
import { classifyMessage, failure, interrupted, success, timedOut } from "./normalizer.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface TaskTrackerOptions {
  backend: VirtualizationBackend;
  logger: Logger;
  pollIntervalMs: number;
  sleep?: Sleep;
  now?: () => number;
}

const WARNINGS = /^WARNINGS: \d+/;

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Follows a Proxmox task until it stops, times out or the caller gives up.
 *
 * A timed-out task is left running on the node; the outcome only reports that
 * the wait ended.
 */
export class TaskTracker {
  private readonly backend: VirtualizationBackend;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly active = new Set<string>();

  constructor(options: TaskTrackerOptions) {
    this.backend = options.backend;
    this.logger = options.logger;
    this.pollIntervalMs = options.pollIntervalMs;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async track(handle: TaskHandle, timeoutSeconds: number, signal?: AbortSignal): Promise<OperationOutcome> {
    if (this.active.has(handle.upid)) {
      throw new ConflictError(`Task ${handle.upid} is already being tracked`);
    }
    this.active.add(handle.upid);
    try {
      return await this.poll(handle, timeoutSeconds, signal);
    } finally {
      this.active.delete(handle.upid);
    }
  }

  private async poll(handle: TaskHandle, timeoutSeconds: number, signal?: AbortSignal): Promise<OperationOutcome> {
    const started = this.now();
    const deadline = started + timeoutSeconds * 1000;

    for (;;) {
      signal?.throwIfAborted();
      let status: TaskStatus | undefined;
      try {
        status = await this.backend.pollTask(handle.node, handle.upid);
      } catch (error) {
        if (signal?.aborted) throw error;
        const elapsedMs = this.now() - started;
        this.logger.warn("task poll failed", { upid: handle.upid, node: handle.node, error });
        return interrupted(error, `Task ${handle.upid}`, { upid: handle.upid, node: handle.node, elapsedMs });
      }
      const elapsedMs = this.now() - started;

      if (status === undefined) {
        this.logger.warn("task vanished", { upid: handle.upid, node: handle.node });
        return failure(classifyMessage("task vanished"), { upid: handle.upid, node: handle.node, elapsedMs });
      }

      if (status.status === "stopped") {
        const exitstatus = status.exitstatus ?? "unknown";
        const summary: TaskSummary = { upid: handle.upid, node: handle.node, exitstatus, elapsedMs };
        this.logger.debug("task finished", { upid: handle.upid, exitstatus, elapsedMs });
        if (exitstatus === "OK") return success(undefined, summary);
        if (WARNINGS.test(exitstatus)) return success({ warnings: exitstatus }, summary);
        return failure(classifyMessage(exitstatus), summary);
      }

      if (this.now() >= deadline) {
        this.logger.info("gave up waiting for task", { upid: handle.upid, timeoutSeconds });
        return timedOut(handle, timeoutSeconds, elapsedMs);
      }
      await this.sleep(this.pollIntervalMs, signal);
    }
  }
}
