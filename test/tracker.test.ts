import { describe, expect, it, vi } from "vitest";
import { ConflictError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { BackendRequestError } from "../src/proxmox/backend.js";
import { TaskTracker, type Sleep } from "../src/services/tracker.js";
import type { TaskHandle } from "../src/types.js";
import { FakeBackend, running, stopped } from "./helpers.js";

const UPID = "UPID:pve:0000A1B2:00C0FFEE:66000000:qmstart:100:root@pam:";
const handle: TaskHandle = { node: "pve", upid: UPID, submittedAt: 0 };

function setup(sleepHook?: Sleep) {
  const backend = new FakeBackend();
  let clock = 0;
  const tracker = new TaskTracker({
    backend,
    logger: silentLogger,
    pollIntervalMs: 1500,
    now: () => clock,
    sleep: async (ms, signal) => {
      clock += ms;
      await sleepHook?.(ms, signal);
    },
  });
  return { backend, tracker };
}

describe("TaskTracker", () => {
  it("polls at a fixed interval until the task stops with OK", async () => {
    const { backend, tracker } = setup();
    backend.pollScripts.set(UPID, [running(UPID), running(UPID), stopped(UPID, "OK")]);

    const outcome = await tracker.track(handle, 60);

    expect(outcome).toEqual({
      status: "success",
      task: { upid: UPID, node: "pve", exitstatus: "OK", elapsedMs: 3000 },
    });
    expect(backend.polled).toHaveLength(3);
  });

  it("treats a warnings exit status as success and reports the warnings", async () => {
    const { backend, tracker } = setup();
    backend.pollScripts.set(UPID, [stopped(UPID, "WARNINGS: 2")]);

    const outcome = await tracker.track(handle, 60);

    expect(outcome.status).toBe("success");
    expect(outcome.result).toEqual({ warnings: "WARNINGS: 2" });
  });

  it("says the task was left running when its status cannot be read", async () => {
    const { backend, tracker } = setup();
    vi.spyOn(backend, "pollTask").mockRejectedValueOnce(new BackendRequestError("Service Unavailable", { status: 503 }));

    const outcome = await tracker.track(handle, 60);

    expect(outcome).toEqual({
      status: "failed",
      error: {
        kind: "BackendError",
        message: `Service Unavailable. Task ${UPID} was not cancelled and may still complete; re-check the resource state.`,
        backend: { message: "Service Unavailable", status: 503 },
      },
      task: { upid: UPID, node: "pve", elapsedMs: 0 },
    });
  });

  it("classifies a failing exit status", async () => {
    const { backend, tracker } = setup();
    backend.pollScripts.set(UPID, [stopped(UPID, "can't lock file '/var/lock/qemu-server/lock-100.conf' - got timeout")]);

    const outcome = await tracker.track(handle, 60);

    expect(outcome.status).toBe("failed");
    expect(outcome.error?.kind).toBe("ConflictError");
    expect(outcome.task?.exitstatus).toBe("can't lock file '/var/lock/qemu-server/lock-100.conf' - got timeout");
  });

  it("reports other exit statuses as backend errors", async () => {
    const { backend, tracker } = setup();
    backend.pollScripts.set(UPID, [stopped(UPID, "command 'qmrestore' failed: exit code 255")]);

    const outcome = await tracker.track(handle, 60);

    expect(outcome.error).toMatchObject({ kind: "BackendError", message: "command 'qmrestore' failed: exit code 255" });
  });

  it("fails when the task vanishes", async () => {
    const { backend, tracker } = setup();
    backend.pollScripts.set(UPID, [running(UPID), "vanished"]);

    const outcome = await tracker.track(handle, 60);

    expect(outcome.status).toBe("failed");
    expect(outcome.error).toMatchObject({ kind: "BackendError", message: "task vanished" });
  });

  it("times out without touching the task", async () => {
    const { backend, tracker } = setup();
    backend.pollScripts.set(UPID, [running(UPID)]);

    const outcome = await tracker.track(handle, 3);

    expect(outcome.status).toBe("timed_out");
    expect(outcome.error?.kind).toBe("TimedOut");
    expect(outcome.task).toEqual({ upid: UPID, node: "pve", elapsedMs: 3000 });
    expect(backend.polled).toHaveLength(3);
    expect(backend.submitted).toHaveLength(0);
  });

  it("stops polling when the signal aborts", async () => {
    const controller = new AbortController();
    const { backend, tracker } = setup(async () => {
      controller.abort(new Error("client went away"));
    });
    backend.pollScripts.set(UPID, [running(UPID)]);

    await expect(tracker.track(handle, 60, controller.signal)).rejects.toThrow("client went away");
    expect(backend.polled).toHaveLength(1);
  });

  it("refuses to track the same task twice at once", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { backend, tracker } = setup(() => gate);
    backend.pollScripts.set(UPID, [running(UPID)]);

    const first = tracker.track(handle, 1);
    await expect(tracker.track(handle, 1)).rejects.toBeInstanceOf(ConflictError);

    release();
    await expect(first).resolves.toMatchObject({ status: "timed_out" });
    backend.pollScripts.set(UPID, [stopped(UPID, "OK")]);
    await expect(tracker.track(handle, 1)).resolves.toMatchObject({ status: "success" });
  });
});
