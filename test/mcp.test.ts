import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { silentLogger } from "../src/logger.js";
import { createServer } from "../src/server.js";
import type { OperationOutcome } from "../src/types.js";
import { FakeBackend, LOCAL, LOCAL_LVM } from "./helpers.js";

describe("MCP tools", () => {
  let backend: FakeBackend;
  let client: Client;

  beforeEach(async () => {
    backend = new FakeBackend();
    backend.storage.set("pve", [LOCAL, LOCAL_LVM]);
    backend.addVm(100, "db");
    backend.addContainer(200, "web");
    backend.addContainer(201, "proxy");

    const { server } = createServer({
      backend,
      logger: silentLogger,
      tasks: { pollIntervalMs: 1500, timeoutSeconds: 30, longTimeoutSeconds: 60 },
      sleep: async () => undefined,
    });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: "test-client", version: "1.0.0" });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
  });

  async function call(name: string, args: Record<string, unknown>): Promise<{ outcome: OperationOutcome; isError: boolean }> {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const first = result.content[0];
    if (first?.type !== "text") throw new Error("expected a text result");
    const outcome: OperationOutcome = JSON.parse(first.text);
    return { outcome, isError: result.isError === true };
  }

  it("registers the full tool catalogue", async () => {
    const { tools } = await client.listTools();
    const names = tools.map((tool) => tool.name);
    expect(names).toHaveLength(34);
    expect(names).toEqual(
      expect.arrayContaining([
        "get_nodes",
        "get_task_status",
        "create_vm",
        "suspend_vm",
        "execute_vm_command",
        "create_container",
        "restart_container",
        "rollback_snapshot",
        "restore_backup",
        "download_iso",
      ])
    );
  });

  it("creates a VM and reports the storage-derived disk format", async () => {
    const { outcome, isError } = await call("create_vm", {
      node: "pve",
      vmid: 300,
      cpus: 2,
      memory: 2048,
      disk_size: 20,
      storage: "local-lvm",
    });

    expect(isError).toBe(false);
    expect(outcome.status).toBe("success");
    expect(outcome.result).toMatchObject({ vmid: 300, diskFormat: "raw", cloudInit: false });
  });

  it("flags every out-of-range field as an error result", async () => {
    const { outcome, isError } = await call("create_vm", {
      node: "pve",
      vmid: 300,
      cpus: 64,
      memory: 200,
      disk_size: 20,
    });

    expect(isError).toBe(true);
    expect(outcome.error?.kind).toBe("ValidationError");
    expect(outcome.error?.issues?.map((issue) => issue.field)).toEqual(["cpus", "memory"]);
  });

  it("starts several containers from a comma separated selector", async () => {
    const { outcome } = await call("start_container", { selector: "200, proxy" });

    expect(outcome.status).toBe("success");
    expect(backend.submitted.map((c) => c.path).sort()).toEqual([
      "/nodes/pve/lxc/200/status/start",
      "/nodes/pve/lxc/201/status/start",
    ]);
  });

  it("stops containers immediately by default", async () => {
    await call("stop_container", { selector: "web" });

    expect(backend.submitted[0]).toEqual({ method: "post", path: "/nodes/pve/lxc/200/status/stop", params: {} });
  });

  it("shuts containers down when asked to be graceful", async () => {
    await call("stop_container", { selector: "web", graceful: true, timeout_seconds: 20 });

    expect(backend.submitted[0]).toEqual({
      method: "post",
      path: "/nodes/pve/lxc/200/status/shutdown",
      params: { timeout: 20 },
    });
  });

  it("reports a wrong type and an out-of-range value in one result", async () => {
    const { outcome, isError } = await call("create_vm", {
      node: "pve",
      vmid: 300,
      cpus: "two",
      memory: 200,
      disk_size: 10,
    });

    expect(isError).toBe(true);
    expect(outcome.error?.issues?.map((issue) => [issue.field, issue.code])).toEqual([
      ["cpus", "invalid_type"],
      ["memory", "out_of_range"],
    ]);
  });

  it("accepts guest ids given as numeric strings", async () => {
    const { outcome } = await call("create_vm", {
      node: "pve",
      vmid: "300",
      cpus: 1,
      memory: 1024,
      disk_size: 10,
      storage: "local-lvm",
    });

    expect(outcome.status).toBe("success");
    expect(backend.submitted[0]).toMatchObject({ path: "/nodes/pve/qemu", params: { vmid: 300 } });
  });

  it("restores with fresh unique properties unless told otherwise", async () => {
    const { outcome } = await call("restore_backup", {
      node: "pve",
      archive: "local:backup/vzdump-qemu-100-2024_05_01-10_00_00.vma.zst",
      vmid: "300",
    });

    expect(outcome.status).toBe("success");
    expect(backend.submitted[0]).toMatchObject({ path: "/nodes/pve/qemu", params: { vmid: 300, unique: 1 } });
  });

  it("reports a kind mismatch when a container tool targets a VM", async () => {
    const { outcome, isError } = await call("start_container", { selector: "100" });

    expect(isError).toBe(true);
    expect(outcome.error).toMatchObject({ kind: "KindMismatch", message: "100 on pve is a vm, not a container" });
  });

  it("passes status reads through", async () => {
    const { outcome } = await call("get_containers", { node: "pve", include_stats: false });

    expect(outcome.result).toEqual([
      { id: "lxc/200", type: "lxc", node: "pve", vmid: 200, name: "web", status: "stopped" },
      { id: "lxc/201", type: "lxc", node: "pve", vmid: 201, name: "proxy", status: "stopped" },
    ]);
  });

  it("adds live figures to containers by default", async () => {
    backend.routes.set("get /nodes/pve/lxc/200/status/current", {
      status: "running",
      cpu: 0.125,
      mem: 268435456,
      maxmem: 1073741824,
    });
    backend.routes.set("get /nodes/pve/lxc/200/config", { hostname: "web", memory: 1024, swap: 512, cores: 2 });
    backend.routes.set("get /nodes/pve/lxc/201/status/current", { status: "stopped", cpu: 0, mem: 0, maxmem: 0 });
    backend.routes.set("get /nodes/pve/lxc/201/config", { hostname: "proxy", memory: 512, swap: 0 });
    backend.routes.set("get /nodes/pve/lxc/201/rrddata", [{ time: 1, cpu: 0.01, mem: 1048576, maxmem: 536870912 }]);

    const { outcome } = await call("get_containers", {});

    expect(outcome.result).toEqual([
      {
        id: "lxc/200",
        type: "lxc",
        node: "pve",
        vmid: 200,
        name: "web",
        status: "stopped",
        cores: 2,
        memory: 1024,
        cpu_pct: 12.5,
        mem_bytes: 268435456,
        maxmem_bytes: 1073741824,
        mem_pct: 25,
        unlimited_memory: false,
      },
      {
        id: "lxc/201",
        type: "lxc",
        node: "pve",
        vmid: 201,
        name: "proxy",
        status: "stopped",
        cores: null,
        memory: 512,
        cpu_pct: 1,
        mem_bytes: 1048576,
        maxmem_bytes: 536870912,
        mem_pct: 0.2,
        unlimited_memory: false,
      },
    ]);
  });

  it("runs a command through the guest agent", async () => {
    backend.routes.set("post /nodes/pve/qemu/100/agent/exec", { pid: 42 });
    backend.routes.set("get /nodes/pve/qemu/100/agent/exec-status", {
      exited: 1,
      exitcode: 0,
      "out-data": "Linux\n",
    });

    const { outcome } = await call("execute_vm_command", { node: "pve", vmid: "100", command: "uname" });

    expect(outcome).toEqual({
      status: "success",
      result: { node: "pve", vmid: 100, pid: 42, exitcode: 0, stdout: "Linux\n", stderr: "", truncated: false },
    });
  });

  it("reports an unknown task as not found", async () => {
    backend.pollScripts.set("UPID:pve:gone", ["vanished"]);

    const { outcome } = await call("get_task_status", { node: "pve", upid: "UPID:pve:gone" });

    expect(outcome.error).toEqual({ kind: "NotFound", message: "Task UPID:pve:gone not found on node pve" });
  });
});
