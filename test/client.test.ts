import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import { describe, expect, it } from "vitest";
import type { ProxmoxAuth } from "../src/config.js";
import { silentLogger } from "../src/logger.js";
import { BackendRequestError } from "../src/proxmox/backend.js";
import { ProxmoxClient } from "../src/proxmox/client.js";

type Reply = { status: number; statusText?: string; data?: unknown } | Error;

const TOKEN: ProxmoxAuth = { type: "token", user: "root@pam", tokenName: "ci", tokenValue: "test-secret" };
const PASSWORD: ProxmoxAuth = { type: "password", user: "root@pam", password: "test-secret" };

function fakeProxmox(auth: ProxmoxAuth, reply: (config: InternalAxiosRequestConfig) => Reply) {
  const seen: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config): Promise<AxiosResponse> => {
      seen.push(config);
      const answer = reply(config);
      if (answer instanceof Error) throw answer;
      return {
        data: answer.data,
        status: answer.status,
        statusText: answer.statusText ?? "",
        headers: {},
        config,
      };
    },
  });
  const client = new ProxmoxClient({
    host: "pve.test",
    port: 8006,
    auth,
    verifySsl: true,
    timeoutMs: 1000,
    logger: silentLogger,
    http,
  });
  return { client, seen };
}

function path(config: InternalAxiosRequestConfig): string {
  return (config.url ?? "").replace("https://pve.test:8006/api2/json", "");
}

describe("ProxmoxClient", () => {
  it("authenticates with an API token and sends GET params as a query", async () => {
    const { client, seen } = fakeProxmox(TOKEN, () => ({
      status: 200,
      data: { data: [{ id: "qemu/100", type: "qemu", node: "pve", vmid: 100, name: "db" }] },
    }));

    const resources = await client.listResources();

    expect(resources).toEqual([{ id: "qemu/100", type: "qemu", node: "pve", vmid: 100, name: "db" }]);
    expect(seen[0].url).toBe("https://pve.test:8006/api2/json/cluster/resources");
    expect(seen[0].params).toEqual({ type: "vm" });
    expect(seen[0].headers.get("Authorization")).toBe("PVEAPIToken=root@pam!ci=test-secret");
  });

  it("sends POST params as the body without undefined entries", async () => {
    const { client, seen } = fakeProxmox(TOKEN, () => ({ status: 200, data: { data: "UPID:pve:1" } }));

    const upid = await client.submitTask({
      method: "post",
      path: "/nodes/pve/qemu/100/status/shutdown",
      params: { timeout: 30, forceStop: undefined },
    });

    expect(upid).toBe("UPID:pve:1");
    expect(typeof seen[0].data === "string" ? JSON.parse(seen[0].data) : seen[0].data).toEqual({ timeout: 30 });
  });

  it("sends DELETE params as a query", async () => {
    const { client, seen } = fakeProxmox(TOKEN, () => ({ status: 200, data: { data: null } }));

    const upid = await client.submitTask({ method: "delete", path: "/nodes/pve/qemu/100", params: { purge: 1 } });

    expect(upid).toBeNull();
    expect(seen[0].method).toBe("delete");
    expect(seen[0].params).toEqual({ purge: 1 });
  });

  it("raises the status text of a failed call", async () => {
    const { client } = fakeProxmox(TOKEN, () => ({ status: 500, statusText: "VM 100 is locked (backup)", data: { data: null } }));

    const error = await client.request({ method: "post", path: "/nodes/pve/qemu/100/status/start" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendRequestError);
    expect(error).toMatchObject({ message: "VM 100 is locked (backup)", status: 500 });
  });

  it("joins a parameter error map into the message", async () => {
    const { client } = fakeProxmox(TOKEN, () => ({
      status: 400,
      statusText: "Parameter verification failed.",
      data: { data: null, errors: { memory: "value must have a minimum value of 16" } },
    }));

    const error = await client.request({ method: "post", path: "/nodes/pve/qemu" }).catch((e: unknown) => e);

    expect(error).toMatchObject({
      message: "memory: value must have a minimum value of 16",
      status: 400,
      errors: { memory: "value must have a minimum value of 16" },
    });
  });

  it("marks network failures as transient", async () => {
    const { client } = fakeProxmox(TOKEN, () => new AxiosError("connect ECONNREFUSED 10.0.0.1:8006", "ECONNREFUSED"));

    const error = await client.listNodes().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendRequestError);
    expect(error).toMatchObject({
      message: "Proxmox API unreachable: connect ECONNREFUSED 10.0.0.1:8006",
      code: "ECONNREFUSED",
      transient: true,
    });
  });

  it("treats an unknown task as vanished", async () => {
    const { client } = fakeProxmox(TOKEN, () => ({
      status: 500,
      statusText: "unable to open file '/var/log/pve/tasks/active' - No such file or directory",
    }));

    await expect(client.pollTask("pve", "UPID:pve:1")).resolves.toBeUndefined();
  });

  it("shares one ticket between concurrent calls and renews it on 401", async () => {
    let tickets = 0;
    let rejectNext = false;
    const { client, seen } = fakeProxmox(PASSWORD, (config) => {
      if (path(config) === "/access/ticket") {
        tickets += 1;
        return { status: 200, data: { data: { ticket: `PVE:ticket-${tickets}`, CSRFPreventionToken: `csrf-${tickets}` } } };
      }
      if (rejectNext) {
        rejectNext = false;
        return { status: 401, statusText: "authentication failure" };
      }
      return { status: 200, data: { data: [] } };
    });

    await Promise.all([client.listNodes(), client.listResources()]);
    expect(tickets).toBe(1);

    rejectNext = true;
    await client.listNodes();
    expect(tickets).toBe(2);

    const last = seen[seen.length - 1];
    expect(last.headers.get("Cookie")).toBe("PVEAuthCookie=PVE:ticket-2");
    expect(last.headers.get("CSRFPreventionToken")).toBe("csrf-2");
  });

  it("reports a failed login", async () => {
    const { client } = fakeProxmox(PASSWORD, () => ({ status: 401, statusText: "authentication failure" }));

    await expect(client.listNodes()).rejects.toThrow("Authentication failed: failed to get authentication ticket");
  });
});
