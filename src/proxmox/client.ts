import axios, { AxiosError, type AxiosInstance, type AxiosResponse } from "axios";
import { Agent } from "node:https";
import type { ProxmoxAuth } from "../config.js";
import type { Logger } from "../logger.js";
import { BackendRequestError, type BackendCall, type VirtualizationBackend } from "./backend.js";
import type { ClusterResource, NodeSummary, ProxmoxResponse, StoragePool, TaskStatus, Ticket } from "./types.js";

export interface ProxmoxClientOptions {
  host: string;
  port: number;
  auth: ProxmoxAuth;
  verifySsl: boolean;
  timeoutMs: number;
  logger: Logger;
  /** Preconfigured axios instance; one is created when omitted. */
  http?: AxiosInstance;
}

// Proxmox answers a poll for an unknown UPID with a 500 about the task log file.
const VANISHED_TASK = /no such task|unable to open file|task .* does not exist/i;

function formatErrors(errors: Record<string, string>): string {
  return Object.entries(errors)
    .map(([k, v]) => `${k}: ${v}`)
    .join("; ");
}

/**
 * Proxmox VE API client. Authenticates with an API token, or with a ticket
 * that is fetched once, shared by concurrent callers and refreshed on 401.
 */
export class ProxmoxClient implements VirtualizationBackend {
  private readonly http: AxiosInstance;
  private readonly apiBase: string;
  private readonly auth: ProxmoxAuth;
  private readonly logger: Logger;
  private ticketPromise?: Promise<Ticket>;

  constructor(options: ProxmoxClientOptions) {
    this.apiBase = `https://${options.host}:${options.port}/api2/json`;
    this.auth = options.auth;
    this.logger = options.logger;
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs,
        httpsAgent: options.verifySsl ? undefined : new Agent({ rejectUnauthorized: false }),
      });
  }

  listNodes(): Promise<NodeSummary[]> {
    return this.request<NodeSummary[]>({ method: "get", path: "/nodes" });
  }

  listStorage(node: string): Promise<StoragePool[]> {
    return this.request<StoragePool[]>({ method: "get", path: `/nodes/${encodeURIComponent(node)}/storage` });
  }

  listResources(): Promise<ClusterResource[]> {
    return this.request<ClusterResource[]>({ method: "get", path: "/cluster/resources", params: { type: "vm" } });
  }

  async submitTask(call: BackendCall): Promise<string | null> {
    const result = await this.request<unknown>(call);
    // Proxmox returns a UPID string on success; some deletes return null.
    return typeof result === "string" && result.length > 0 ? result : null;
  }

  async pollTask(node: string, upid: string): Promise<TaskStatus | undefined> {
    try {
      return await this.request<TaskStatus>({
        method: "get",
        path: `/nodes/${encodeURIComponent(node)}/tasks/${encodeURIComponent(upid)}/status`,
      });
    } catch (error) {
      if (error instanceof BackendRequestError && (error.status === 404 || VANISHED_TASK.test(error.message))) {
        return undefined;
      }
      throw error;
    }
  }

  async request<T>(call: BackendCall): Promise<T> {
    let response = await this.send<T>(call, await this.authHeaders());
    if (response.status === 401 && this.auth.type === "password") {
      this.logger.debug("ticket rejected, re-authenticating");
      this.ticketPromise = undefined;
      response = await this.send<T>(call, await this.authHeaders());
    }

    if (response.status < 400 && response.data?.data !== undefined) {
      return response.data.data;
    }

    // Check if this is an error response (no data but has errors or non-2xx status)
    if (response.status >= 400 || response.data?.errors) {
      const errors = response.data?.errors;
      const reason = errors
        ? formatErrors(errors)
        : response.statusText || response.data?.message || `Request failed with status ${response.status}`;
      throw new BackendRequestError(reason, { status: response.status, errors, data: response.data });
    }

    // Some endpoints return no data on success (e.g. DELETE)
    return undefined as T;
  }

  private async send<T>(
    call: BackendCall,
    headers: Record<string, string>
  ): Promise<AxiosResponse<ProxmoxResponse<T> | undefined>> {
    const params = call.params
      ? Object.fromEntries(Object.entries(call.params).filter(([, v]) => v !== undefined))
      : undefined;
    try {
      return await this.http.request<ProxmoxResponse<T> | undefined>({
        method: call.method,
        url: `${this.apiBase}${call.path}`,
        // GET and DELETE params go as query string; POST/PUT as request body
        ...(call.method === "get" || call.method === "delete" ? { params } : { data: params ?? {} }),
        headers,
        validateStatus: () => true,
      });
    } catch (error) {
      const axiosError = error instanceof AxiosError ? error : undefined;
      throw new BackendRequestError(`Proxmox API unreachable: ${axiosError?.message ?? String(error)}`, {
        code: axiosError?.code,
      });
    }
  }

  private async authHeaders(): Promise<Record<string, string>> {
    if (this.auth.type === "token") {
      return { Authorization: `PVEAPIToken=${this.auth.user}!${this.auth.tokenName}=${this.auth.tokenValue}` };
    }
    const ticket = await this.ticket();
    return {
      Cookie: `PVEAuthCookie=${ticket.ticket}`,
      CSRFPreventionToken: ticket.CSRFPreventionToken,
    };
  }

  private ticket(): Promise<Ticket> {
    if (!this.ticketPromise) {
      this.ticketPromise = this.fetchTicket().catch((error: unknown) => {
        this.ticketPromise = undefined;
        throw error;
      });
    }
    return this.ticketPromise;
  }

  private async fetchTicket(): Promise<Ticket> {
    if (this.auth.type !== "password") {
      throw new Error("ticket authentication requires a password");
    }
    let response: AxiosResponse<ProxmoxResponse<Ticket> | undefined>;
    try {
      response = await this.http.post<ProxmoxResponse<Ticket> | undefined>(
        `${this.apiBase}/access/ticket`,
        { username: this.auth.user, password: this.auth.password },
        { validateStatus: () => true }
      );
    } catch (error) {
      throw new BackendRequestError(
        `Authentication failed: ${error instanceof Error ? error.message : String(error)}`,
        { code: error instanceof AxiosError ? error.code : undefined }
      );
    }

    const ticket = response.data?.data;
    if (response.status >= 400 || !ticket) {
      throw new BackendRequestError("Authentication failed: failed to get authentication ticket", {
        status: response.status >= 400 ? response.status : 401,
      });
    }
    this.logger.debug("authenticated", { user: this.auth.user });
    return ticket;
  }
}
