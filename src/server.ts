import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Config } from "./config.js";
import type { Logger } from "./logger.js";
import type { VirtualizationBackend } from "./proxmox/backend.js";
import { GuestCommandRunner } from "./services/agent.js";
import { OperationDispatcher, type DispatchState } from "./services/dispatcher.js";
import { ResourceResolver } from "./services/resolver.js";
import { StorageProfileDetector } from "./services/storage.js";
import { TaskTracker, type Sleep } from "./services/tracker.js";
import { RequestValidator } from "./services/validator.js";
import { backupTools } from "./tools/backups.js";
import { clusterTools } from "./tools/cluster.js";
import { containerTools } from "./tools/containers.js";
import { isoTools } from "./tools/isos.js";
import { registerTools, type Tool, type ToolContext } from "./tools/registry.js";
import { snapshotTools } from "./tools/snapshots.js";
import { vmTools } from "./tools/vms.js";
import type { OperationRequest } from "./types.js";

export const SERVER_NAME = "pve-orchestrator-mcp";
export const SERVER_VERSION = "1.0.0";

export interface ServerDeps {
  backend: VirtualizationBackend;
  logger: Logger;
  tasks: Config["tasks"];
  /** Test seams for task and guest command polling. */
  sleep?: Sleep;
  now?: () => number;
  onStateChange?: (state: DispatchState, request: Readonly<OperationRequest>) => void;
}

export interface OrchestratorServer {
  server: McpServer;
  tools: Tool[];
  dispatcher: OperationDispatcher;
}

export function buildDispatcher(deps: ServerDeps): OperationDispatcher {
  const { backend, logger } = deps;
  const resolver = new ResourceResolver(backend, logger.child("resolver"));
  return new OperationDispatcher({
    backend,
    resolver,
    storage: new StorageProfileDetector(backend, logger.child("storage")),
    validator: new RequestValidator(resolver, logger.child("validator")),
    tracker: new TaskTracker({
      backend,
      logger: logger.child("tracker"),
      pollIntervalMs: deps.tasks.pollIntervalMs,
      sleep: deps.sleep,
      now: deps.now,
    }),
    logger: logger.child("dispatcher"),
    timeouts: { defaultSeconds: deps.tasks.timeoutSeconds, longSeconds: deps.tasks.longTimeoutSeconds },
    onStateChange: deps.onStateChange,
  });
}

export function buildAgent(deps: ServerDeps): GuestCommandRunner {
  return new GuestCommandRunner({
    backend: deps.backend,
    resolver: new ResourceResolver(deps.backend, deps.logger.child("resolver")),
    logger: deps.logger.child("agent"),
    pollIntervalMs: deps.tasks.pollIntervalMs,
    defaultTimeoutSeconds: deps.tasks.timeoutSeconds,
    sleep: deps.sleep,
    now: deps.now,
  });
}

export function buildTools(context: ToolContext): Tool[] {
  return [
    ...clusterTools(context),
    ...vmTools(context),
    ...containerTools(context),
    ...snapshotTools(context),
    ...backupTools(context),
    ...isoTools(context),
  ];
}

export function createServer(deps: ServerDeps): OrchestratorServer {
  const dispatcher = buildDispatcher(deps);
  const tools = buildTools({
    backend: deps.backend,
    dispatcher,
    agent: buildAgent(deps),
    logger: deps.logger.child("tools"),
  });

  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );
  registerTools(server, tools, deps.logger.child("mcp"));

  return { server, tools, dispatcher };
}
