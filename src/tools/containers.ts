import { z } from "zod";
import { ValidationError } from "../errors.js";
import { failure } from "../services/normalizer.js";
import { fields } from "../services/validator.js";
import type { OperationOutcome, PowerRequest } from "../types.js";
import { defineTool, vmidArg, type Tool, type ToolCallOptions, type ToolContext } from "./registry.js";

const selectorHelp =
  "Container selector: ID ('200'), node and ID ('pve1:200'), node and name ('pve1/web') or name ('web'). " +
  "Comma separate several";

const RANK: Record<OperationOutcome["status"], number> = { success: 0, timed_out: 1, failed: 2 };

export function splitSelectors(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Folds per-target outcomes into one: the worst status wins and the first
 * error of that status is surfaced. Every target's outcome is kept in the result.
 */
export function combineOutcomes(targets: string[], outcomes: OperationOutcome[]): OperationOutcome {
  if (outcomes.length === 1) return outcomes[0];
  const status = outcomes.reduce<OperationOutcome["status"]>(
    (worst, o) => (RANK[o.status] > RANK[worst] ? o.status : worst),
    "success"
  );
  const error = outcomes.find((o) => o.status === status)?.error;
  return {
    status,
    result: { targets: outcomes.map((outcome, i) => ({ selector: targets[i], ...outcome })) },
    ...(error ? { error } : {}),
  };
}

export function containerTools({ dispatcher }: ToolContext): Tool[] {
  const powerEach = async (
    selector: string,
    build: (target: string) => PowerRequest,
    options: ToolCallOptions
  ): Promise<OperationOutcome> => {
    const targets = splitSelectors(selector);
    if (targets.length === 0) {
      return failure(
        new ValidationError([{ field: "selector", code: "required", message: "at least one selector is required" }])
      );
    }
    const outcomes = await Promise.all(targets.map((target) => dispatcher.run(build(target), options)));
    return combineOutcomes(targets, outcomes);
  };

  return [
    defineTool({
      name: "create_container",
      description: "Create an LXC container from a template",
      inputSchema: {
        node: fields.nonEmpty.describe("Node to create the container on"),
        vmid: vmidArg.describe("Container ID, e.g. 200 or '200'"),
        hostname: fields.dnsName.describe("Container hostname"),
        ostemplate: fields.nonEmpty.describe(
          "Template volume, e.g. local:vztmpl/debian-12-standard_12.2-1_amd64.tar.zst"
        ),
        cpus: fields.cpus.describe("CPU cores (1-32)"),
        memory: fields.memory.describe("Memory in MB (512-131072)"),
        disk_size: fields.diskSize.describe("Root disk size in GB (5-1000)"),
        storage: fields.nonEmpty
          .optional()
          .describe("Storage pool; the first pool accepting container volumes when omitted"),
        swap: fields.swap.optional().describe("Swap in MB (default 512)"),
        password: fields.password.optional().describe("Root password"),
        ssh_public_keys: fields.nonEmpty.optional().describe("SSH public keys for root, one per line"),
        unprivileged: z.boolean().optional().describe("Create an unprivileged container (default true)"),
      },
      handler: (params, { signal }) => dispatcher.run({ op: "create", kind: "container", params }, { signal }),
    }),

    defineTool({
      name: "delete_container",
      description: "Delete a container. A running container is only deleted with force, after being stopped",
      inputSchema: {
        selector: fields.nonEmpty.describe("Container selector: ID, node:ID, node/name or name"),
        force: z.boolean().optional().describe("Stop the container first if it is running"),
        purge: z.boolean().optional().describe("Also remove the container from backup jobs and HA"),
      },
      handler: ({ selector, force, purge }, { signal }) =>
        dispatcher.run(
          { op: "delete", target: selector, kind: "container", force: force ?? false, purge: purge ?? false },
          { signal }
        ),
    }),

    defineTool({
      name: "start_container",
      description: "Start one or more containers",
      inputSchema: {
        selector: z.string().describe(selectorHelp),
      },
      handler: ({ selector }, options) =>
        powerEach(selector, (target) => ({ op: "power", action: "start", target, kind: "container" }), options),
    }),

    defineTool({
      name: "stop_container",
      description: "Stop one or more containers, immediately or with a graceful shutdown",
      inputSchema: {
        selector: z.string().describe(selectorHelp),
        graceful: z
          .boolean()
          .optional()
          .describe("Shut down cleanly instead of stopping at once (default false: immediate stop)"),
        timeout_seconds: fields.timeout.optional().describe("Seconds to wait for a graceful shutdown (1-600)"),
      },
      handler: ({ selector, graceful, timeout_seconds }, options) =>
        powerEach(
          selector,
          (target) =>
            graceful === true
              ? { op: "power", action: "shutdown", target, kind: "container", timeout: timeout_seconds }
              : { op: "power", action: "stop", target, kind: "container" },
          options
        ),
    }),

    defineTool({
      name: "restart_container",
      description: "Reboot one or more containers",
      inputSchema: {
        selector: z.string().describe(selectorHelp),
        timeout_seconds: fields.timeout.optional().describe("Seconds to wait for the shutdown part (1-600)"),
      },
      handler: ({ selector, timeout_seconds }, options) =>
        powerEach(
          selector,
          (target) => ({ op: "power", action: "reboot", target, kind: "container", timeout: timeout_seconds }),
          options
        ),
    }),
  ];
}
