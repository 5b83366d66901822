import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z, type ZodRawShape } from "zod";
import { ValidationError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { VirtualizationBackend } from "../proxmox/backend.js";
import type { GuestCommandRunner } from "../services/agent.js";
import type { OperationDispatcher } from "../services/dispatcher.js";
import { failure, success } from "../services/normalizer.js";
import { collectIssues, fields } from "../services/validator.js";
import type { OperationOutcome, ResourceKind } from "../types.js";

export interface ToolContext {
  backend: VirtualizationBackend;
  dispatcher: OperationDispatcher;
  agent: GuestCommandRunner;
  logger: Logger;
}

export interface ToolCallOptions {
  signal?: AbortSignal;
}

export interface ToolDefinition<S extends ZodRawShape> {
  name: string;
  description: string;
  inputSchema: S;
  handler: (args: z.infer<z.ZodObject<S, "strip">>, options: ToolCallOptions) => Promise<OperationOutcome>;
}

/** A tool with its argument type erased, callable from MCP and from the REST surface alike. */
export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ZodRawShape;
  call(args: unknown, options?: ToolCallOptions): Promise<OperationOutcome>;
}

export function defineTool<S extends ZodRawShape>(definition: ToolDefinition<S>): Tool {
  const schema = z.object(definition.inputSchema);
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    async call(args, options = {}) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        return failure(new ValidationError(collectIssues(parsed.error)));
      }
      try {
        return await definition.handler(parsed.data, options);
      } catch (error) {
        if (options.signal?.aborted) throw error;
        return failure(error);
      }
    },
  };
}

/**
 * The shape handed to the MCP server. Every field also accepts any value, so
 * arguments always reach `Tool.call` and their issues come back as one outcome.
 */
function advertised(shape: ZodRawShape): ZodRawShape {
  const open: ZodRawShape = {};
  for (const [key, field] of Object.entries(shape)) {
    const loose = z.union([field, z.unknown()]);
    open[key] = field.description === undefined ? loose : loose.describe(field.description);
  }
  return open;
}

/** Guest ids arrive as numbers or as numeric strings. */
export const vmidArg = z.preprocess(
  (value) => (typeof value === "string" && /^\d+$/.test(value) ? Number(value) : value),
  fields.vmid
);

/** Wraps an immediate read into an outcome. */
export async function read(fetch: () => Promise<unknown>): Promise<OperationOutcome> {
  try {
    return success(await fetch());
  } catch (error) {
    return failure(error);
  }
}

// Tools take the Proxmox spelling of the guest type.
export const vmType = z.enum(["qemu", "lxc"]).optional().describe("Guest type: qemu (VM) or lxc (container)");

export function kindOf(type: "qemu" | "lxc" | undefined): ResourceKind | undefined {
  if (type === undefined) return undefined;
  return type === "lxc" ? "container" : "vm";
}

export function toToolResult(outcome: OperationOutcome): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(outcome, null, 2) }],
    ...(outcome.status !== "success" ? { isError: true } : {}),
  };
}

export function registerTools(server: McpServer, tools: readonly Tool[], logger: Logger): void {
  for (const tool of tools) {
    server.registerTool(
      tool.name,
      { description: tool.description, inputSchema: advertised(tool.inputSchema) },
      async (args, extra) => {
        const outcome = await tool.call(args, { signal: extra.signal });
        logger.debug("tool call finished", { tool: tool.name, status: outcome.status });
        return toToolResult(outcome);
      }
    );
  }
}
