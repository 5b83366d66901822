import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { ValidationError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { SERVER_NAME, SERVER_VERSION } from "./server.js";
import { failure } from "./services/normalizer.js";
import type { Tool } from "./tools/registry.js";
import type { ErrorKind, OperationOutcome } from "./types.js";

const ERROR_STATUS: Record<ErrorKind, number> = {
  ValidationError: 400,
  UnsupportedOption: 400,
  NotFound: 404,
  Ambiguous: 409,
  KindMismatch: 409,
  ConflictError: 409,
  BackendError: 502,
  TimedOut: 202,
};

const TOOL_ROUTE = /^\/api\/tools\/([A-Za-z0-9_]+)\/?$/;

export function httpStatusFor(outcome: OperationOutcome): number {
  switch (outcome.status) {
    case "success":
      return 200;
    case "timed_out":
      return 202;
    case "failed":
      return outcome.error ? ERROR_STATUS[outcome.error.kind] : 500;
  }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body, null, 2));
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

function parseArgs(raw: string): { ok: true; args: unknown } | { ok: false; outcome: OperationOutcome } {
  if (raw.trim() === "") return { ok: true, args: {} };
  try {
    return { ok: true, args: JSON.parse(raw) };
  } catch (error) {
    return {
      ok: false,
      outcome: failure(
        new ValidationError([
          { field: "body", code: "invalid_format", message: `request body is not JSON: ${errorMessage(error)}` },
        ])
      ),
    };
  }
}

export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

/**
 * REST routes for plain HTTP clients next to the MCP endpoint:
 * `GET /health`, `GET /api/tools` and `POST /api/tools/{name}`. Every other
 * request goes to `fallback`.
 */
export function createRequestHandler(tools: readonly Tool[], fallback: RequestHandler, logger: Logger): RequestHandler {
  const byName = new Map(tools.map((tool) => [tool.name, tool]));

  return async (req, res) => {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;

    if (req.method === "GET" && path === "/health") {
      sendJson(res, 200, { status: "ok", name: SERVER_NAME, version: SERVER_VERSION });
      return;
    }

    if (req.method === "GET" && (path === "/api/tools" || path === "/api/tools/")) {
      sendJson(res, 200, { tools: tools.map(({ name, description }) => ({ name, description })) });
      return;
    }

    const route = TOOL_ROUTE.exec(path);
    if (route) {
      if (req.method !== "POST") {
        sendJson(res, 405, { error: "Method not allowed" });
        return;
      }
      const tool = byName.get(route[1]);
      if (!tool) {
        sendJson(res, 404, { error: `Unknown tool '${route[1]}'` });
        return;
      }

      const parsed = parseArgs(await readBody(req));
      if (!parsed.ok) {
        sendJson(res, httpStatusFor(parsed.outcome), parsed.outcome);
        return;
      }

      // A client that hangs up stops local task polling.
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableFinished) controller.abort();
      });

      try {
        const outcome = await tool.call(parsed.args, { signal: controller.signal });
        logger.info("tool call", { tool: tool.name, status: outcome.status });
        sendJson(res, httpStatusFor(outcome), outcome);
      } catch (error) {
        if (!controller.signal.aborted) throw error;
        logger.info("client disconnected, tool call abandoned", { tool: tool.name });
      }
      return;
    }

    await fallback(req, res);
  };
}

export async function startHttpServer(options: {
  server: McpServer;
  tools: readonly Tool[];
  port: number;
  logger: Logger;
}): Promise<Server> {
  const { logger } = options;
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined, // Stateless mode
  });
  await options.server.connect(transport);

  const handle = createRequestHandler(options.tools, (req, res) => transport.handleRequest(req, res), logger);

  const httpServer = createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      logger.error("HTTP request error", { error, url: req.url });
      if (!res.headersSent) {
        sendJson(res, 500, { error: "Internal server error" });
      } else {
        res.end();
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });
  logger.info("listening", { port: options.port, mcp: `http://localhost:${options.port}/` });
  return httpServer;
}
