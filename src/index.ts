#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, type Config } from "./config.js";
import { ConfigError } from "./errors.js";
import { startHttpServer } from "./http.js";
import { createLogger } from "./logger.js";
import { ProxmoxClient } from "./proxmox/client.js";
import { SERVER_NAME, createServer } from "./server.js";

let config: Config;
try {
  config = loadConfig();
} catch (error) {
  if (!(error instanceof ConfigError)) throw error;
  for (const problem of error.problems) {
    process.stderr.write(`config: ${problem}\n`);
  }
  process.exit(1);
}

const logger = createLogger({ ...config.logging, service: SERVER_NAME });

if (!config.proxmox.verifySsl) {
  logger.warn("TLS certificate verification is disabled for the Proxmox API");
}

const backend = new ProxmoxClient({
  ...config.proxmox,
  logger: logger.child("proxmox"),
});

const { server, tools } = createServer({ backend, logger, tasks: config.tasks });

if (config.http.enabled) {
  await startHttpServer({ server, tools, port: config.http.port, logger: logger.child("http") });
} else {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("running on stdio", { host: config.proxmox.host, tools: tools.length });
}
