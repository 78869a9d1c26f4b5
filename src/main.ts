#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  DEFAULT_CONFIG_PATH,
  createDefaultConfigIfMissing,
  expandHome,
  formatConfigError,
  loadConfig,
} from "./config/loader";
import { resolveSettings } from "./config/schema";
import { Gateway } from "./gateway/gateway";
import { createLogger } from "./logger";
import { McpDownstreamTransport } from "./mcp-client/transport";
import { createGatewayServer } from "./server/gateway-server";
import { createStorage } from "./storage";

async function main(): Promise<void> {
  const configPath = process.env.TOOLGATE_CONFIG ?? DEFAULT_CONFIG_PATH;
  if (await createDefaultConfigIfMissing(configPath)) {
    process.stderr.write(`Created default config at ${configPath}\n`);
  }

  const loaded = await loadConfig(configPath);
  if (!loaded.success) {
    process.stderr.write(`Failed to load config from ${configPath}: ${formatConfigError(loaded.error)}\n`);
    process.exitCode = 1;
    return;
  }

  const config = loaded.data;
  const settings = resolveSettings(config.settings);
  const logger = createLogger({
    level: settings.log.level,
    file: settings.log.file ? expandHome(settings.log.file) : undefined,
  });

  const storage = createStorage(settings.storage, { logger });
  const transport = new McpDownstreamTransport({ connection: settings.connection, logger });
  const gateway = new Gateway({ settings, storage, transport, logger });

  const restored = await gateway.restore();
  if (!restored.success) {
    logger.error(`Failed to restore state: ${restored.error.message}`, { code: restored.error.code });
  }

  const server = createGatewayServer(gateway, { logger });
  await server.connect(new StdioServerTransport());
  logger.info(`Gateway listening on stdio`, { configPath, servers: Object.keys(config.servers) });

  let closing = false;
  const shutdown = (signal: string) => {
    if (closing) return;
    closing = true;
    logger.info(`Received ${signal}, shutting down`);
    server
      .close()
      .then(() => gateway.close())
      .catch((error: unknown) => {
        logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  const registered = await gateway.registerConfiguredServers(config.servers);
  const failed = Object.values(registered).filter(result => !result.success).length;
  logger.info(`Registered ${Object.keys(registered).length - failed} configured servers`, { failed });
}

main().catch((error: unknown) => {
  process.stderr.write(`toolgate failed to start: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
