#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { resolveConfig } from "./config.js";
import { toErrorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { BridgeRuntime, registerTools } from "./mcp-tools.js";

const serverInfo = {
  name: "chatgpt-browser-bridge",
  version: "0.1.0",
} as const;

async function main(): Promise<void> {
  const config = resolveConfig();
  const logger = createLogger({ level: config.logLevel, debugLogFile: config.debugLogFile ?? undefined });
  const runtime = new BridgeRuntime(config, logger);

  const server = new McpServer(serverInfo);
  registerTools(server, runtime);

  const transport = new StdioServerTransport();
  transport.onclose = () => {
    runtime.close().catch((error: unknown) => {
      logger.warn("server", "failed to close browser tab", toErrorMessage(error));
    });
  };

  await server.connect(transport);
  logger.info("server", "chatgpt-browser-bridge running on stdio");
}

main().catch((error) => {
  console.error("chatgpt-browser-bridge fatal:", error);
  process.exit(1);
});
