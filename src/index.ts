#!/usr/bin/env node

/**
 * CTS Tuner - Model Context Protocol server
 *
 * Exposes clock-tree tuning recommendations and the STA/netlist/constraint
 * report utilities as MCP tools over stdio.
 */

// Load environment variables from .env file
import dotenv from "dotenv";
dotenv.config();

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { createServer, SERVER_VERSION } from "./server.js";
import { toolDefinitions } from "./tools/mcp-tools.js";

async function main() {
  const config = loadConfig();
  const server = createServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // stdout belongs to the MCP transport
  console.error(`=== CTS Tuner MCP Server v${SERVER_VERSION} ===`);
  console.error("Tools:");
  for (const tool of toolDefinitions) {
    console.error(`  - ${tool.name}`);
  }
  console.error(`Output directory: ${config.outputDir}`);
  console.error("================================");
}

main().catch((error) => {
  console.error("Server failed to start:", error);
  process.exit(1);
});
