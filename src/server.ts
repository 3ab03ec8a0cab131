/**
 * MCP server wiring for the CTS tuner tools
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { ZodError } from "zod";
import type { TunerConfig } from "./config.js";
import { isToolName, toolDefinitions, toolHandlers } from "./tools/mcp-tools.js";

export const SERVER_NAME = "cts-tuner";
export const SERVER_VERSION = "1.0.0";

export function createServer(config: TunerConfig): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: toolDefinitions,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    if (!isToolName(name)) {
      throw new McpError(ErrorCode.MethodNotFound, `Tool not found: ${name}`);
    }

    try {
      const result = await toolHandlers[name](args ?? {}, config);
      return {
        content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
      };
    } catch (error) {
      if (error instanceof McpError) throw error;
      if (error instanceof ZodError) {
        const issues = error.issues
          .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
          .join("; ");
        throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for '${name}': ${issues}`);
      }
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new McpError(ErrorCode.InternalError, `Tool execution failed: ${errorMessage}`);
    }
  });

  return server;
}
