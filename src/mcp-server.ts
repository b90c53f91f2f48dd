#!/usr/bin/env node
/**
 * mcp-server.ts - MCP server entry point for azapi-schema-docs
 *
 * When an MCP client connects, it spawns this process. The server exposes the
 * AzAPI schema lookup tools over stdio.
 *
 * How it works:
 * 1. Create a SchemaGenerator (data directory, GitHub fetcher) and wrap it in
 *    a SchemaProvider so all tool calls share one lazy load
 * 2. Register the tools
 * 3. Start the stdio transport (JSON-RPC on stdin/stdout)
 *
 * stdout carries the protocol, so all progress output goes to stderr.
 */

// Initialize OpenTelemetry tracing before any other imports
import "./tracing";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { GitHubReleaseFetcher } from "./fetcher";
import { SchemaGenerator } from "./pipeline";
import { SchemaProvider } from "./tools/core";
import { registerAzapiTools } from "./tools/mcp";

const SERVER_VERSION = "0.1.0";

async function main(): Promise<void> {
  const onProgress = (message: string) => console.error(message);

  const generator = new SchemaGenerator({
    fetcher: new GitHubReleaseFetcher({ onProgress }),
    onProgress,
  });
  const provider = new SchemaProvider(generator);

  const server = new McpServer({
    name: "azapi-schema-docs",
    version: SERVER_VERSION,
  });

  registerAzapiTools(server, provider);

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("MCP server error:", error);
  process.exit(1);
});
