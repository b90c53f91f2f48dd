/**
 * MCP tool registration for azapi-schema-docs
 *
 * Registers the AzAPI lookup tools on an McpServer. The SDK validates input
 * against each Zod shape; the handlers call the core function and convert
 * its ToolResult into MCP content.
 *
 * Every handler is wrapped with withToolTracing(), so a schema regeneration
 * triggered by the first call nests under that call's span.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  getAzapiSchema,
  getAzapiSchemaSchema,
  getAzapiSchemaDescription,
  getAzapiParentType,
  getAzapiParentTypeSchema,
  getAzapiParentTypeDescription,
  type GetAzapiSchemaInput,
  type GetAzapiParentTypeInput,
  type SchemaProvider,
  type ToolResult,
} from "../core";
import { withToolTracing } from "../../tracing/tool-tracing";

/**
 * Converts a core ToolResult into an MCP tool response.
 */
function toMcpResponse(result: ToolResult) {
  return {
    content: [{ type: "text" as const, text: result.output }],
    isError: result.isError,
  };
}

/**
 * Registers get_azapi_schema and get_azapi_parent_type.
 *
 * @param server - The McpServer instance to register the tools with
 * @param provider - Shared, lazily loaded schema map
 */
export function registerAzapiTools(
  server: McpServer,
  provider: SchemaProvider
): void {
  server.registerTool(
    "get_azapi_schema",
    {
      description: getAzapiSchemaDescription,
      inputSchema: getAzapiSchemaSchema.shape,
    },
    withToolTracing("get_azapi_schema", async (input: GetAzapiSchemaInput) =>
      toMcpResponse(await getAzapiSchema(input, provider))
    )
  );

  server.registerTool(
    "get_azapi_parent_type",
    {
      description: getAzapiParentTypeDescription,
      inputSchema: getAzapiParentTypeSchema.shape,
    },
    withToolTracing(
      "get_azapi_parent_type",
      async (input: GetAzapiParentTypeInput) =>
        toMcpResponse(await getAzapiParentType(input))
    )
  );
}
