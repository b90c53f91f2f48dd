/**
 * index.test.ts - Tests for the MCP tool registration
 *
 * Connects a real MCP client to the server through the SDK's in-memory
 * transport pair, so requests go through the same validation and dispatch
 * as over stdio.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SchemaProvider } from "../core";
import { registerAzapiTools } from "./index";

const WIDGET_DOC = "# Resource Type: Foo.Bar/widgets@2023-01-01\n";

let client: Client;
let server: McpServer;
let loadOrGenerate: ReturnType<typeof vi.fn>;

beforeEach(async () => {
  loadOrGenerate = vi.fn().mockResolvedValue({ "Foo.Bar/widgets": WIDGET_DOC });
  server = new McpServer({ name: "azapi-schema-docs-test", version: "0.0.0" });
  registerAzapiTools(server, new SchemaProvider({ loadOrGenerate }));

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  client = new Client({ name: "test-client", version: "0.0.0" });
  await Promise.all([
    server.connect(serverTransport),
    client.connect(clientTransport),
  ]);
});

afterEach(async () => {
  await client.close();
  await server.close();
});

describe("registerAzapiTools", () => {
  it("lists both tools with a resourceType input", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      "get_azapi_schema",
      "get_azapi_parent_type",
    ]);
    for (const tool of tools) {
      expect(tool.inputSchema.required).toEqual(["resourceType"]);
    }
  });

  it("returns documentation from get_azapi_schema", async () => {
    const result = await client.callTool({
      name: "get_azapi_schema",
      arguments: { resourceType: "foo.bar/widgets" },
    });

    expect(result).toEqual({
      content: [{ type: "text", text: WIDGET_DOC }],
      isError: false,
    });
  });

  it("flags unknown resource types", async () => {
    const result = await client.callTool({
      name: "get_azapi_schema",
      arguments: { resourceType: "Foo.Bar/gadgets" },
    });

    expect(result).toEqual({
      content: [
        { type: "text", text: 'No AzAPI schema found for resource type "Foo.Bar/gadgets".' },
      ],
      isError: true,
    });
  });

  it("loads schemas once across calls", async () => {
    await client.callTool({ name: "get_azapi_schema", arguments: { resourceType: "Foo.Bar/widgets" } });
    await client.callTool({ name: "get_azapi_schema", arguments: { resourceType: "Foo.Bar/widgets" } });

    expect(loadOrGenerate).toHaveBeenCalledOnce();
  });

  it("answers get_azapi_parent_type without loading schemas", async () => {
    const result = await client.callTool({
      name: "get_azapi_parent_type",
      arguments: { resourceType: "Foo.Bar/widgets/parts" },
    });

    expect(result).toEqual({
      content: [{ type: "text", text: "Foo.Bar/widgets" }],
      isError: false,
    });
    expect(loadOrGenerate).not.toHaveBeenCalled();
  });
});
