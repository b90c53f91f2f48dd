/**
 * get-azapi-schema.test.ts - Unit tests for the get_azapi_schema core logic
 */

import { describe, it, expect, vi } from "vitest";
import { getAzapiSchema, getAzapiSchemaSchema } from "./get-azapi-schema";
import { SchemaProvider } from "./schema-provider";

function makeProvider(schemas: Record<string, string>): SchemaProvider {
  return new SchemaProvider({ loadOrGenerate: vi.fn().mockResolvedValue(schemas) });
}

const provider = makeProvider({
  "Microsoft.Web/sites": "# Resource Type: Microsoft.Web/sites@2023-01-01\n",
});

describe("getAzapiSchemaSchema", () => {
  it("rejects an empty resource type", () => {
    expect(getAzapiSchemaSchema.safeParse({ resourceType: "" }).success).toBe(false);
  });

  it("accepts a resource type", () => {
    expect(
      getAzapiSchemaSchema.safeParse({ resourceType: "Microsoft.Web/sites" }).success
    ).toBe(true);
  });
});

describe("getAzapiSchema", () => {
  it("returns the documentation for a known resource type", async () => {
    const result = await getAzapiSchema({ resourceType: "Microsoft.Web/sites" }, provider);

    expect(result).toEqual({
      output: "# Resource Type: Microsoft.Web/sites@2023-01-01\n",
      isError: false,
    });
  });

  it("ignores case, surrounding whitespace, and an API version suffix", async () => {
    const result = await getAzapiSchema(
      { resourceType: "  microsoft.web/SITES@2021-01-01 " },
      provider
    );

    expect(result.isError).toBe(false);
    expect(result.output).toBe("# Resource Type: Microsoft.Web/sites@2023-01-01\n");
  });

  it("flags unknown resource types as errors", async () => {
    const result = await getAzapiSchema(
      { resourceType: "Microsoft.Web/serverfarms" },
      provider
    );

    expect(result).toEqual({
      output: 'No AzAPI schema found for resource type "Microsoft.Web/serverfarms".',
      isError: true,
    });
  });

  it("propagates load failures", async () => {
    const failing = new SchemaProvider({
      loadOrGenerate: vi.fn().mockRejectedValue(new Error("offline")),
    });

    await expect(
      getAzapiSchema({ resourceType: "Microsoft.Web/sites" }, failing)
    ).rejects.toThrow("offline");
  });
});
