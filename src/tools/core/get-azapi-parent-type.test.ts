/**
 * get-azapi-parent-type.test.ts - Unit tests for the get_azapi_parent_type core logic
 */

import { describe, it, expect } from "vitest";
import { getAzapiParentType } from "./get-azapi-parent-type";

describe("getAzapiParentType", () => {
  it("returns the parent of a child resource type", async () => {
    await expect(
      getAzapiParentType({ resourceType: "Microsoft.Network/virtualNetworks/subnets" })
    ).resolves.toEqual({ output: "Microsoft.Network/virtualNetworks", isError: false });
  });

  it("returns the resource group type for a top-level resource type", async () => {
    const result = await getAzapiParentType({
      resourceType: "Microsoft.Storage/storageAccounts@2023-01-01",
    });

    expect(result.output).toBe("Microsoft.Resources/resourceGroups");
  });

  it("strips an API version before splitting the path", async () => {
    const result = await getAzapiParentType({
      resourceType: "Microsoft.Sql/servers/databases@2021-11-01",
    });

    expect(result.output).toBe("Microsoft.Sql/servers");
  });
});
