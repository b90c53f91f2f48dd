/**
 * scope.test.ts - Unit tests for scope classification and parent guidance
 */

import { describe, it, expect } from "vitest";
import {
  RESOURCE_GROUPS_TYPE,
  classifyScope,
  deriveParentGuidance,
  deriveParentType,
} from "./scope";

describe("classifyScope", () => {
  it.each([
    [1, "Tenant"],
    [2, "ManagementGroup"],
    [4, "Subscription"],
    [8, "ResourceGroup"],
    [16, "Extension"],
  ] as const)("classifies bitmask %i as %s", (bitmask, scope) => {
    expect(classifyScope(bitmask)).toBe(scope);
  });

  it("classifies combined and empty masks as Unknown", () => {
    expect(classifyScope(12)).toBe("Unknown");
    expect(classifyScope(0)).toBe("Unknown");
    expect(classifyScope(32)).toBe("Unknown");
  });
});

describe("deriveParentGuidance", () => {
  it("points child resources at their parent type", () => {
    expect(
      deriveParentGuidance("Microsoft.Network/virtualNetworks/subnets@2023-05-01", 8)
    ).toBe(
      "Reference to the `id` property of resource of type: `Microsoft.Network/virtualNetworks`, " +
        "or a string in the format like: /subscriptions/{subscriptionId}/resourceGroups/{resourceGroupName}/providers/Microsoft.Network/virtualNetworks"
    );
  });

  it("describes resource group parents for resource group scope", () => {
    expect(deriveParentGuidance("Foo.Bar/widgets@2023-01-01", 8)).toBe(
      "Reference to the `id` property of a `Microsoft.Resources/resourceGroups`, or a string value in format /subscriptions/{subscriptionId}/resourceGroups/{resourceGroupName}"
    );
  });

  it("uses the lowest set bit for combined masks", () => {
    expect(deriveParentGuidance("Foo.Bar/widgets", 12)).toBe(
      "A subscription id in format /subscriptions/{subscriptionId}"
    );
    expect(deriveParentGuidance("Foo.Bar/widgets", 3)).toBe(
      "A tenant id in format /tenants/{tenantId}"
    );
  });

  it("describes extension scope", () => {
    expect(deriveParentGuidance("Foo.Bar/locks", 16)).toBe(
      "A resource id reference to a extension."
    );
  });

  it("reports an unknown scope when no bit is set", () => {
    expect(deriveParentGuidance("Foo.Bar/widgets", 0)).toBe("Unknown scope");
  });
});

describe("deriveParentType", () => {
  it("returns the parent path for child resources", () => {
    expect(deriveParentType("Foo.Bar/widgets/parts@2023-01-01", "Unknown")).toBe(
      "Foo.Bar/widgets"
    );
  });

  it("returns the resource group type for resource group and subscription scope", () => {
    expect(deriveParentType("Foo.Bar/widgets", "ResourceGroup")).toBe(RESOURCE_GROUPS_TYPE);
    expect(deriveParentType("Foo.Bar/widgets", "Subscription")).toBe(RESOURCE_GROUPS_TYPE);
  });

  it("returns an empty string for other top-level scopes", () => {
    expect(deriveParentType("Foo.Bar/widgets", "Tenant")).toBe("");
    expect(deriveParentType("Foo.Bar/widgets", "Unknown")).toBe("");
  });
});
