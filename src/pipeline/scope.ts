/**
 * scope.ts - Deployment scope and parent guidance for resource types
 *
 * Bicep encodes where a resource type can be deployed as a bitmask
 * (scopeType). The documentation needs two things from it: a scope name and a
 * sentence telling the reader what to put in the azapi_resource parent_id.
 *
 * Child resources (more than two "/" segments) always point at their parent
 * type, whatever the bitmask says.
 */

import { splitTypeName } from "./type-store";
import type { Scope } from "./types";

export const RESOURCE_GROUPS_TYPE = "Microsoft.Resources/resourceGroups";

/**
 * Scope bits in the priority order used for parent guidance.
 */
const SCOPE_BITS: ReadonlyArray<{ bit: number; scope: Scope; guidance: string }> = [
  {
    bit: 1,
    scope: "Tenant",
    guidance: "A tenant id in format /tenants/{tenantId}",
  },
  {
    bit: 2,
    scope: "ManagementGroup",
    guidance:
      "A management group id in format /providers/Microsoft.Management/managementGroups/{managementGroupId}",
  },
  {
    bit: 4,
    scope: "Subscription",
    guidance: "A subscription id in format /subscriptions/{subscriptionId}",
  },
  {
    bit: 8,
    scope: "ResourceGroup",
    guidance: `Reference to the \`id\` property of a \`${RESOURCE_GROUPS_TYPE}\`, or a string value in format /subscriptions/{subscriptionId}/resourceGroups/{resourceGroupName}`,
  },
  {
    bit: 16,
    scope: "Extension",
    guidance: "A resource id reference to a extension.",
  },
];

/**
 * Maps a scopeType bitmask to a scope name.
 *
 * Only single-bit values name a scope; combined masks (e.g. 12 for
 * Subscription | ResourceGroup) and 0 classify as Unknown.
 */
export function classifyScope(bitmask: number): Scope {
  return SCOPE_BITS.find((entry) => entry.bit === bitmask)?.scope ?? "Unknown";
}

/**
 * Splits the type part of a name into its "/" segments.
 */
function typeSegments(typeName: string): string[] {
  return splitTypeName(typeName).resourceType.split("/");
}

/**
 * Builds the guidance text for the parent_id field.
 *
 * @param typeName - Resource type, with or without "@apiVersion"
 * @param bitmask - The resource type's scopeType
 */
export function deriveParentGuidance(typeName: string, bitmask: number): string {
  const segments = typeSegments(typeName);

  if (segments.length > 2) {
    const parentType = segments.slice(0, -1).join("/");
    return (
      `Reference to the \`id\` property of resource of type: \`${parentType}\`, ` +
      `or a string in the format like: /subscriptions/{subscriptionId}/resourceGroups/{resourceGroupName}/providers/${parentType}`
    );
  }

  const match = SCOPE_BITS.find((entry) => (bitmask & entry.bit) !== 0);
  return match ? match.guidance : "Unknown scope";
}

/**
 * Parent type shown in the documentation header.
 *
 * Child resources name their parent type; top-level resources deployed to a
 * resource group or subscription name the resource group type; everything
 * else has no parent line value.
 */
export function deriveParentType(typeName: string, scope: Scope): string {
  const segments = typeSegments(typeName);
  if (segments.length > 2) {
    return segments.slice(0, -1).join("/");
  }
  if (scope === "ResourceGroup" || scope === "Subscription") {
    return RESOURCE_GROUPS_TYPE;
  }
  return "";
}
