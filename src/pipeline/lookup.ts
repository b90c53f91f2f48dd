/**
 * lookup.ts - Consumer-facing lookups over generated schema documentation
 */

import { RESOURCE_GROUPS_TYPE } from "./scope";
import type { SchemaMap } from "./types";

/**
 * Finds the documentation for a resource type.
 *
 * Tries an exact key match first, then a case-insensitive one.
 *
 * @param resourceType - e.g. "Microsoft.Web/sites"
 * @returns The documentation text, or an empty string when nothing matches
 */
export function getSchema(resourceType: string, schemas: SchemaMap): string {
  if (Object.prototype.hasOwnProperty.call(schemas, resourceType)) {
    return schemas[resourceType];
  }

  const wanted = resourceType.toLowerCase();
  for (const [key, value] of Object.entries(schemas)) {
    if (key.toLowerCase() === wanted) return value;
  }

  return "";
}

/**
 * Parent resource type of a resource type, from its path alone.
 *
 * "Microsoft.Network/virtualNetworks/subnets" -> "Microsoft.Network/virtualNetworks"
 * "Microsoft.Network/virtualNetworks"         -> "Microsoft.Resources/resourceGroups"
 */
export function getParentType(resourceType: string): string {
  const segments = resourceType.split("/");
  if (segments.length > 2) {
    return segments.slice(0, -1).join("/");
  }
  return RESOURCE_GROUPS_TYPE;
}
