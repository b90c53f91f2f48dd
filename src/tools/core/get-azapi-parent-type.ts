/**
 * get-azapi-parent-type core - Parent resource type from a resource type path
 *
 * Works from the type string alone; no schemas are loaded.
 */

import { z } from "zod";
import { getParentType, splitTypeName } from "../../pipeline";
import type { ToolResult } from "./types";

export const getAzapiParentTypeSchema = z.object({
  resourceType: z
    .string()
    .min(1)
    .describe(
      "Azure resource type, e.g. 'Microsoft.Network/virtualNetworks/subnets'"
    ),
});

export type GetAzapiParentTypeInput = z.infer<typeof getAzapiParentTypeSchema>;

export const getAzapiParentTypeDescription = `Get the parent resource type of an Azure resource type.

Child resources (e.g. Microsoft.Network/virtualNetworks/subnets) return the type
one level up (Microsoft.Network/virtualNetworks). Top-level resources return
Microsoft.Resources/resourceGroups. Use the result to decide what the
azapi_resource parent_id should reference.`;

export async function getAzapiParentType(
  input: GetAzapiParentTypeInput
): Promise<ToolResult> {
  const { resourceType } = splitTypeName(input.resourceType.trim());
  return { output: getParentType(resourceType), isError: false };
}
