/**
 * get-azapi-schema core - Shared logic for looking up resource documentation
 *
 * This module holds the tool's schema, description, and lookup, separate from
 * any framework. The MCP server and the CLI both call getAzapiSchema().
 */

import { z } from "zod";
import { getSchema, splitTypeName } from "../../pipeline";
import type { SchemaProvider } from "./schema-provider";
import type { ToolResult } from "./types";

/**
 * Input schema for get_azapi_schema.
 */
export const getAzapiSchemaSchema = z.object({
  resourceType: z
    .string()
    .min(1)
    .describe(
      "Azure resource type, e.g. 'Microsoft.Storage/storageAccounts' or 'Microsoft.Network/virtualNetworks/subnets'. An '@apiVersion' suffix is ignored."
    ),
});

export type GetAzapiSchemaInput = z.infer<typeof getAzapiSchemaSchema>;

/**
 * Tool description for LLMs.
 */
export const getAzapiSchemaDescription = `Get the AzAPI (azapi_resource) schema reference for an Azure resource type.

Returns a documentation block with the latest API version, the parent resource
type, and a pseudo-HCL azapi_resource example where every writable body
property is annotated as (Required) or (Optional) with its type and description.
Read-only properties are omitted.

Use this before writing an azapi_resource block, to learn the body structure,
the type string ("<resourceType>@<apiVersion>"), and what parent_id should be.

The lookup is case-insensitive.`;

/**
 * Looks up the documentation for a resource type.
 *
 * @param input - Validated input matching getAzapiSchemaSchema
 * @param provider - Source of the schema map
 * @returns The documentation text, or isError with a not-found message
 */
export async function getAzapiSchema(
  input: GetAzapiSchemaInput,
  provider: SchemaProvider
): Promise<ToolResult> {
  const { resourceType } = splitTypeName(input.resourceType.trim());
  const schemas = await provider.getSchemas();
  const documentation = getSchema(resourceType, schemas);

  if (!documentation) {
    return {
      output: `No AzAPI schema found for resource type "${resourceType}".`,
      isError: true,
    };
  }

  return { output: documentation, isError: false };
}
