/**
 * Core AzAPI tools - Shared logic for all interfaces
 *
 * This module re-exports all core tool functions, schemas, and descriptions.
 * Import from here when you need the shared logic without framework wrappers.
 *
 * Usage:
 *   import { getAzapiSchema, getAzapiSchemaSchema } from "./tools/core";
 */

export type { ToolResult } from "./types";

export { SchemaProvider, type SchemaSource } from "./schema-provider";

export {
  getAzapiSchema,
  getAzapiSchemaSchema,
  getAzapiSchemaDescription,
  type GetAzapiSchemaInput,
} from "./get-azapi-schema";

export {
  getAzapiParentType,
  getAzapiParentTypeSchema,
  getAzapiParentTypeDescription,
  type GetAzapiParentTypeInput,
} from "./get-azapi-parent-type";
