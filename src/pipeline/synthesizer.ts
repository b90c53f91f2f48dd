/**
 * synthesizer.ts - Builds and renders the documentation for a resource type
 *
 * Two steps:
 * 1. synthesize() resolves the resource type's body through the property
 *    walker and attaches scope and parent information (ResourceSchema).
 * 2. renderDocumentation() prints the schema as a markdown header plus a
 *    pseudo-HCL `azapi_resource` block.
 *
 * Output is deterministic: keys are ordered by compareKeys() at every level,
 * never by insertion order, so the same input always renders the same bytes.
 *
 * Example output:
 *   # Resource Type: Foo.Bar/widgets@2023-01-01
 *   API Version: 2023-01-01
 *   Parent resource type: Microsoft.Resources/resourceGroups
 *   A json-like Resource Schema reference:
 *
 *   ```hcl
 *   resource "azapi_resource" "widget" {
 *     location = "(Required) String Type. The geo-location where the resource lives"
 *     parent_id = "Reference to the `id` property of a ..."
 *     type = "Foo.Bar/widgets@2023-01-01"
 *     body = {
 *       name = "(Required) String Type. widget name"
 *     }
 *   }
 *   ```
 */

import { expandBody, walkProperties } from "./property-walker";
import { classifyScope, deriveParentGuidance, deriveParentType } from "./scope";
import type { TypeNodeStore } from "./type-store";
import type {
  DocumentObject,
  DocumentValue,
  ResourceSchema,
  ResourceTypeEntry,
} from "./types";

/** Scope bit for resources deployed into a resource group */
const RESOURCE_GROUP_SCOPE_BIT = 8;

const LOCATION_DESCRIPTION =
  "(Required) String Type. The geo-location where the resource lives";

// ---------------------------------------------------------------------------
// Key ordering
// ---------------------------------------------------------------------------

const IDENTIFYING_KEYS = new Set(["name", "type", "parent_id", "location", "sku"]);

/**
 * Sort bucket for a key. Lower buckets render first; dunder keys are
 * bucket 0 and are dropped before rendering.
 */
export function keyBucket(key: string): number {
  if (key.startsWith("__")) return 0;
  if (IDENTIFYING_KEYS.has(key)) return 30;
  if (key === "identity") return 50;
  if (key === "tags") return 9999;
  return 100;
}

/**
 * Total order over object keys: by (bucket, key), keys compared by code unit.
 */
export function compareKeys(a: string, b: string): number {
  const bucketDiff = keyBucket(a) - keyBucket(b);
  if (bucketDiff !== 0) return bucketDiff;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Keys of an object in render order, dunder keys removed.
 */
export function orderedKeys(value: DocumentObject): string[] {
  return Object.keys(value)
    .filter((key) => !key.startsWith("__"))
    .sort(compareKeys);
}

// ---------------------------------------------------------------------------
// Synthesis
// ---------------------------------------------------------------------------

/**
 * Singular label for the HCL block: the last path segment with one trailing
 * "s" removed ("virtualNetworks" -> "virtualNetwork", "addresses" -> "addresse").
 */
export function resourceLabel(resourceType: string): string {
  const segments = resourceType.split("/");
  const last = segments[segments.length - 1];
  return last.endsWith("s") ? last.slice(0, -1) : last;
}

/**
 * Builds the ResourceSchema for one ResourceType entry.
 *
 * Each call uses its own recursion path, so schemas never share state.
 */
export function synthesize(
  store: TypeNodeStore,
  entry: ResourceTypeEntry
): ResourceSchema {
  const { node } = entry;
  const scope = classifyScope(node.scopeBitmask);

  return {
    typeName: node.name,
    resourceType: entry.resourceType,
    apiVersion: entry.apiVersion,
    scope,
    scopeBitmask: node.scopeBitmask,
    parentType: deriveParentType(node.name, scope),
    parentGuidance: deriveParentGuidance(node.name, node.scopeBitmask),
    properties: walkProperties(store, node.bodyRef, new Set()),
    body: expandBody(store, node.bodyRef, new Set()),
  };
}

/**
 * The top-level fields of the azapi_resource block.
 */
export function resourceFields(schema: ResourceSchema): DocumentObject {
  const fields: DocumentObject = {
    type: schema.typeName,
    parent_id: schema.parentGuidance,
    body: schema.body,
  };
  if (schema.scopeBitmask & RESOURCE_GROUP_SCOPE_BIT) {
    fields.location = LOCATION_DESCRIPTION;
  }
  return fields;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

function isDocumentObject(value: DocumentValue): value is DocumentObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Renders the entries of an object, one "key = value" line each, at the
 * given indentation.
 */
function renderEntries(value: DocumentObject, indent: number): string[] {
  return orderedKeys(value).map(
    (key) => `${" ".repeat(indent)}${key} = ${renderValue(value[key], indent)}`
  );
}

/**
 * Renders one value. `indent` is the indentation of the line the value
 * starts on; nested object entries go two spaces deeper.
 */
export function renderValue(value: DocumentValue, indent = 0): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "boolean") return value ? "true" : "false";
  if (typeof value === "number") return String(value);

  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    return `[${value.map((item) => renderValue(item, indent)).join(", ")}]`;
  }

  if (isDocumentObject(value)) {
    const lines = renderEntries(value, indent + 2);
    if (lines.length === 0) return "{}";
    return `{\n${lines.join("\n")}\n${" ".repeat(indent)}}`;
  }

  return JSON.stringify(value);
}

/**
 * Renders a ResourceSchema as documentation text.
 */
export function renderDocumentation(schema: ResourceSchema): string {
  const lines = [
    `# Resource Type: ${schema.typeName}`,
    `API Version: ${schema.apiVersion}`,
    `Parent resource type: ${schema.parentType}`,
    "A json-like Resource Schema reference:",
    "",
    "```hcl",
    `resource "azapi_resource" "${resourceLabel(schema.resourceType)}" {`,
    ...renderEntries(resourceFields(schema), 2),
    "}",
    "```",
  ];
  return lines.join("\n") + "\n";
}
