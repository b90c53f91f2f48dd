/**
 * type-store.ts - Read-only store of decoded Bicep type nodes for one file
 *
 * A Bicep types file is a JSON array where nodes point at each other by
 * position ("$ref": "#/12"). The store decodes every raw node once into the
 * TypeNode union and answers index lookups. Decoding is lenient: a field with
 * the wrong shape falls back to an empty value, and a node that cannot be
 * decoded at all becomes an Other node. Nothing here throws on bad input.
 */

import { z } from "zod";
import type {
  PropertyNode,
  ResourceTypeEntry,
  TypeNode,
} from "./types";

// ---------------------------------------------------------------------------
// Raw node schemas
// ---------------------------------------------------------------------------

const RefSchema = z.object({ $ref: z.string() });

const RawNodeSchema = z.object({ $type: z.string() }).passthrough();

const RawResourceTypeSchema = z.object({
  name: z.string().catch(""),
  scopeType: z.number().catch(0),
  body: z.unknown(),
});

const RawObjectTypeSchema = z.object({
  properties: z.record(z.unknown()).catch({}),
});

const RawPropertySchema = z.object({
  type: z.unknown(),
  flags: z.number().catch(0),
  description: z.string().catch(""),
});

const RawArrayTypeSchema = z.object({
  itemType: z.unknown(),
});

// ---------------------------------------------------------------------------
// Reference parsing
// ---------------------------------------------------------------------------

/**
 * Parses an in-file reference of the form "#/<index>".
 *
 * Cross-file references ("types.json#/3") and anything malformed return
 * undefined; callers treat that as an unresolvable type.
 */
export function parseRef(ref: string): number | undefined {
  const match = /^#\/(\d+)$/.exec(ref);
  return match ? Number(match[1]) : undefined;
}

/**
 * Extracts the index from a `{ "$ref": "#/N" }` value of unknown shape.
 */
function refIndex(value: unknown): number | undefined {
  const parsed = RefSchema.safeParse(value);
  return parsed.success ? parseRef(parsed.data.$ref) : undefined;
}

// ---------------------------------------------------------------------------
// Node decoding
// ---------------------------------------------------------------------------

/**
 * Decodes one raw JSON value into a TypeNode.
 *
 * Unknown `$type` values and values that are not objects with a string
 * `$type` map to an Other node carrying whatever discriminator was seen.
 */
export function decodeTypeNode(raw: unknown): TypeNode {
  const header = RawNodeSchema.safeParse(raw);
  if (!header.success) {
    return { kind: "Other", discriminator: "" };
  }

  const discriminator = header.data.$type;
  switch (discriminator) {
    case "ResourceType": {
      const node = RawResourceTypeSchema.parse(header.data);
      const bodyRef = refIndex(node.body);
      return {
        kind: "ResourceType",
        name: node.name,
        scopeBitmask: node.scopeType,
        ...(bodyRef !== undefined ? { bodyRef } : {}),
      };
    }
    case "ObjectType": {
      const node = RawObjectTypeSchema.parse(header.data);
      return {
        kind: "ObjectType",
        properties: decodeProperties(node.properties),
      };
    }
    case "ArrayType": {
      const itemRef = refIndex(RawArrayTypeSchema.parse(header.data).itemType);
      return {
        kind: "ArrayType",
        ...(itemRef !== undefined ? { itemRef } : {}),
      };
    }
    case "UnionType":
      return { kind: "UnionType" };
    case "StringType":
      return { kind: "StringType" };
    case "IntegerType":
      return { kind: "IntegerType" };
    case "BooleanType":
      return { kind: "BooleanType" };
    default:
      return { kind: "Other", discriminator };
  }
}

/**
 * Decodes an ObjectType's property table, keeping source order.
 * Entries that are not objects are dropped.
 */
function decodeProperties(
  raw: Record<string, unknown>
): Map<string, PropertyNode> {
  const properties = new Map<string, PropertyNode>();

  for (const [name, value] of Object.entries(raw)) {
    const parsed = RawPropertySchema.safeParse(value);
    if (!parsed.success) continue;

    const typeRef = refIndex(parsed.data.type);
    properties.set(name, {
      description: parsed.data.description,
      flags: parsed.data.flags,
      ...(typeRef !== undefined ? { typeRef } : {}),
    });
  }

  return properties;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/**
 * Splits "Provider/type@version" into its type and API version halves.
 */
export function splitTypeName(name: string): {
  resourceType: string;
  apiVersion: string;
} {
  const [resourceType, apiVersion = ""] = name.split("@");
  return { resourceType, apiVersion };
}

/**
 * Arena of decoded type nodes for one input file.
 *
 * Usage:
 *   const store = new TypeNodeStore(JSON.parse(text));
 *   for (const entry of store.resourceTypes()) { ... }
 *   const body = store.resolve(entry.node.bodyRef);
 */
export class TypeNodeStore {
  private readonly nodes: readonly TypeNode[];

  constructor(rawNodes: readonly unknown[]) {
    this.nodes = rawNodes.map(decodeTypeNode);
  }

  get size(): number {
    return this.nodes.length;
  }

  /**
   * Looks up a node by index. Out-of-range, negative, non-integer, or
   * missing indices return undefined.
   */
  resolve(index: number | undefined): TypeNode | undefined {
    if (
      index === undefined ||
      !Number.isInteger(index) ||
      index < 0 ||
      index >= this.nodes.length
    ) {
      return undefined;
    }
    return this.nodes[index];
  }

  /**
   * All ResourceType nodes in file order.
   */
  resourceTypes(): ResourceTypeEntry[] {
    const entries: ResourceTypeEntry[] = [];
    this.nodes.forEach((node, index) => {
      if (node.kind !== "ResourceType") return;
      entries.push({ index, node, ...splitTypeName(node.name) });
    });
    return entries;
  }
}
