/**
 * property-walker.ts - Expands object types into property descriptors
 *
 * Bicep type graphs are full of cycles (an error type whose `details` is an
 * array of the same error type, for instance). Both functions here carry a
 * `visiting` set holding the object indices on the current recursion path:
 * an index is added on the way down and removed on the way back up. A type
 * that is already on the path is not expanded again, so recursion depth is
 * bounded by the number of object types in the file. Siblings can still reuse
 * the same type, because it has left the set by the time the next sibling is
 * walked.
 */

import type { TypeNodeStore } from "./type-store";
import {
  PROPERTY_FLAG_READ_ONLY,
  PROPERTY_FLAG_REQUIRED,
  type DocumentObject,
  type KindLabel,
  type ObjectTypeNode,
  type PropertyDescriptor,
} from "./types";

/**
 * Resolves a property's type one level and names it.
 *
 * Returns "Property" when the reference is missing or out of range.
 */
export function kindLabelFor(
  store: TypeNodeStore,
  typeRef: number | undefined
): KindLabel {
  const node = store.resolve(typeRef);
  if (!node) return "Property";

  switch (node.kind) {
    case "StringType":
      return "String Type";
    case "IntegerType":
      return "Integer Type";
    case "BooleanType":
      return "Boolean";
    case "ArrayType":
      return "Array Type";
    case "ObjectType":
      return "Object Type";
    case "UnionType":
      return "Union Type";
    case "ResourceType":
    case "Other":
      return "Complex Type";
  }
}

/**
 * Formats a descriptor as the one-line text used in the documentation,
 * e.g. "(Required) String Type. The name of the site".
 */
export function describeProperty(descriptor: PropertyDescriptor): string {
  const requirement = descriptor.required ? "(Required)" : "(Optional)";
  return `${requirement} ${descriptor.kindLabel}. ${descriptor.description}`.trim();
}

/**
 * Runs `fn` with `index` pushed onto the recursion path, or returns
 * `fallback` when the index is already on it or is not an object type.
 */
function withObject<T>(
  store: TypeNodeStore,
  index: number | undefined,
  visiting: Set<number>,
  fallback: T,
  fn: (node: ObjectTypeNode, index: number) => T
): T {
  if (index === undefined || visiting.has(index)) return fallback;

  const node = store.resolve(index);
  if (!node || node.kind !== "ObjectType") return fallback;

  visiting.add(index);
  try {
    return fn(node, index);
  } finally {
    visiting.delete(index);
  }
}

/**
 * Walks the declared properties of the object type at `objectIndex`.
 *
 * Read-only properties are skipped. Each remaining property keeps its source
 * position in the returned map.
 *
 * @param store - The file's type nodes
 * @param objectIndex - Index of an ObjectType node
 * @param visiting - Object indices on the current recursion path
 * @returns Descriptors by property name; empty for cyclic or unresolvable input
 */
export function walkProperties(
  store: TypeNodeStore,
  objectIndex: number | undefined,
  visiting: Set<number>
): Map<string, PropertyDescriptor> {
  return withObject(store, objectIndex, visiting, new Map(), (node) => {
    const descriptors = new Map<string, PropertyDescriptor>();

    for (const [name, property] of node.properties) {
      if (property.flags & PROPERTY_FLAG_READ_ONLY) continue;

      descriptors.set(name, {
        required: (property.flags & PROPERTY_FLAG_REQUIRED) !== 0,
        kindLabel: kindLabelFor(store, property.typeRef),
        description: property.description,
        ...(property.typeRef !== undefined ? { typeRef: property.typeRef } : {}),
      });
    }

    return descriptors;
  });
}

/**
 * Builds the renderable body tree for the object type at `objectIndex`.
 *
 * Object-typed properties become nested objects and arrays of objects become
 * a one-element array holding the nested object. When the nested type is
 * already on the recursion path it degrades to `{}` (or `[]` for an array).
 * All other properties become their descriptor line.
 */
export function expandBody(
  store: TypeNodeStore,
  objectIndex: number | undefined,
  visiting: Set<number>
): DocumentObject {
  const body: DocumentObject = {};

  const descriptors = walkProperties(store, objectIndex, visiting);
  if (descriptors.size === 0) return body;

  // Keep objectIndex on the path while its children expand.
  return withObject(store, objectIndex, visiting, body, () => {
    for (const [name, descriptor] of descriptors) {
      const target = store.resolve(descriptor.typeRef);

      if (target?.kind === "ObjectType") {
        body[name] = expandBody(store, descriptor.typeRef, visiting);
        continue;
      }

      if (target?.kind === "ArrayType") {
        const item = store.resolve(target.itemRef);
        if (item?.kind === "ObjectType") {
          const itemRef = target.itemRef;
          body[name] =
            itemRef !== undefined && !visiting.has(itemRef)
              ? [expandBody(store, itemRef, visiting)]
              : [];
          continue;
        }
      }

      body[name] = describeProperty(descriptor);
    }

    return body;
  });
}
