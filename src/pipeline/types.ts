/**
 * types.ts - Shared data types for the schema documentation pipeline
 *
 * These types flow through the pipeline stages:
 *
 * - Store: decodes a Bicep types file into TypeNode[]
 * - Selector: picks one ResourceTypeEntry per resource type (latest API version)
 * - Synthesizer: turns each entry into a ResourceSchema and renders it to text
 * - Cache: persists the resulting SchemaMap under a version-stamped filename
 */

// ---------------------------------------------------------------------------
// Type graph
// ---------------------------------------------------------------------------

/** Bit 0 of PropertyNode.flags */
export const PROPERTY_FLAG_REQUIRED = 1;
/** Bit 1 of PropertyNode.flags */
export const PROPERTY_FLAG_READ_ONLY = 2;

/**
 * A single property declared on an ObjectType.
 */
export interface PropertyNode {
  description: string;
  /** Bit field: bit 0 = required, bit 1 = read-only */
  flags: number;
  /** Index of the property's type in the same file, when the reference is usable */
  typeRef?: number;
}

export interface ResourceTypeNode {
  kind: "ResourceType";
  /** Full name including the API version (e.g., "Microsoft.Web/sites@2023-01-01") */
  name: string;
  scopeBitmask: number;
  bodyRef?: number;
}

export interface ObjectTypeNode {
  kind: "ObjectType";
  /** Declared properties in source order */
  properties: ReadonlyMap<string, PropertyNode>;
}

export interface ArrayTypeNode {
  kind: "ArrayType";
  itemRef?: number;
}

export interface UnionTypeNode {
  kind: "UnionType";
}

export interface ScalarTypeNode {
  kind: "StringType" | "IntegerType" | "BooleanType";
}

/**
 * Any node whose `$type` this pipeline does not model (StringLiteralType,
 * DiscriminatedObjectType, AnyType, ...) or that failed to decode.
 */
export interface OtherTypeNode {
  kind: "Other";
  discriminator: string;
}

export type TypeNode =
  | ResourceTypeNode
  | ObjectTypeNode
  | ArrayTypeNode
  | UnionTypeNode
  | ScalarTypeNode
  | OtherTypeNode;

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

/**
 * A ResourceType node together with its position in the store and the two
 * halves of its name.
 */
export interface ResourceTypeEntry {
  /** Index of the ResourceType node in its file */
  index: number;
  node: ResourceTypeNode;
  /** Name before "@" (e.g., "Microsoft.Web/sites") */
  resourceType: string;
  /** Name after "@" (e.g., "2023-01-01"), empty string if absent */
  apiVersion: string;
}

// ---------------------------------------------------------------------------
// Synthesis
// ---------------------------------------------------------------------------

export type Scope =
  | "Tenant"
  | "ManagementGroup"
  | "Subscription"
  | "ResourceGroup"
  | "Extension"
  | "Unknown";

/**
 * Coarse label for a property's type, derived by resolving its type
 * reference one level.
 */
export type KindLabel =
  | "String Type"
  | "Integer Type"
  | "Boolean"
  | "Array Type"
  | "Object Type"
  | "Union Type"
  | "Complex Type"
  | "Property";

export interface PropertyDescriptor {
  required: boolean;
  kindLabel: KindLabel;
  description: string;
  typeRef?: number;
}

/**
 * A value in the rendered resource body. Objects render as nested blocks,
 * everything else with the scalar rules of the renderer.
 */
export type DocumentValue =
  | string
  | number
  | boolean
  | null
  | DocumentValue[]
  | DocumentObject;

export interface DocumentObject {
  [key: string]: DocumentValue;
}

/**
 * The synthesized view of one resource type. Transient: built, rendered,
 * and discarded.
 */
export interface ResourceSchema {
  /** Full name including the API version */
  typeName: string;
  resourceType: string;
  apiVersion: string;
  scope: Scope;
  scopeBitmask: number;
  /** Parent type shown in the documentation header (may be empty) */
  parentType: string;
  /** Natural-language guidance for the parent_id field */
  parentGuidance: string;
  /** Top-level body properties with read-only ones removed */
  properties: Map<string, PropertyDescriptor>;
  /** Body tree with nested object types expanded */
  body: DocumentObject;
}

/**
 * The long-lived artifact: resource type → documentation text.
 */
export type SchemaMap = Record<string, string>;

// ---------------------------------------------------------------------------
// Cache
// ---------------------------------------------------------------------------

export interface VersionRecord {
  /** Newest version found on disk, without the leading "v" */
  localVersion?: string;
  /** Release name reported upstream (e.g., "v2.6.1") */
  upstreamVersion: string;
}

export type CacheDecision = "use-cached" | "regenerate";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * Options shared by the synchronous pipeline stages.
 */
export interface PipelineOptions {
  /**
   * Progress callback for long-running operations and skipped inputs.
   * Defaults to stdout.
   */
  onProgress?: (message: string) => void;
}
