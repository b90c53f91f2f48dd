/**
 * pipeline/index.ts - Public API for the schema documentation pipeline
 *
 * Re-exports everything other modules need from the pipeline.
 * Other modules import from here rather than from the stage modules.
 *
 * Usage:
 *   import {
 *     SchemaGenerator,
 *     getSchema,
 *     type SchemaMap,
 *   } from "./pipeline";
 */

// Types shared across pipeline stages
export type {
  TypeNode,
  PropertyNode,
  ResourceTypeEntry,
  Scope,
  KindLabel,
  PropertyDescriptor,
  DocumentValue,
  DocumentObject,
  ResourceSchema,
  SchemaMap,
  VersionRecord,
  CacheDecision,
  PipelineOptions,
} from "./types";

// Store and reference resolution
export { TypeNodeStore, decodeTypeNode, parseRef, splitTypeName } from "./type-store";

// Scope classification
export {
  classifyScope,
  deriveParentGuidance,
  deriveParentType,
  RESOURCE_GROUPS_TYPE,
} from "./scope";

// Property walking
export {
  walkProperties,
  expandBody,
  kindLabelFor,
  describeProperty,
} from "./property-walker";

// Version selection
export { selectLatest } from "./selector";

// Synthesis and rendering
export {
  synthesize,
  renderDocumentation,
  renderValue,
  compareKeys,
  resourceLabel,
} from "./synthesizer";

// Cache
export {
  SchemaCache,
  decideCacheAction,
  stripVersionPrefix,
  DEFAULT_CACHE_PREFIX,
} from "./cache";

// Generator
export {
  SchemaGenerator,
  generateFromDirectory,
  BICEP_TYPES_PATH,
} from "./generator";
export type { SchemaGeneratorOptions, GenerateResult } from "./generator";

// Lookups
export { getSchema, getParentType } from "./lookup";
