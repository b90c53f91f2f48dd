/**
 * generator.ts - Schema documentation generator
 *
 * Orchestrates the pipeline stages into one operation:
 * 1. Cache: decide whether the documentation on disk is current
 * 2. Fetch: have the ReleaseFetcher put the upstream release on disk
 * 3. Parse: load every Bicep types file, pick the latest API version of each
 *    resource type, and render its documentation
 * 4. Persist: write the map under the release's version
 *
 * A SchemaGenerator owns its data directory, fetcher, and cache. Create one
 * per process and pass it to whatever needs schemas. Concurrent
 * loadOrGenerate() calls are not deduplicated here; callers serialize them
 * (see tools/core/schema-provider.ts).
 */

import * as fs from "fs";
import * as path from "path";
import { SpanStatusCode } from "@opentelemetry/api";
import { getTracer } from "../tracing";
import type { ReleaseFetcher } from "../fetcher";
import { DEFAULT_CACHE_PREFIX, SchemaCache, decideCacheAction } from "./cache";
import { selectLatest } from "./selector";
import { renderDocumentation, synthesize } from "./synthesizer";
import { TypeNodeStore } from "./type-store";
import type { PipelineOptions, SchemaMap, VersionRecord } from "./types";

/** Location of the Bicep type files inside an azapi provider release */
export const BICEP_TYPES_PATH = path.join("internal", "azure", "generated");

/**
 * Default data directory: "data" next to the package root.
 */
export const DEFAULT_DATA_DIR = path.resolve(__dirname, "..", "..", "data");

// ---------------------------------------------------------------------------
// Directory parsing
// ---------------------------------------------------------------------------

/**
 * A rendered document plus what is needed to merge it with documents from
 * other files.
 */
interface RenderedSchema {
  resourceType: string;
  apiVersion: string;
  text: string;
}

/**
 * Lists every .json file under a directory, sorted so that output does not
 * depend on directory iteration order.
 */
export function findTypeFiles(dir: string): string[] {
  const files: string[] = [];

  const visit = (current: string): void => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        visit(full);
      } else if (entry.isFile() && entry.name.endsWith(".json")) {
        files.push(full);
      }
    }
  };

  visit(dir);
  return files.sort();
}

/**
 * Renders the latest API version of every resource type in one file.
 *
 * A resource type that fails to synthesize is reported and skipped; the
 * rest of the file continues.
 */
export function renderTypesFile(
  store: TypeNodeStore,
  options?: PipelineOptions
): RenderedSchema[] {
  const onProgress = options?.onProgress ?? console.log; // eslint-disable-line no-console
  const rendered: RenderedSchema[] = [];

  for (const entry of selectLatest(store.resourceTypes()).values()) {
    try {
      const schema = synthesize(store, entry);
      rendered.push({
        resourceType: schema.resourceType,
        apiVersion: schema.apiVersion,
        text: renderDocumentation(schema),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      onProgress(`  Warning: skipping ${entry.node.name} (${message})`);
    }
  }

  return rendered;
}

/**
 * Runs the parse/select/render stages over a directory of Bicep types files.
 *
 * Files that cannot be read or are not JSON arrays are reported and skipped.
 * When the same resource type appears in several files, the latest API
 * version wins, as within a file.
 *
 * @param dir - Directory containing Bicep types JSON files (searched recursively)
 * @returns Documentation text keyed by resource type
 */
export function generateFromDirectory(
  dir: string,
  options?: PipelineOptions
): SchemaMap {
  const onProgress = options?.onProgress ?? console.log; // eslint-disable-line no-console
  const files = findTypeFiles(dir);
  onProgress(`Found ${files.length} type files in ${dir}.`);

  const rendered: RenderedSchema[] = [];
  for (const file of files) {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, "utf-8"));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      onProgress(`  Warning: skipping ${file} (${message})`);
      continue;
    }
    if (!Array.isArray(raw)) continue;

    // The store lives only as long as this file's resource types are rendered.
    rendered.push(...renderTypesFile(new TypeNodeStore(raw), { onProgress }));
  }

  const schemas: SchemaMap = {};
  for (const winner of selectLatest(rendered).values()) {
    schemas[winner.resourceType] = winner.text;
  }

  onProgress(`Rendered ${Object.keys(schemas).length} resource schemas.`);
  return schemas;
}

// ---------------------------------------------------------------------------
// Generator
// ---------------------------------------------------------------------------

/**
 * Options for SchemaGenerator.
 */
export interface SchemaGeneratorOptions extends PipelineOptions {
  /** Source of upstream releases */
  fetcher: ReleaseFetcher;
  /**
   * Directory for the version-stamped schema files.
   * Defaults to AZAPI_DATA_DIR env var or the package's data directory.
   */
  dataDir?: string;
  /** Filename prefix of the schema files. Defaults to "azapi_schemas". */
  cachePrefix?: string;
}

/**
 * Result of a generate() call.
 */
export interface GenerateResult {
  version: string;
  schemas: SchemaMap;
  /** Path the schemas were written to */
  file: string;
}

/**
 * Loads cached schema documentation or regenerates it from upstream.
 *
 * Usage:
 *   const generator = new SchemaGenerator({ fetcher: new GitHubReleaseFetcher() });
 *   const schemas = await generator.loadOrGenerate();
 *   getSchema("Microsoft.Web/sites", schemas);
 */
export class SchemaGenerator {
  readonly cache: SchemaCache;
  private readonly fetcher: ReleaseFetcher;
  private readonly onProgress: (message: string) => void;

  /** Version of the schemas most recently loaded or generated */
  private version: string | undefined;

  constructor(options: SchemaGeneratorOptions) {
    const dataDir =
      options.dataDir ?? process.env.AZAPI_DATA_DIR ?? DEFAULT_DATA_DIR;
    this.cache = new SchemaCache(dataDir, options.cachePrefix ?? DEFAULT_CACHE_PREFIX);
    this.fetcher = options.fetcher;
    this.onProgress = options.onProgress ?? console.log; // eslint-disable-line no-console
  }

  get currentVersion(): string | undefined {
    return this.version;
  }

  /**
   * Returns the cached schemas when they match the latest upstream release,
   * and regenerates them otherwise.
   *
   * - Upstream unreachable or regeneration failed: falls back to the newest
   *   local cache that loads, and only rethrows when none does.
   * - Cached file unreadable: treated as a cache miss.
   *
   * @param forceRegenerate - Regenerate even when the cache is current
   */
  async loadOrGenerate(forceRegenerate = false): Promise<SchemaMap> {
    let record: VersionRecord;
    try {
      record = await this.checkVersions();
    } catch (error) {
      return this.fallBackToCache("could not check upstream version", error);
    }

    const { localVersion, upstreamVersion } = record;
    const decision = decideCacheAction(localVersion, upstreamVersion, forceRegenerate);
    if (decision === "use-cached" && localVersion !== undefined) {
      try {
        return this.loadCached(localVersion);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.onProgress(`  Warning: cached schemas unusable (${message}); regenerating.`);
      }
    } else if (!forceRegenerate) {
      this.onProgress(
        `New version available: ${upstreamVersion} (local: ${localVersion ?? "none"}).`
      );
    }

    try {
      return (await this.generate(upstreamVersion)).schemas;
    } catch (error) {
      return this.fallBackToCache(`could not generate ${upstreamVersion}`, error);
    }
  }

  /**
   * Newest local version alongside the latest upstream release.
   *
   * @throws Error when upstream cannot be reached
   */
  async checkVersions(): Promise<VersionRecord> {
    return {
      localVersion: this.cache.latestLocalVersion(),
      upstreamVersion: await this.fetcher.latestVersion(),
    };
  }

  /**
   * Downloads a release, renders its schemas, and saves them.
   *
   * @param tag - "latest" or a release tag (e.g., "v2.6.1")
   * @throws Error if the release has no Bicep types directory
   */
  async generate(tag = "latest"): Promise<GenerateResult> {
    const tracer = getTracer();
    const span = tracer.startSpan("azapi.generate_schemas");
    span.setAttribute("azapi.release.tag", tag);

    try {
      const version = tag === "latest" ? await this.fetcher.latestVersion() : tag;
      this.onProgress(`Generating AzAPI schemas for ${version}...`);

      const releaseDir = await this.fetcher.download(tag);
      const bicepDir = path.join(releaseDir, BICEP_TYPES_PATH);
      if (!fs.existsSync(bicepDir)) {
        throw new Error(`Bicep directory not found: ${bicepDir}`);
      }

      const schemas = generateFromDirectory(bicepDir, { onProgress: this.onProgress });
      const file = this.cache.save(version, schemas);
      this.version = version;

      span.setAttribute("azapi.release.version", version);
      span.setAttribute("azapi.schema.count", Object.keys(schemas).length);
      span.setStatus({ code: SpanStatusCode.OK });

      this.onProgress(`Saved ${Object.keys(schemas).length} schemas to ${file}.`);
      return { version, schemas, file };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      span.recordException(error instanceof Error ? error : new Error(message));
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      throw error;
    } finally {
      span.end();
    }
  }

  /**
   * Loads the newest usable local cache after `error`, trying older versions
   * when a file is unreadable. Rethrows `error` when nothing loads.
   */
  private fallBackToCache(reason: string, error: unknown): SchemaMap {
    const message = error instanceof Error ? error.message : String(error);
    for (const localVersion of this.cache.localVersions()) {
      this.onProgress(`  Warning: ${reason} (${message}); using cached v${localVersion}.`);
      try {
        return this.loadCached(localVersion);
      } catch (loadError) {
        const loadMessage = loadError instanceof Error ? loadError.message : String(loadError);
        this.onProgress(`  Warning: cached v${localVersion} unusable (${loadMessage}).`);
      }
    }
    throw error;
  }

  private loadCached(localVersion: string): SchemaMap {
    const schemas = this.cache.load(localVersion);
    this.version = `v${localVersion}`;
    this.onProgress(
      `Loaded ${Object.keys(schemas).length} cached AzAPI schemas (v${localVersion}).`
    );
    return schemas;
  }
}
