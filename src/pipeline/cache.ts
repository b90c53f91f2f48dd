/**
 * cache.ts - Version-stamped persistence of generated schema documentation
 *
 * Generating documentation means downloading and parsing a whole provider
 * release, so the result is written to `<dataDir>/<prefix>_v<version>.json`
 * and reused until upstream publishes a different release.
 *
 * Two pieces:
 * - decideCacheAction(): the pure reuse-or-regenerate rule
 * - SchemaCache: reads, writes, and lists the version-stamped files
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import type { CacheDecision, SchemaMap } from "./types";

/** Default filename prefix for the persisted schema map */
export const DEFAULT_CACHE_PREFIX = "azapi_schemas";

const SchemaMapSchema = z.record(z.string());

/**
 * Removes a single leading "v" ("v2.6.0" -> "2.6.0").
 */
export function stripVersionPrefix(version: string): string {
  return version.startsWith("v") ? version.substring(1) : version;
}

/**
 * Decides whether the local cache can be reused.
 *
 * Regenerates when forced, when nothing is cached, or when the cached and
 * upstream versions differ after stripping a leading "v" from each. Versions
 * are compared as plain strings.
 *
 * @example
 *   decideCacheAction("2.6.0", "v2.6.0", false) // "use-cached"
 *   decideCacheAction(undefined, "v1.0.0", false) // "regenerate"
 */
export function decideCacheAction(
  localVersion: string | undefined,
  upstreamVersion: string,
  forceRegenerate: boolean
): CacheDecision {
  if (forceRegenerate || localVersion === undefined) {
    return "regenerate";
  }
  return stripVersionPrefix(localVersion) === stripVersionPrefix(upstreamVersion)
    ? "use-cached"
    : "regenerate";
}

/**
 * Compares release versions: dotted numeric parts first ("2.10.0" > "2.9.1"),
 * then a release sorts after its prerelease ("2.7.0" > "2.7.0-beta1"), then
 * suffixes compare as strings. Non-numeric parts count as 0.
 */
export function compareVersions(a: string, b: string): number {
  const [leftCore, leftSuffix] = splitSuffix(a);
  const [rightCore, rightSuffix] = splitSuffix(b);
  const left = leftCore.split(".").map(numericPart);
  const right = rightCore.split(".").map(numericPart);
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }

  if (leftSuffix === rightSuffix) return 0;
  if (leftSuffix === "") return 1;
  if (rightSuffix === "") return -1;
  return leftSuffix < rightSuffix ? -1 : 1;
}

function splitSuffix(version: string): [string, string] {
  const dash = version.indexOf("-");
  return dash === -1
    ? [version, ""]
    : [version.substring(0, dash), version.substring(dash + 1)];
}

function numericPart(part: string): number {
  const value = Number.parseInt(part, 10);
  return Number.isNaN(value) ? 0 : value;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Reads and writes schema maps in a data directory.
 *
 * Usage:
 *   const cache = new SchemaCache("/var/lib/azapi");
 *   const local = cache.latestLocalVersion();   // "2.6.1" or undefined
 *   const schemas = cache.load("v2.6.1");
 *   cache.save("v2.7.0", schemas);
 */
export class SchemaCache {
  private readonly filePattern: RegExp;

  constructor(
    readonly dataDir: string,
    private readonly prefix: string = DEFAULT_CACHE_PREFIX
  ) {
    this.filePattern = new RegExp(
      `^${escapeRegExp(prefix)}_v(.+)\\.json$`
    );
  }

  /**
   * Path of the file holding a version. The version is stamped with a single
   * leading "v" whether or not the caller included one.
   */
  fileFor(version: string): string {
    return path.join(
      this.dataDir,
      `${this.prefix}_v${stripVersionPrefix(version)}.json`
    );
  }

  /**
   * Versions present on disk, newest first, without the leading "v".
   */
  localVersions(): string[] {
    if (!fs.existsSync(this.dataDir)) return [];

    return fs
      .readdirSync(this.dataDir)
      .map((file) => this.filePattern.exec(file)?.[1])
      .filter((version): version is string => version !== undefined)
      .sort((a, b) => compareVersions(b, a));
  }

  /**
   * Newest version on disk, or undefined when nothing is cached.
   */
  latestLocalVersion(): string | undefined {
    return this.localVersions()[0];
  }

  /**
   * Loads a cached schema map.
   *
   * @throws Error if the file is missing, is not JSON, or is not a flat
   *         string-to-string object
   */
  load(version: string): SchemaMap {
    const file = this.fileFor(version);
    const parsed = SchemaMapSchema.safeParse(
      JSON.parse(fs.readFileSync(file, "utf-8"))
    );
    if (!parsed.success) {
      throw new Error(`Cached schema file ${file} is not a string map`);
    }
    return parsed.data;
  }

  /**
   * Writes a schema map for a version, creating the data directory if needed.
   *
   * @returns The path written
   */
  save(version: string, schemas: SchemaMap): string {
    fs.mkdirSync(this.dataDir, { recursive: true });
    const file = this.fileFor(version);
    fs.writeFileSync(file, JSON.stringify(schemas, null, 2), "utf-8");
    return file;
  }
}
