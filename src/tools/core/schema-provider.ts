/**
 * schema-provider.ts - Lazily loaded, shared schema map for the tools
 *
 * Loading schemas can mean downloading and parsing a whole provider release.
 * The provider starts that work on the first tool call and hands every caller
 * the same in-flight promise, so concurrent calls never regenerate twice or
 * write the same cache file at the same time. A failed load is forgotten so
 * the next call can retry.
 */

import type { SchemaMap } from "../../pipeline";

/**
 * Anything that can produce the schema map (SchemaGenerator in production,
 * a stub in tests).
 */
export interface SchemaSource {
  loadOrGenerate(forceRegenerate?: boolean): Promise<SchemaMap>;
}

export class SchemaProvider {
  private pending: Promise<SchemaMap> | undefined;

  constructor(private readonly source: SchemaSource) {}

  /**
   * Returns the schema map, loading it on first use.
   */
  getSchemas(): Promise<SchemaMap> {
    if (!this.pending) {
      this.pending = this.source.loadOrGenerate().catch((error: unknown) => {
        this.pending = undefined;
        throw error;
      });
    }
    return this.pending;
  }
}
