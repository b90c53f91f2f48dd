/**
 * selector.ts - Keeps the latest API version of each resource type
 *
 * A provider's types file usually lists the same resource type once per API
 * version ("Microsoft.Web/sites@2022-03-01", "Microsoft.Web/sites@2023-01-01").
 * Only the newest one is documented.
 *
 * API versions are compared as plain strings. ARM versions are fixed-width
 * ISO dates with optional suffixes ("2023-01-01-preview"), so string order is
 * date order. Equal versions keep the first entry seen.
 */

/**
 * Anything that carries a resource type name and an API version.
 */
export interface Versioned {
  resourceType: string;
  apiVersion: string;
}

/**
 * Groups entries by case-insensitive resource type and keeps the entry with
 * the greatest API version in each group.
 *
 * @param entries - Entries in the order they were found
 * @returns Winners keyed by lower-cased resource type, in first-seen group order
 */
export function selectLatest<T extends Versioned>(
  entries: Iterable<T>
): Map<string, T> {
  const latest = new Map<string, T>();

  for (const entry of entries) {
    const key = entry.resourceType.toLowerCase();
    const current = latest.get(key);
    if (!current || entry.apiVersion > current.apiVersion) {
      latest.set(key, entry);
    }
  }

  return latest;
}
