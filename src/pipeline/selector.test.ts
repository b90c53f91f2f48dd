/**
 * selector.test.ts - Unit tests for latest-API-version selection
 */

import { describe, it, expect } from "vitest";
import { selectLatest, type Versioned } from "./selector";

function makeEntry(
  resourceType: string,
  apiVersion: string,
  tag = ""
): Versioned & { tag: string } {
  return { resourceType, apiVersion, tag };
}

describe("selectLatest", () => {
  it("keeps only the newest API version of a resource type", () => {
    const latest = selectLatest([
      makeEntry("Foo.Bar/widgets", "2022-01-01"),
      makeEntry("Foo.Bar/widgets", "2023-01-01"),
    ]);

    expect([...latest.values()]).toEqual([
      makeEntry("Foo.Bar/widgets", "2023-01-01"),
    ]);
  });

  it("does not depend on input order", () => {
    const latest = selectLatest([
      makeEntry("Foo.Bar/widgets", "2023-01-01"),
      makeEntry("Foo.Bar/widgets", "2022-01-01"),
    ]);

    expect(latest.get("foo.bar/widgets")?.apiVersion).toBe("2023-01-01");
  });

  it("groups resource types case-insensitively", () => {
    const latest = selectLatest([
      makeEntry("Foo.Bar/Widgets", "2021-01-01"),
      makeEntry("foo.bar/widgets", "2024-06-01"),
    ]);

    expect(latest.size).toBe(1);
    expect(latest.get("foo.bar/widgets")?.resourceType).toBe("foo.bar/widgets");
  });

  it("compares versions as plain strings", () => {
    const latest = selectLatest([
      makeEntry("Foo.Bar/widgets", "2023-01-01"),
      makeEntry("Foo.Bar/widgets", "2023-01-01-preview"),
    ]);

    expect(latest.get("foo.bar/widgets")?.apiVersion).toBe("2023-01-01-preview");
  });

  it("keeps the first entry when versions tie", () => {
    const latest = selectLatest([
      makeEntry("Foo.Bar/widgets", "2023-01-01", "first"),
      makeEntry("Foo.Bar/widgets", "2023-01-01", "second"),
    ]);

    expect(latest.get("foo.bar/widgets")?.tag).toBe("first");
  });

  it("keeps groups in first-seen order", () => {
    const latest = selectLatest([
      makeEntry("Foo.Bar/widgets", "2023-01-01"),
      makeEntry("Foo.Bar/gadgets", "2023-01-01"),
      makeEntry("Foo.Bar/widgets", "2024-01-01"),
    ]);

    expect([...latest.keys()]).toEqual(["foo.bar/widgets", "foo.bar/gadgets"]);
  });
});
