/**
 * schema-provider.test.ts - Unit tests for the shared, lazily loaded schema map
 */

import { describe, it, expect, vi } from "vitest";
import { SchemaProvider } from "./schema-provider";

describe("SchemaProvider", () => {
  it("does not load until first asked", () => {
    const source = { loadOrGenerate: vi.fn().mockResolvedValue({}) };

    new SchemaProvider(source);

    expect(source.loadOrGenerate).not.toHaveBeenCalled();
  });

  it("shares one load between concurrent callers", async () => {
    const schemas = { "Foo.Bar/widgets": "doc" };
    const source = { loadOrGenerate: vi.fn().mockResolvedValue(schemas) };
    const provider = new SchemaProvider(source);

    const [first, second] = await Promise.all([
      provider.getSchemas(),
      provider.getSchemas(),
    ]);

    expect(first).toBe(schemas);
    expect(second).toBe(schemas);
    expect(source.loadOrGenerate).toHaveBeenCalledOnce();
  });

  it("keeps the loaded map for later calls", async () => {
    const source = { loadOrGenerate: vi.fn().mockResolvedValue({}) };
    const provider = new SchemaProvider(source);

    await provider.getSchemas();
    await provider.getSchemas();

    expect(source.loadOrGenerate).toHaveBeenCalledOnce();
  });

  it("retries after a failed load", async () => {
    const source = {
      loadOrGenerate: vi
        .fn()
        .mockRejectedValueOnce(new Error("offline"))
        .mockResolvedValueOnce({ "Foo.Bar/widgets": "doc" }),
    };
    const provider = new SchemaProvider(source);

    await expect(provider.getSchemas()).rejects.toThrow("offline");
    await expect(provider.getSchemas()).resolves.toEqual({ "Foo.Bar/widgets": "doc" });
    expect(source.loadOrGenerate).toHaveBeenCalledTimes(2);
  });
});
