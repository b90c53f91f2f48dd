/**
 * tar.test.ts - Unit tests for the tar executor
 *
 * child_process is mocked, so no archive is ever unpacked.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("child_process", () => ({
  spawnSync: vi.fn(),
}));

import { spawnSync } from "child_process";
import { executeTar } from "./tar";

const ARGS = ["-xzf", "v2.6.0.tar.gz", "-C", "extracted_v2.6.0"];

function spawnResult(overrides: { status?: number | null; stdout?: string; stderr?: string; error?: Error }) {
  return {
    pid: 1234,
    output: [],
    stdout: "",
    stderr: "",
    status: 0,
    signal: null,
    ...overrides,
  };
}

beforeEach(() => {
  vi.mocked(spawnSync).mockReset();
});

describe("executeTar", () => {
  it("runs tar with the given arguments and a timeout", () => {
    vi.mocked(spawnSync).mockReturnValue(spawnResult({}));

    const result = executeTar(ARGS);

    expect(result).toEqual({ output: "", isError: false });
    expect(spawnSync).toHaveBeenCalledWith("tar", ARGS, {
      encoding: "utf-8",
      timeout: 120000,
    });
  });

  it("reports a non-zero exit with stderr", () => {
    vi.mocked(spawnSync).mockReturnValue(
      spawnResult({ status: 2, stderr: "gzip: stdin: not in gzip format" })
    );

    expect(executeTar(ARGS)).toEqual({
      output:
        'Error executing "tar -xzf v2.6.0.tar.gz -C extracted_v2.6.0": gzip: stdin: not in gzip format',
      isError: true,
    });
  });

  it("reports a non-zero exit without stderr", () => {
    vi.mocked(spawnSync).mockReturnValue(spawnResult({ status: 1 }));

    expect(executeTar(ARGS).output).toBe(
      'Error executing "tar -xzf v2.6.0.tar.gz -C extracted_v2.6.0": Unknown error'
    );
  });

  it("reports a spawn failure", () => {
    vi.mocked(spawnSync).mockReturnValue(
      spawnResult({ status: null, error: new Error("spawnSync tar ENOENT") })
    );

    expect(executeTar(ARGS)).toEqual({
      output: 'Error executing "tar -xzf v2.6.0.tar.gz -C extracted_v2.6.0": spawnSync tar ENOENT',
      isError: true,
    });
  });
});
