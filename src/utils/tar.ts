/**
 * tar.ts - Extracts release archives with the tar CLI
 *
 * How it works:
 * 1. Takes an array of tar arguments (e.g., ["-xzf", "release.tar.gz", "-C", "out"])
 * 2. Spawns tar as a child process
 * 3. Returns the output as a string, or an error message if it fails
 *
 * spawnSync with an args array bypasses the shell, so archive paths built
 * from release names are passed to tar as single arguments and never
 * interpreted as shell syntax.
 *
 * Each execution creates an OpenTelemetry span (process.* semconv attributes).
 */

import { spawnSync } from "child_process";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { getTracer } from "../tracing";

/**
 * Result from executing a tar command.
 * `isError` comes from the exit code, never from the output text.
 */
export interface TarResult {
  output: string;
  isError: boolean;
}

/**
 * Signature shared by the real executor and test doubles.
 */
export type TarExecutor = (args: string[]) => TarResult;

/** Archives of a full provider release take a while to unpack */
const TAR_TIMEOUT_MS = 120000;

/**
 * Executes tar and returns a structured result.
 *
 * @param args - Arguments to pass to tar
 * @returns Object with output string and isError flag based on exit code
 *
 * Example:
 *   executeTar(["-xzf", "/tmp/v2.6.1.tar.gz", "-C", "/tmp/extracted_v2.6.1"])
 *   // Returns: { output: "", isError: false }
 */
export function executeTar(args: string[]): TarResult {
  const tracer = getTracer();
  const command = `tar ${args.join(" ")}`;

  return tracer.startActiveSpan(
    "tar extract",
    { kind: SpanKind.CLIENT },
    (span) => {
      span.setAttribute("process.executable.name", "tar");
      span.setAttribute("process.command_args", ["tar", ...args]);

      try {
        const result = spawnSync("tar", args, {
          encoding: "utf-8",
          timeout: TAR_TIMEOUT_MS,
        });

        // Spawn errors (e.g., tar not installed)
        if (result.error) {
          span.setAttribute("process.exit.code", -1);
          span.setAttribute("error.type", result.error.name);
          span.recordException(result.error);
          span.setStatus({
            code: SpanStatusCode.ERROR,
            message: result.error.message,
          });

          return {
            output: `Error executing "${command}": ${result.error.message}`,
            isError: true,
          };
        }

        span.setAttribute("process.exit.code", result.status ?? -1);

        if (result.status !== 0) {
          const errorMessage = result.stderr || "Unknown error";
          span.setAttribute("error.type", "TarError");
          span.setStatus({
            code: SpanStatusCode.ERROR,
            message: errorMessage,
          });

          return {
            output: `Error executing "${command}": ${errorMessage}`,
            isError: true,
          };
        }

        span.setStatus({ code: SpanStatusCode.OK });
        return { output: result.stdout, isError: false };
      } finally {
        span.end();
      }
    }
  );
}
