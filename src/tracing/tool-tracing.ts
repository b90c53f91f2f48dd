/**
 * tool-tracing.ts - OpenTelemetry instrumentation for MCP tool calls
 *
 * Wraps a tool handler so that every invocation gets a span named
 * "execute_tool <toolName>" with the OTel GenAI tool attributes. Keeping this
 * in a wrapper leaves the tool modules free of tracing code.
 *
 * Error handling:
 * - Thrown errors: recorded on the span, status ERROR, rethrown
 * - Results with isError: true (e.g., unknown resource type): status stays OK;
 *   the tool ran, the lookup simply found nothing
 */

import { randomUUID } from "crypto";
import { SpanKind, SpanStatusCode, context, trace } from "@opentelemetry/api";
import { getTracer } from "./index";

/**
 * Tool results only need to expose isError for tracing; the rest passes through.
 */
interface ResultWithError {
  isError?: boolean;
}

/**
 * Wraps an MCP tool handler with OpenTelemetry tracing.
 *
 * | Attribute                  | Value                          |
 * |----------------------------|--------------------------------|
 * | gen_ai.operation.name      | "execute_tool"                 |
 * | gen_ai.tool.name           | toolName                       |
 * | gen_ai.tool.type           | "function"                     |
 * | gen_ai.tool.call.id        | random UUID per invocation     |
 * | gen_ai.tool.call.arguments | JSON of the input              |
 * | mcp.tool.is_error          | the result's isError flag      |
 *
 * @param toolName - The name of the tool (e.g., "get_azapi_schema")
 * @param handler - The async function that executes the tool logic
 * @returns A wrapped handler that traces the execution
 */
export function withToolTracing<TInput, TResult extends ResultWithError>(
  toolName: string,
  handler: (input: TInput) => Promise<TResult>
): (input: TInput) => Promise<TResult> {
  return async (input: TInput): Promise<TResult> => {
    const span = getTracer().startSpan(`execute_tool ${toolName}`, {
      kind: SpanKind.INTERNAL,
    });

    span.setAttribute("gen_ai.operation.name", "execute_tool");
    span.setAttribute("gen_ai.tool.name", toolName);
    span.setAttribute("gen_ai.tool.type", "function");
    span.setAttribute("gen_ai.tool.call.id", randomUUID());
    span.setAttribute("gen_ai.tool.call.arguments", JSON.stringify(input));

    // context.with() keeps the span active across the handler's awaits, so
    // schema generation spans nest under the tool span.
    const activeContext = trace.setSpan(context.active(), span);

    return context.with(activeContext, async () => {
      try {
        const result = await handler(input);
        span.setAttribute("mcp.tool.is_error", result.isError === true);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        const exception = error instanceof Error ? error : new Error(String(error));
        span.recordException(exception);
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: exception.message,
        });
        throw error;
      } finally {
        span.end();
      }
    });
  };
}
