/**
 * tool-tracing.test.ts - Tests for withToolTracing against a real tracer provider
 *
 * Registers a NodeTracerProvider with an in-memory exporter so the spans the
 * wrapper creates can be inspected after each call.
 */

import { describe, it, expect, beforeAll, afterEach } from "vitest";
import { SpanStatusCode } from "@opentelemetry/api";
import {
  InMemorySpanExporter,
  NodeTracerProvider,
  SimpleSpanProcessor,
} from "@opentelemetry/sdk-trace-node";
import { getTracer } from "./index";
import { withToolTracing } from "./tool-tracing";

const exporter = new InMemorySpanExporter();

beforeAll(() => {
  new NodeTracerProvider({
    spanProcessors: [new SimpleSpanProcessor(exporter)],
  }).register();
});

afterEach(() => {
  exporter.reset();
});

function finishedSpan(name: string) {
  const span = exporter.getFinishedSpans().find((s) => s.name === name);
  if (!span) throw new Error(`no finished span named ${name}`);
  return span;
}

describe("withToolTracing", () => {
  it("records a span with the tool attributes", async () => {
    const handler = withToolTracing(
      "get_azapi_schema",
      async (input: { resourceType: string }) => ({
        output: `doc for ${input.resourceType}`,
        isError: false,
      })
    );

    const result = await handler({ resourceType: "Microsoft.Web/sites" });

    expect(result).toEqual({ output: "doc for Microsoft.Web/sites", isError: false });
    const span = finishedSpan("execute_tool get_azapi_schema");
    expect(span.attributes["gen_ai.operation.name"]).toBe("execute_tool");
    expect(span.attributes["gen_ai.tool.name"]).toBe("get_azapi_schema");
    expect(span.attributes["gen_ai.tool.type"]).toBe("function");
    expect(span.attributes["gen_ai.tool.call.arguments"]).toBe(
      '{"resourceType":"Microsoft.Web/sites"}'
    );
    expect(span.attributes["gen_ai.tool.call.id"]).toMatch(/^[0-9a-f-]{36}$/);
    expect(span.attributes["mcp.tool.is_error"]).toBe(false);
    expect(span.status.code).toBe(SpanStatusCode.OK);
  });

  it("keeps status OK for lookups that found nothing", async () => {
    const handler = withToolTracing("get_azapi_schema", async () => ({
      output: "not found",
      isError: true,
    }));

    await handler({});

    const span = finishedSpan("execute_tool get_azapi_schema");
    expect(span.attributes["mcp.tool.is_error"]).toBe(true);
    expect(span.status.code).toBe(SpanStatusCode.OK);
  });

  it("records thrown errors and rethrows them", async () => {
    const handler = withToolTracing("get_azapi_schema", async (): Promise<{ isError: boolean }> => {
      throw new Error("offline");
    });

    await expect(handler({})).rejects.toThrow("offline");

    const span = finishedSpan("execute_tool get_azapi_schema");
    expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: "offline" });
    expect(span.events.map((event) => event.name)).toEqual(["exception"]);
  });

  it("parents spans started inside the handler", async () => {
    const handler = withToolTracing("get_azapi_schema", async () => {
      getTracer().startSpan("azapi.generate_schemas").end();
      return { isError: false };
    });

    await handler({});

    const tool = finishedSpan("execute_tool get_azapi_schema");
    const child = finishedSpan("azapi.generate_schemas");
    expect(child.parentSpanId).toBe(tool.spanContext().spanId);
    expect(child.spanContext().traceId).toBe(tool.spanContext().traceId);
  });
});
