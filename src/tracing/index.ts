/**
 * tracing/index.ts - OpenTelemetry initialization for azapi-schema-docs
 *
 * What this file does:
 * Sets up OpenTelemetry tracing so schema generation, tar extraction, and MCP
 * tool calls show up as spans with timing and error information.
 *
 * Opt-in by default:
 * Tracing is disabled unless OTEL_TRACING_ENABLED=true. When disabled, the OTel
 * API returns a no-op tracer.
 *
 * Graceful degradation:
 * The SDK packages (@opentelemetry/sdk-trace-node, exporter-trace-otlp-proto)
 * are optional peer dependencies loaded via dynamic require(). When absent,
 * initialization is skipped and the OTel API stays a no-op.
 *
 * Exporter options:
 * - console (default): prints spans, useful for development
 * - otlp: sends spans to an OTLP collector at OTEL_EXPORTER_OTLP_ENDPOINT
 *
 * Status messages go to stderr: stdout belongs to the MCP stdio transport.
 */

import { trace, type Tracer } from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import { loadSdkTraceNode, loadExporterOtlpProto } from "./optional-deps";

const sdkTraceNode = loadSdkTraceNode();
const exporterOtlpProto = loadExporterOtlpProto();

const SERVICE_NAME = "azapi-schema-docs";

const isTracingEnabled = process.env.OTEL_TRACING_ENABLED === "true";

/**
 * Exporter type: "console" for development, "otlp" for collectors.
 */
const exporterType = process.env.OTEL_EXPORTER_TYPE || "console";

/**
 * Create the span exporter selected by OTEL_EXPORTER_TYPE.
 *
 * @throws Error for an unknown exporter type, a missing OTLP endpoint, or a
 *         missing exporter package
 */
function createSpanExporter(
  sdk: typeof import("@opentelemetry/sdk-trace-node")
): SpanExporter {
  if (exporterType === "otlp") {
    if (!exporterOtlpProto) {
      throw new Error(
        "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto. " +
          "Install it: npm install @opentelemetry/exporter-trace-otlp-proto"
      );
    }
    const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
    if (!endpoint) {
      throw new Error(
        "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp. " +
          "Set it to your collector URL (e.g., http://localhost:4318)."
      );
    }
    // Normalize: strip trailing slashes to avoid double-slash in URL
    const base = endpoint.replace(/\/+$/, "");
    const url = base.endsWith("/v1/traces") ? base : `${base}/v1/traces`;
    console.error(`[OTel] Using OTLP exporter → ${base}`);
    return new exporterOtlpProto.OTLPTraceExporter({ url });
  }

  if (exporterType !== "console") {
    throw new Error(
      `Unsupported OTEL_EXPORTER_TYPE: "${exporterType}". Valid options: "console", "otlp".`
    );
  }

  console.error("[OTel] Using console exporter");
  return new sdk.ConsoleSpanExporter();
}

/**
 * Register a global TracerProvider when tracing is enabled and the SDK is
 * installed. Spans are exported immediately (SimpleSpanProcessor): CLI runs
 * are short-lived.
 */
if (isTracingEnabled) {
  if (!sdkTraceNode) {
    console.warn(
      "[OTel] OTEL_TRACING_ENABLED=true but @opentelemetry/sdk-trace-node is not installed. " +
        "Tracing will be no-op. Install SDK packages for full telemetry."
    );
  } else {
    console.error("[OTel] Initializing OpenTelemetry tracing...");

    const exporter = createSpanExporter(sdkTraceNode);
    const provider = new sdkTraceNode.NodeTracerProvider({
      spanProcessors: [new sdkTraceNode.SimpleSpanProcessor(exporter)],
    });
    provider.register();

    console.error(`[OTel] Tracing enabled for ${SERVICE_NAME}`);

    const shutdown = async () => {
      try {
        await provider.shutdown();
        console.error("[OTel] Tracing shut down gracefully");
      } catch (error) {
        console.error("[OTel] Error shutting down tracing:", error);
      }
    };

    process.on("SIGTERM", shutdown);
    process.on("SIGINT", shutdown);
  }
}

/**
 * Get a tracer for creating spans.
 *
 * Returns the tracer from the global TracerProvider, or a no-op tracer when
 * tracing is disabled.
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}
