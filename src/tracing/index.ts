/**
 * OpenTelemetry tracing initialization for semantic-ingest
 *
 * This module sets up distributed tracing so ingestion runs, batch upserts and
 * searches show up as spans in a tracing backend.
 *
 * How it works:
 * 1. When OTEL_TRACING_ENABLED=true, we create a NodeTracerProvider
 * 2. The provider gets one exporter, picked by OTEL_EXPORTER_TYPE
 * 3. register() makes it the global provider, so getTracer() anywhere in the
 *    process returns a tracer that exports
 *
 * Exporter types (OTEL_EXPORTER_TYPE):
 * - console (default): Prints spans to stdout, useful for development
 * - otlp: Sends spans via OTLP protocol to a collector (Jaeger, Datadog Agent, etc.)
 *
 * When tracing is disabled, or the SDK packages are not installed, nothing is
 * registered and the OTel API hands out its built-in no-op tracer. Code that
 * creates spans does not need to know which case it is in.
 *
 * Import this module once, early, from each entry point (CLI, MCP server).
 */

import { trace, type Tracer } from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import { loadTracingPackages } from "./optional-deps";

/**
 * Optional OTel SDK packages loaded at module init time.
 *
 * These packages are optional peer dependencies; consumers who don't want
 * telemetry don't need to install them.
 *
 * When missing:
 * - sdkTraceNode = null → no provider, every span is a no-op
 * - exporterOtlpProto = null → no OTLPTraceExporter available
 */
const { sdkTraceNode, exporterOtlpProto } = loadTracingPackages();

/** Service name reported on every tracer */
export const SERVICE_NAME = "semantic-ingest";

/**
 * Tracing is opt-in: development output stays quiet unless asked for.
 */
const isTracingEnabled = process.env.OTEL_TRACING_ENABLED === "true";

/**
 * Exporter type: "console" for development, "otlp" for production backends.
 *
 * When using "otlp", you must also set OTEL_EXPORTER_OTLP_ENDPOINT to the
 * collector URL (e.g., http://localhost:4318).
 */
const exporterType = process.env.OTEL_EXPORTER_TYPE || "console";

/**
 * Create the appropriate span exporter based on configuration.
 *
 * Checks for specific exporter packages and fails with the package name if
 * the requested exporter needs one that isn't installed.
 */
function createSpanExporter(): SpanExporter {
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
    console.log(`[OTel] Using OTLP exporter → ${base}`);
    return new exporterOtlpProto.OTLPTraceExporter({ url });
  }

  if (exporterType !== "console") {
    throw new Error(
      `Unsupported OTEL_EXPORTER_TYPE: "${exporterType}". Valid options: "console", "otlp".`
    );
  }

  if (!sdkTraceNode) {
    throw new Error(
      "Console exporter requires @opentelemetry/sdk-trace-node. " +
        "Install it: npm install @opentelemetry/sdk-trace-node"
    );
  }

  console.log("[OTel] Using console exporter");
  return new sdkTraceNode.ConsoleSpanExporter();
}

/**
 * Initialize tracing if enabled and the SDK is available.
 *
 * SimpleSpanProcessor exports each span as it ends. A CLI run is short and
 * may exit right after the last span, so batching would lose data.
 */
if (isTracingEnabled) {
  if (!sdkTraceNode) {
    console.warn(
      "[OTel] OTEL_TRACING_ENABLED=true but @opentelemetry/sdk-trace-node is not installed. " +
        "Tracing will be no-op. Install SDK packages for full telemetry."
    );
  } else {
    console.log("[OTel] Initializing OpenTelemetry tracing..."); // eslint-disable-line no-console

    const exporter = createSpanExporter();
    const provider = new sdkTraceNode.NodeTracerProvider();
    provider.addSpanProcessor(new sdkTraceNode.SimpleSpanProcessor(exporter));
    provider.register();

    console.log(`[OTel] Tracing enabled for ${SERVICE_NAME}`); // eslint-disable-line no-console

    /**
     * Graceful shutdown: flush pending spans before process exits.
     */
    const shutdown = async () => {
      try {
        await provider.shutdown();
        console.log("[OTel] Tracing shut down gracefully"); // eslint-disable-line no-console
      } catch (error) {
        console.error("[OTel] Error shutting down tracing:", error);
      }
    };

    // Handle common termination signals
    process.on("SIGTERM", shutdown);
    process.on("SIGINT", shutdown);
  }
}

/**
 * Get a tracer for creating spans.
 *
 * Returns the tracer from whatever TracerProvider is registered globally:
 * ours when tracing is enabled, the API's no-op one otherwise.
 *
 * Usage in other modules:
 * ```typescript
 * import { getTracer } from './tracing';
 * const tracer = getTracer();
 * const span = tracer.startSpan('myOperation');
 * ```
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}
