/**
 * optional-deps.ts - Loads the optional OTel SDK packages tracing is built from
 *
 * Tracing needs two optional peer dependencies:
 * - @opentelemetry/sdk-trace-node: NodeTracerProvider, SimpleSpanProcessor
 *   and ConsoleSpanExporter
 * - @opentelemetry/exporter-trace-otlp-proto: OTLPTraceExporter, only for
 *   OTEL_EXPORTER_TYPE=otlp
 *
 * A package that isn't installed loads as null. Any other load failure
 * (broken install, syntax error in a transitive dependency) is rethrown.
 *
 * The require() calls live here so tests can vi.mock("./optional-deps");
 * Vitest cannot intercept require() made from the tracing module itself.
 */

export interface TracingPackages {
  sdkTraceNode: typeof import("@opentelemetry/sdk-trace-node") | null;
  exporterOtlpProto: typeof import("@opentelemetry/exporter-trace-otlp-proto") | null;
}

export function loadTracingPackages(): TracingPackages {
  return {
    sdkTraceNode: loadOptional<TracingPackages["sdkTraceNode"]>(
      "@opentelemetry/sdk-trace-node",
      () => require("@opentelemetry/sdk-trace-node")
    ),
    exporterOtlpProto: loadOptional<TracingPackages["exporterOtlpProto"]>(
      "@opentelemetry/exporter-trace-otlp-proto",
      () => require("@opentelemetry/exporter-trace-otlp-proto")
    ),
  };
}

function loadOptional<T>(packageName: string, load: () => T): T | null {
  try {
    return load();
  } catch (error) {
    if (isModuleNotFound(error, packageName)) return null;
    throw error;
  }
}

function isModuleNotFound(error: unknown, packageName: string): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "MODULE_NOT_FOUND" &&
    error.message.includes(packageName)
  );
}
