/**
 * spans.ts - Span wrapper for ingestion and retrieval operations
 *
 * traceOperation() runs an async function inside a new active span, so spans
 * created further down (one per batch inside an ingest run) become children.
 * Thrown errors are recorded on the span and rethrown unchanged.
 */

import {
  SpanKind,
  SpanStatusCode,
  context,
  trace,
  type Attributes,
  type Span,
} from "@opentelemetry/api";
import { getTracer } from "./index";

/**
 * Runs `fn` inside a span named `name`.
 *
 * @param attributes - Set before `fn` runs; `fn` may add more through the span
 */
export async function traceOperation<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const span = getTracer().startSpan(name, {
    kind: SpanKind.INTERNAL,
    attributes,
  });

  // context.with() keeps the span active across await boundaries
  const activeContext = trace.setSpan(context.active(), span);

  return context.with(activeContext, async () => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const exception = error instanceof Error ? error : new Error(String(error));
      span.recordException(exception);
      span.setStatus({ code: SpanStatusCode.ERROR, message: exception.message });
      throw error;
    } finally {
      span.end();
    }
  });
}
