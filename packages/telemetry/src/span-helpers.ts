import { type Span, SpanStatusCode, trace } from "@opentelemetry/api";
import { TRACER_NAME } from "./constants.js";
import type { SpanAttributes, SpanAttributeValue } from "./types.js";

/**
 * Set every defined attribute on a span; undefined values are skipped.
 */
export function setSpanAttributes(
  span: Span,
  attributes: Readonly<Record<string, SpanAttributeValue | undefined>>,
): void {
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== undefined) {
      span.setAttribute(key, value);
    }
  }
}

/**
 * Mark a span failed with the given error.
 */
export function recordSpanError(span: Span, error: unknown): void {
  if (error instanceof Error) {
    span.recordException(error);
  }
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: error instanceof Error ? error.message : String(error),
  });
}

/**
 * Run `fn` inside an active span named `name`.
 *
 * The span gets OK status when `fn` resolves and ERROR (with the exception
 * recorded) when it throws; it is ended either way and the error re-thrown.
 * `fn` receives the span to add attributes discovered during the work.
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, async (span) => {
    try {
      setSpanAttributes(span, attributes);
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      recordSpanError(span, error);
      throw error;
    } finally {
      span.end();
    }
  });
}
