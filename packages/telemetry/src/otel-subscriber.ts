import { type Span, SpanStatusCode, trace } from "@opentelemetry/api";
import { TRACER_NAME } from "./constants.js";
import { getCallCounter, getCallLatency, getTokenCounter } from "./metrics.js";
import { recordSpanError, setSpanAttributes } from "./span-helpers.js";
import type {
  CallMetadata,
  ExceptionEvent,
  StopEvent,
  TelemetryEvent,
  TelemetrySubscriber,
} from "./types.js";

export interface OtelSubscriberOptions {
  /** Default: "fnbridge" */
  readonly tracerName?: string | undefined;
}

export interface OtelSubscriber {
  readonly handle: TelemetrySubscriber;
}

/** `["fnbridge", "call", "start"]` becomes `fnbridge.call` */
function spanNameOf(event: TelemetryEvent): string {
  return event.name.slice(0, -1).join(".");
}

function identityAttributes(metadata: CallMetadata): Record<string, string | boolean | undefined> {
  return {
    "fnbridge.resource": metadata.resource,
    "fnbridge.action": metadata.action,
    "fnbridge.function": metadata.functionName,
    "fnbridge.collector": metadata.collectorName,
    "fnbridge.llm_client": metadata.llmClient,
    "fnbridge.stream": metadata.stream,
  };
}

/**
 * Turn call events into spans and metrics.
 *
 * A span is built from the terminal event alone, backdated by the call's
 * duration, so a call whose events omit `stop` or `exception` never holds
 * an unended span. `start` events carry nothing a span needs.
 */
export function createOtelSubscriber(options?: OtelSubscriberOptions): OtelSubscriber {
  const tracerName = options?.tracerName ?? TRACER_NAME;

  const spanFor = (event: StopEvent | ExceptionEvent): Span => {
    const span = trace
      .getTracer(tracerName)
      .startSpan(spanNameOf(event), { startTime: Date.now() - event.measurements.duration });
    setSpanAttributes(span, identityAttributes(event.metadata));
    return span;
  };

  const handle: TelemetrySubscriber = (event) => {
    switch (event.kind) {
      case "start":
        return;
      case "stop": {
        const span = spanFor(event);
        const { measurements, metadata } = event;
        setSpanAttributes(span, {
          "fnbridge.tokens.input": measurements.inputTokens,
          "fnbridge.tokens.output": measurements.outputTokens,
          "fnbridge.tokens.total": measurements.totalTokens,
          "fnbridge.model": metadata.modelName,
          "fnbridge.provider": metadata.provider,
          "fnbridge.attempts": metadata.numAttempts,
        });
        span.setStatus({ code: SpanStatusCode.OK });
        span.end();

        const labels = { function: metadata.functionName, status: "ok" };
        getCallCounter().add(1, labels);
        getCallLatency().record(measurements.duration, labels);
        getTokenCounter().add(measurements.totalTokens, { function: metadata.functionName });
        return;
      }
      case "exception": {
        const span = spanFor(event);
        recordSpanError(span, event.metadata.error);
        span.end();

        const labels = { function: event.metadata.functionName, status: "error" };
        getCallCounter().add(1, labels);
        getCallLatency().record(event.measurements.duration, labels);
        return;
      }
    }
  };

  return { handle };
}
