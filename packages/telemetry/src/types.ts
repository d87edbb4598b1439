import type { HttpRequestLog, HttpResponseLog, TelemetryEventKind } from "@fnbridge/core";

// ---------------------------------------------------------------------------
// Observability data read from a collector
// ---------------------------------------------------------------------------

export interface ObservabilityTiming {
  readonly startedAtMs?: number | undefined;
  readonly durationMs?: number | undefined;
}

/**
 * Diagnostic fields the engine attached to a collector. Every field is
 * optional: engines and providers report different subsets.
 */
export interface ObservabilityData {
  readonly modelName?: string | undefined;
  readonly provider?: string | undefined;
  readonly clientName?: string | undefined;
  readonly numAttempts?: number | undefined;
  readonly requestId?: string | undefined;
  readonly rawResponse?: string | undefined;
  readonly tags?: Readonly<Record<string, string>> | undefined;
  readonly logType?: string | undefined;
  readonly httpRequest?: HttpRequestLog | undefined;
  readonly httpResponse?: HttpResponseLog | undefined;
  readonly timing?: ObservabilityTiming | undefined;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

/**
 * Metadata shared by every event of one call. `llmClient` and `stream` are
 * present only when listed in the call's `metadata` option.
 */
export interface CallMetadata {
  readonly resource: string;
  readonly action: string;
  readonly functionName: string;
  readonly collectorName: string;
  readonly collectorId: string;
  readonly llmClient?: string | undefined;
  readonly stream?: boolean | undefined;
}

export type StopMetadata = CallMetadata & ObservabilityData;

export interface ExceptionMetadata extends CallMetadata {
  readonly kind: "error";
  readonly reason: string;
  readonly stack?: string | undefined;
  readonly error: unknown;
}

export interface StartMeasurements {
  /** performance.now() at call start */
  readonly monotonicTime: number;
  /** Date.now() at call start */
  readonly systemTime: number;
}

export interface StopMeasurements {
  /** Elapsed milliseconds */
  readonly duration: number;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
  readonly monotonicTime: number;
}

export interface ExceptionMeasurements {
  /** Elapsed milliseconds until the fault */
  readonly duration: number;
  readonly monotonicTime: number;
}

interface EventBase<K extends TelemetryEventKind> {
  /** `[...prefix, "call", kind]` */
  readonly name: readonly string[];
  readonly kind: K;
}

export interface StartEvent extends EventBase<"start"> {
  readonly measurements: StartMeasurements;
  readonly metadata: CallMetadata;
}

export interface StopEvent extends EventBase<"stop"> {
  readonly measurements: StopMeasurements;
  readonly metadata: StopMetadata;
}

export interface ExceptionEvent extends EventBase<"exception"> {
  readonly measurements: ExceptionMeasurements;
  readonly metadata: ExceptionMetadata;
}

export type TelemetryEvent = StartEvent | StopEvent | ExceptionEvent;

// ---------------------------------------------------------------------------
// Bus
// ---------------------------------------------------------------------------

/**
 * Subscribers must not block the publisher; a returned promise is not awaited.
 */
export type TelemetrySubscriber = (event: TelemetryEvent) => void | Promise<void>;

export interface SubscribeOptions {
  /** Only deliver these kinds (default: all) */
  readonly kinds?: readonly TelemetryEventKind[] | undefined;
  /** Only deliver events whose name starts with this prefix */
  readonly prefix?: readonly string[] | undefined;
}

export interface EventBus {
  publish(event: TelemetryEvent): void;
  subscribe(subscriber: TelemetrySubscriber, options?: SubscribeOptions): () => void;
}

// ---------------------------------------------------------------------------
// OpenTelemetry
// ---------------------------------------------------------------------------

/**
 * Configuration for OpenTelemetry SDK setup.
 * Omitted fields fall back to env vars, then defaults.
 */
export interface OtelSetupConfig {
  /** Service name for resource identification (default: "fnbridge") */
  serviceName?: string | undefined;
  /** OTLP exporter endpoint (default: from OTEL_EXPORTER_OTLP_ENDPOINT or "http://localhost:4318") */
  endpoint?: string | undefined;
  /** Trace sampling ratio 0.0-1.0 (default: from OTEL_TRACES_SAMPLER_ARG or 1.0) */
  sampleRatio?: number | undefined;
  /** Deployment environment (default: from OTEL_ENVIRONMENT or "development") */
  environment?: string | undefined;
  /** Bus the span subscriber attaches to (default: the process-wide bus) */
  bus?: EventBus | undefined;
}

/**
 * Standard span attribute types accepted by OpenTelemetry.
 */
export type SpanAttributeValue = string | number | boolean;

/**
 * Record of span attributes.
 */
export type SpanAttributes = Record<string, SpanAttributeValue>;
