/**
 * @fnbridge/telemetry: call instrumentation for bridged functions.
 *
 * Public API:
 * - withTelemetry(): run a call with a collector and start/stop/exception events
 * - TelemetryBus / getDefaultBus() / setDefaultBus(): in-process event fan-out
 * - resolveTelemetryConfig(): validated per-call options with env fallbacks
 * - extractUsage() / extractObservability(): collector readers that never throw
 * - createOtelSubscriber() / setupTelemetry() / withSpan(): OpenTelemetry export
 */

export { context, SpanStatusCode, trace } from "@opentelemetry/api";
export { getDefaultBus, NOOP_BUS, resetDefaultBus, setDefaultBus, TelemetryBus, type TelemetryBusConfig } from "./bus.js";
export { collectorNameFor, resolveTelemetryConfig, TelemetryConfigSchema, type TelemetryOptions } from "./config.js";
export {
  ALL_EVENT_KINDS,
  DEFAULT_EVENT_PREFIX,
  ENV_TELEMETRY_ENABLED,
  ENV_TELEMETRY_SAMPLE_RATE,
} from "./constants.js";
export { type InstrumentedCall, withTelemetry, type WithTelemetryOptions } from "./instrument.js";
export { getCallCounter, getCallLatency, getTokenCounter } from "./metrics.js";
export { createOtelSubscriber, type OtelSubscriber, type OtelSubscriberOptions } from "./otel-subscriber.js";
export { shouldSample } from "./sampling.js";
export { isOtelEnabled, setupTelemetry, shutdownTelemetry } from "./setup.js";
export { recordSpanError, setSpanAttributes, withSpan } from "./span-helpers.js";
export type {
  CallMetadata,
  EventBus,
  ExceptionEvent,
  ExceptionMeasurements,
  ExceptionMetadata,
  ObservabilityData,
  ObservabilityTiming,
  OtelSetupConfig,
  SpanAttributes,
  SpanAttributeValue,
  StartEvent,
  StartMeasurements,
  StopEvent,
  StopMeasurements,
  StopMetadata,
  SubscribeOptions,
  TelemetryEvent,
  TelemetrySubscriber,
} from "./types.js";
export { extractObservability, extractUsage } from "./usage.js";
