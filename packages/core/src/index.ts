export const PACKAGE_NAME = "@fnbridge/core" as const;

export type {
  CollectorFactory,
  CollectorOptions,
  FunctionLog,
  FunctionLogTiming,
  HttpRequestLog,
  HttpResponseLog,
  LlmCallLog,
  RawUsage,
  UsageCollector,
} from "./collector-types.js";
export type { Engine, EngineCallOptions, FunctionArgs, StreamSink } from "./engine-types.js";
export type {
  CollectorNameOption,
  InvocationContext,
  InvocationDescriptor,
  TelemetryConfig,
  TelemetryEventKind,
  TelemetryMetadataField,
} from "./invocation-types.js";
export { createLogger, isDebugEnabled, type Logger } from "./logger.js";
export {
  type CallFailure,
  type CallOutcome,
  type CallSuccess,
  failure,
  isCallOutcome,
  success,
} from "./outcome-types.js";
export { isTokenUsage, type TokenUsage, toTokenUsage, ZERO_USAGE } from "./token-usage-types.js";
export { isEngine, isRecord, isUsageCollector } from "./type-guards.js";
