import {
  createLogger,
  type FunctionLog,
  type HttpRequestLog,
  type HttpResponseLog,
  isRecord,
  type LlmCallLog,
  type TokenUsage,
  toTokenUsage,
  type UsageCollector,
  ZERO_USAGE,
} from "@fnbridge/core";
import type { ObservabilityData, ObservabilityTiming } from "./types.js";

const log = createLogger("telemetry");

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read the token counts the engine recorded on a collector.
 *
 * Never throws: a collector that fails, or reports something other than a
 * usage map, yields ZERO_USAGE.
 */
export function extractUsage(collector: UsageCollector): TokenUsage {
  try {
    const raw: unknown = collector.usage();
    if (!isRecord(raw)) {
      log.debug(`collector ${collector.name} returned no usage map`);
      return ZERO_USAGE;
    }
    return toTokenUsage(raw.input_tokens ?? raw.inputTokens, raw.output_tokens ?? raw.outputTokens);
  } catch (error) {
    log.debug(`usage extraction failed for ${collector.name}: ${messageOf(error)}`);
    return ZERO_USAGE;
  }
}

function modelFromBody(body: string | undefined): string | undefined {
  if (body === undefined || body === "") return undefined;
  try {
    const parsed: unknown = JSON.parse(body);
    return isRecord(parsed) && typeof parsed.model === "string" ? parsed.model : undefined;
  } catch {
    return undefined;
  }
}

function nonEmpty<T extends object>(value: T | undefined): T | undefined {
  return value !== undefined && Object.keys(value).length > 0 ? value : undefined;
}

function selectCall(calls: readonly LlmCallLog[]): LlmCallLog | undefined {
  return calls.find((call) => call.selected === true) ?? calls[0];
}

function timingOf(functionLog: FunctionLog): ObservabilityTiming | undefined {
  const timing = functionLog.timing;
  if (timing === undefined) return undefined;
  const result: Mutable<ObservabilityTiming> = {};
  if (timing.start_time_utc_ms !== undefined) result.startedAtMs = timing.start_time_utc_ms;
  if (timing.duration_ms !== undefined) result.durationMs = timing.duration_ms;
  return nonEmpty(result);
}

/**
 * Read the diagnostic fields of the collector's last function log.
 *
 * Picks the call the engine marked `selected`, or the first one. Never
 * throws; absent fields are left out.
 */
export function extractObservability(collector: UsageCollector): ObservabilityData {
  let functionLog: FunctionLog | undefined;
  try {
    functionLog = collector.lastFunctionLog();
  } catch (error) {
    log.debug(`function log unavailable for ${collector.name}: ${messageOf(error)}`);
    return {};
  }
  if (functionLog === undefined) return {};

  const calls = functionLog.calls ?? [];
  const call = selectCall(calls);
  const request: HttpRequestLog | undefined = nonEmpty(call?.request);
  const response: HttpResponseLog | undefined = nonEmpty(call?.response);

  const data: Mutable<ObservabilityData> = {};
  const modelName = modelFromBody(request?.body);
  if (modelName !== undefined) data.modelName = modelName;
  if (call?.provider !== undefined) data.provider = call.provider;
  if (call?.client_name !== undefined) data.clientName = call.client_name;
  if (calls.length > 0) data.numAttempts = calls.length;
  if (functionLog.id !== undefined) data.requestId = functionLog.id;
  if (functionLog.raw_llm_response !== undefined) data.rawResponse = functionLog.raw_llm_response;
  const tags = nonEmpty(functionLog.tags);
  if (tags !== undefined) data.tags = tags;
  if (functionLog.log_type !== undefined) data.logType = functionLog.log_type;
  if (request !== undefined) data.httpRequest = request;
  if (response !== undefined) data.httpResponse = response;
  const timing = timingOf(functionLog);
  if (timing !== undefined) data.timing = timing;
  return data;
}
