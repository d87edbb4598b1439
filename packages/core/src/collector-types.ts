// ---------------------------------------------------------------------------
// Usage collector contract (engine-owned)
// ---------------------------------------------------------------------------

/**
 * Raw usage map as reported by the engine. Keys follow the engine's wire
 * format (`input_tokens`, `output_tokens`); values may be null.
 */
export type RawUsage = Readonly<Record<string, unknown>>;

export interface HttpRequestLog {
  readonly url?: string;
  readonly method?: string;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string;
}

export interface HttpResponseLog {
  readonly status_code?: number;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string;
}

/**
 * One provider attempt within a function call. Retries and fallbacks
 * produce several; the engine marks the one it used as `selected`.
 */
export interface LlmCallLog {
  readonly provider?: string;
  readonly client_name?: string;
  readonly selected?: boolean;
  readonly request?: HttpRequestLog;
  readonly response?: HttpResponseLog;
}

export interface FunctionLogTiming {
  readonly start_time_utc_ms?: number;
  readonly duration_ms?: number;
}

/**
 * Diagnostic log of the last function evaluated through a collector.
 */
export interface FunctionLog {
  readonly id?: string;
  readonly function_name?: string;
  readonly log_type?: string;
  readonly calls?: readonly LlmCallLog[];
  readonly raw_llm_response?: string;
  readonly tags?: Readonly<Record<string, string>>;
  readonly timing?: FunctionLogTiming;
}

/**
 * Opaque per-call accumulator handed to the engine.
 *
 * The engine writes to it during the call; callers read it only after the
 * call has returned. Both readers may throw.
 */
export interface UsageCollector {
  readonly id: string;
  readonly name: string;
  usage(): RawUsage;
  lastFunctionLog(): FunctionLog | undefined;
}

export interface CollectorFactory {
  createCollector(name: string): UsageCollector;
}

/**
 * Options the engine receives alongside every call.
 */
export interface CollectorOptions {
  readonly collectors: readonly UsageCollector[];
}
