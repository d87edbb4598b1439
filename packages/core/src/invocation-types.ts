import type { FunctionArgs } from "./engine-types.js";

// ---------------------------------------------------------------------------
// Telemetry configuration (per call)
// ---------------------------------------------------------------------------

export type TelemetryEventKind = "start" | "stop" | "exception";

/** Opt-in metadata fields; the identity fields are always included */
export type TelemetryMetadataField = "llmClient" | "stream";

export type CollectorNameOption = string | ((descriptor: InvocationDescriptor) => string);

/**
 * Fully resolved telemetry configuration. Build it with
 * `resolveTelemetryConfig()` from @fnbridge/telemetry.
 */
export interface TelemetryConfig {
  readonly enabled: boolean;
  /** 0.0 - 1.0 */
  readonly sampleRate: number;
  readonly events: readonly TelemetryEventKind[];
  /** Event name prefix; events are named `[...prefix, "call", kind]` */
  readonly prefix: readonly string[];
  readonly metadata: readonly TelemetryMetadataField[];
  readonly collectorName?: CollectorNameOption | undefined;
}

// ---------------------------------------------------------------------------
// Invocation descriptor
// ---------------------------------------------------------------------------

export interface InvocationContext {
  readonly llmClient?: string | undefined;
  readonly stream?: boolean | undefined;
}

/**
 * Identifies one call. Created fresh per call and never mutated.
 */
export interface InvocationDescriptor {
  /** Name of the client whose engine evaluates the function */
  readonly client: string;
  readonly functionName: string;
  readonly args: FunctionArgs;
  /** Owning resource identity, used only as telemetry metadata */
  readonly resource: string;
  /** Owning action identity, used only as telemetry metadata */
  readonly action: string;
  readonly telemetry: TelemetryConfig;
  readonly context?: InvocationContext | undefined;
}
