import type { TelemetryEventKind } from "@fnbridge/core";

export const DEFAULT_EVENT_PREFIX: readonly string[] = ["fnbridge"];

export const ALL_EVENT_KINDS = ["start", "stop", "exception"] as const satisfies readonly TelemetryEventKind[];

export const METADATA_FIELDS = ["llmClient", "stream"] as const;

/** "false"/"0" disables call telemetry unless a call's options say otherwise */
export const ENV_TELEMETRY_ENABLED = "FNBRIDGE_TELEMETRY_ENABLED";

/** Default sampling rate (0.0 - 1.0) */
export const ENV_TELEMETRY_SAMPLE_RATE = "FNBRIDGE_TELEMETRY_SAMPLE_RATE";

export const TRACER_NAME = "fnbridge";
export const METER_NAME = "fnbridge";
