import type { CollectorNameOption, InvocationDescriptor, TelemetryConfig } from "@fnbridge/core";
import { ValidationError, type ValidationIssue } from "@fnbridge/errors";
import { z } from "zod";
import {
  ALL_EVENT_KINDS,
  DEFAULT_EVENT_PREFIX,
  ENV_TELEMETRY_ENABLED,
  ENV_TELEMETRY_SAMPLE_RATE,
  METADATA_FIELDS,
} from "./constants.js";

const collectorNameSchema = z.custom<CollectorNameOption>(
  (value) => (typeof value === "string" && value.length > 0) || typeof value === "function",
  { message: "collectorName must be a non-empty string or a function" },
);

/**
 * Per-call telemetry options. Every field is optional; omitted fields fall
 * back to environment variables, then to defaults.
 */
export const TelemetryConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    sampleRate: z.number().min(0).max(1).optional(),
    events: z.array(z.enum(ALL_EVENT_KINDS)).optional(),
    prefix: z.array(z.string().min(1)).min(1).optional(),
    metadata: z.array(z.enum(METADATA_FIELDS)).optional(),
    collectorName: collectorNameSchema.optional(),
  })
  .strict();

export type TelemetryOptions = z.input<typeof TelemetryConfigSchema>;

function envEnabled(env: NodeJS.ProcessEnv): boolean {
  const value = env[ENV_TELEMETRY_ENABLED];
  if (value === undefined || value === "") return true;
  return !(value === "false" || value === "0");
}

function envSampleRate(env: NodeJS.ProcessEnv): number {
  const raw = env[ENV_TELEMETRY_SAMPLE_RATE];
  if (raw === undefined || raw === "") return 1;
  const parsed = Number.parseFloat(raw);
  return Number.isNaN(parsed) ? 1 : Math.max(0, Math.min(1, parsed));
}

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join(".") || "(root)",
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate call options and fill in defaults.
 *
 * @throws ValidationError (TELEMETRY_CONFIG_INVALID) when options are malformed
 */
export function resolveTelemetryConfig(
  options: unknown = {},
  env: NodeJS.ProcessEnv = process.env,
): TelemetryConfig {
  const parsed = TelemetryConfigSchema.safeParse(options ?? {});
  if (!parsed.success) {
    const issues = toIssues(parsed.error);
    throw new ValidationError({
      code: "TELEMETRY_CONFIG_INVALID",
      message: `Invalid telemetry options: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`,
      issues,
    });
  }
  const data = parsed.data;
  return {
    enabled: data.enabled ?? envEnabled(env),
    sampleRate: data.sampleRate ?? envSampleRate(env),
    events: data.events ?? [...ALL_EVENT_KINDS],
    prefix: data.prefix ?? [...DEFAULT_EVENT_PREFIX],
    metadata: data.metadata ?? [],
    collectorName: data.collectorName,
  };
}

/**
 * Name for the call's collector. Defaults to `<resource>-<function>-<uuid>`.
 */
export function collectorNameFor(
  descriptor: InvocationDescriptor,
  uuid: () => string,
): string {
  const option = descriptor.telemetry.collectorName;
  if (typeof option === "string") return option;
  if (typeof option === "function") return option(descriptor);
  return `${descriptor.resource}-${descriptor.functionName}-${uuid()}`;
}
