import { ValidationError } from "@fnbridge/errors";
import { z } from "zod";

export const DEFAULT_READ_TIMEOUT_MS = 200;
export const DEFAULT_MAX_DRAIN = 1000;
export const ENV_STREAM_READ_TIMEOUT_MS = "FNBRIDGE_STREAM_READ_TIMEOUT_MS";

export const StreamSettingsSchema = z.object({
  /** Per-pull wait for the next message */
  readTimeoutMs: z.number().int().positive().optional(),
  /** Upper bound on messages discarded at cleanup */
  maxDrain: z.number().int().nonnegative().optional(),
  /** Field checked by the empty-chunk filter */
  contentKey: z.string().min(1).optional(),
  /** Abort the engine call when the consumer stops early */
  cancelOnCleanup: z.boolean().optional(),
});

export type StreamSettingsInput = z.input<typeof StreamSettingsSchema>;

export interface StreamSettings {
  readonly readTimeoutMs: number;
  readonly maxDrain: number;
  readonly contentKey: string;
  readonly cancelOnCleanup: boolean;
}

function envReadTimeout(env: NodeJS.ProcessEnv): number {
  const raw = env[ENV_STREAM_READ_TIMEOUT_MS];
  if (raw === undefined || raw === "") return DEFAULT_READ_TIMEOUT_MS;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? DEFAULT_READ_TIMEOUT_MS : parsed;
}

/**
 * @throws ValidationError (VALIDATION_FAILED) for malformed settings
 */
export function resolveStreamSettings(
  input: StreamSettingsInput = {},
  env: NodeJS.ProcessEnv = process.env,
): StreamSettings {
  const parsed = StreamSettingsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));
    throw new ValidationError({
      code: "VALIDATION_FAILED",
      message: `Invalid stream settings: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`,
      issues,
    });
  }
  return {
    readTimeoutMs: parsed.data.readTimeoutMs ?? envReadTimeout(env),
    maxDrain: parsed.data.maxDrain ?? DEFAULT_MAX_DRAIN,
    contentKey: parsed.data.contentKey ?? "content",
    cancelOnCleanup: parsed.data.cancelOnCleanup ?? false,
  };
}
