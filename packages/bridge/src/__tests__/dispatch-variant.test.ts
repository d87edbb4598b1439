import { ValidationError } from "@fnbridge/errors";
import { tagVariant } from "@fnbridge/response";
import { describe, expect, it } from "vitest";
import { dispatchVariant } from "../dispatch-variant.js";

const variants = [
  { type: "weather", matches: (v: unknown) => typeof v === "object" && v !== null && "city" in v },
  { type: "calculator", matches: (v: unknown) => typeof v === "object" && v !== null && "operation" in v },
] as const;

describe("dispatchVariant", () => {
  it("runs the handler for the variant's type", async () => {
    const selection = tagVariant({ operation: "add" }, variants);

    const outcome = await dispatchVariant(selection, {
      weather: () => "sunny",
      calculator: async () => "3",
    });

    expect(outcome).toEqual({ ok: true, data: "3" });
  });

  it("fails for an unmatched variant", async () => {
    const outcome = await dispatchVariant(tagVariant(42, variants), { weather: () => "sunny" });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(ValidationError);
    expect(outcome.error instanceof ValidationError && outcome.error.message).toBe("No handler for variant (unmatched)");
  });

  it("fails when no handler is registered for the type", async () => {
    const outcome = await dispatchVariant(tagVariant({ city: "Oslo" }, variants), { calculator: () => 0 });

    expect(outcome.ok).toBe(false);
  });

  it("propagates handler throws", async () => {
    const selection = tagVariant({ city: "Oslo" }, variants);
    await expect(
      dispatchVariant(selection, {
        weather: () => {
          throw new Error("api down");
        },
      }),
    ).rejects.toThrow("api down");
  });
});
