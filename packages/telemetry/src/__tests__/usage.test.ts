import type { FunctionLog } from "@fnbridge/core";
import { FakeCollector } from "@fnbridge/test-utils";
import { describe, expect, it, vi } from "vitest";
import { extractObservability, extractUsage } from "../usage.js";

const functionLog: FunctionLog = {
  id: "req-42",
  function_name: "AnalyzeTicket",
  log_type: "call",
  raw_llm_response: '{"category":"hardware"}',
  tags: { team: "helpdesk" },
  timing: { start_time_utc_ms: 1_700_000_000_000, duration_ms: 320 },
  calls: [
    {
      provider: "openai",
      client_name: "Primary",
      selected: false,
      request: { body: JSON.stringify({ model: "model-a" }) },
    },
    {
      provider: "anthropic",
      client_name: "Fallback",
      selected: true,
      request: { url: "https://llm.test/v1", method: "POST", body: JSON.stringify({ model: "model-b" }) },
      response: { status_code: 200 },
    },
  ],
};

describe("extractUsage", () => {
  it("maps snake_case counts and sums the total", () => {
    const collector = new FakeCollector("c", { usage: { input_tokens: 120, output_tokens: 30 } });
    expect(extractUsage(collector)).toEqual({ inputTokens: 120, outputTokens: 30, totalTokens: 150 });
  });

  it("accepts camelCase counts", () => {
    const collector = new FakeCollector("c", { usage: { inputTokens: 4, outputTokens: 6 } });
    expect(extractUsage(collector).totalTokens).toBe(10);
  });

  it("treats null and missing counts as zero", () => {
    const collector = new FakeCollector("c", { usage: { input_tokens: null } });
    expect(extractUsage(collector)).toEqual({ inputTokens: 0, outputTokens: 0, totalTokens: 0 });
  });

  it("degrades to zero usage when the collector throws", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const collector = new FakeCollector("broken", { failWith: new Error("handle gone") });

    expect(extractUsage(collector)).toEqual({ inputTokens: 0, outputTokens: 0, totalTokens: 0 });
    debug.mockRestore();
  });

  it("logs the fault at debug level when FNBRIDGE_DEBUG is set", () => {
    vi.stubEnv("FNBRIDGE_DEBUG", "1");
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const collector = new FakeCollector("broken", { failWith: new Error("handle gone") });

    extractUsage(collector);

    expect(debug).toHaveBeenCalledWith("[telemetry] usage extraction failed for broken: handle gone");
    debug.mockRestore();
    vi.unstubAllEnvs();
  });
});

describe("extractObservability", () => {
  it("reads fields from the selected call", () => {
    const collector = new FakeCollector("c", { functionLog });
    expect(extractObservability(collector)).toEqual({
      modelName: "model-b",
      provider: "anthropic",
      clientName: "Fallback",
      numAttempts: 2,
      requestId: "req-42",
      rawResponse: '{"category":"hardware"}',
      tags: { team: "helpdesk" },
      logType: "call",
      httpRequest: { url: "https://llm.test/v1", method: "POST", body: '{"model":"model-b"}' },
      httpResponse: { status_code: 200 },
      timing: { startedAtMs: 1_700_000_000_000, durationMs: 320 },
    });
  });

  it("falls back to the first call when none is selected", () => {
    const collector = new FakeCollector("c", {
      functionLog: { calls: [{ provider: "openai", request: { body: "not json" } }, { provider: "other" }] },
    });
    const data = extractObservability(collector);
    expect(data.provider).toBe("openai");
    expect(data.modelName).toBeUndefined();
    expect(data.numAttempts).toBe(2);
  });

  it("drops empty request and response maps", () => {
    const collector = new FakeCollector("c", {
      functionLog: { calls: [{ provider: "openai", selected: true, request: {}, response: {} }], tags: {} },
    });
    const data = extractObservability(collector);
    expect(data).toEqual({ provider: "openai", numAttempts: 1 });
    expect("httpRequest" in data).toBe(false);
    expect("tags" in data).toBe(false);
  });

  it("returns an empty object without a function log", () => {
    expect(extractObservability(new FakeCollector("c"))).toEqual({});
  });

  it("returns an empty object when the collector throws", () => {
    const collector = new FakeCollector("c", { failWith: new Error("gone") });
    expect(extractObservability(collector)).toEqual({});
  });
});
