import { type CallOutcome, failure, success } from "@fnbridge/core";
import {
  createRecorder,
  FakeCollector,
  FakeEngine,
  type FakeFunction,
  testDescriptor,
  testTelemetryConfig,
} from "@fnbridge/test-utils";
import { describe, expect, it, vi } from "vitest";
import { TelemetryBus } from "../bus.js";
import { withTelemetry } from "../instrument.js";
import type { EventBus, TelemetryEvent } from "../types.js";
import { extractUsage } from "../usage.js";

function setup(script: Readonly<Record<string, FakeFunction>> = {}) {
  const engine = new FakeEngine({
    AnalyzeTicket: { outcome: success({ category: "hardware" }), usage: { input_tokens: 10, output_tokens: 5 } },
    ...script,
  });
  const bus = new TelemetryBus();
  const recorder = createRecorder<TelemetryEvent>();
  bus.subscribe(recorder.handler);
  return { engine, bus, recorder };
}

describe("withTelemetry", () => {
  it("emits start then stop with identical identity metadata", async () => {
    const { engine, bus, recorder } = setup();
    const descriptor = testDescriptor();

    const { result, collector, instrumented } = await withTelemetry(
      descriptor,
      (options) => engine.invoke(descriptor.functionName, descriptor.args, options),
      { collectorFactory: engine, bus, uuid: () => "u-1" },
    );

    expect(result).toEqual(success({ category: "hardware" }));
    expect(instrumented).toBe(true);
    expect(collector.name).toBe("Helpdesk.Ticket-AnalyzeTicket-u-1");
    expect(recorder.events.map((e) => e.name)).toEqual([
      ["fnbridge", "call", "start"],
      ["fnbridge", "call", "stop"],
    ]);

    const [start, stop] = recorder.events;
    const identity = {
      resource: "Helpdesk.Ticket",
      action: "analyze_ticket",
      functionName: "AnalyzeTicket",
      collectorName: collector.name,
      collectorId: collector.id,
    };
    expect(start?.metadata).toEqual(identity);
    expect(stop?.metadata).toEqual(identity);
  });

  it("reports usage and duration on stop", async () => {
    const { engine, bus, recorder } = setup();
    const descriptor = testDescriptor();

    await withTelemetry(descriptor, (options) => engine.invoke("AnalyzeTicket", {}, options), {
      collectorFactory: engine,
      bus,
    });

    const stop = recorder.events[1];
    expect(stop?.kind).toBe("stop");
    if (stop?.kind !== "stop") return;
    expect(stop.measurements).toMatchObject({ inputTokens: 10, outputTokens: 5, totalTokens: 15 });
    expect(stop.measurements.duration).toBeGreaterThanOrEqual(0);
  });

  it("passes a collector through when disabled", async () => {
    const { engine, bus, recorder } = setup();
    const descriptor = testDescriptor({ telemetry: testTelemetryConfig({ enabled: false }) });

    const { collector, instrumented } = await withTelemetry(
      descriptor,
      (options) => engine.invoke("AnalyzeTicket", {}, options),
      { collectorFactory: engine, bus },
    );

    expect(instrumented).toBe(false);
    expect(recorder.events).toHaveLength(0);
    expect(engine.calls[0]?.collectors).toEqual([collector]);
    expect(extractUsage(collector).totalTokens).toBe(15);
  });

  it("keeps usage available at a 0% sample rate", async () => {
    const { engine, bus, recorder } = setup();
    const random = vi.fn(() => 0);
    const descriptor = testDescriptor({ telemetry: testTelemetryConfig({ sampleRate: 0 }) });

    const { collector } = await withTelemetry(
      descriptor,
      (options) => engine.invoke("AnalyzeTicket", {}, options),
      { collectorFactory: engine, bus, random },
    );

    expect(recorder.events).toHaveLength(0);
    expect(random).not.toHaveBeenCalled();
    expect(extractUsage(collector)).toEqual({ inputTokens: 10, outputTokens: 5, totalTokens: 15 });
  });

  it("reuses a supplied collector instead of creating one", async () => {
    const { engine, bus } = setup();
    const supplied = new FakeCollector("supplied");

    const { collector } = await withTelemetry(
      testDescriptor(),
      (options) => engine.invoke("AnalyzeTicket", {}, options),
      { collectorFactory: engine, collector: supplied, bus },
    );

    expect(collector).toBe(supplied);
    expect(engine.createdCollectors).toHaveLength(0);
    expect(engine.calls[0]?.collectors).toEqual([supplied]);
  });

  it("emits exception and re-throws the original error", async () => {
    const boom = new Error("provider unreachable");
    const { engine, bus, recorder } = setup({ AnalyzeTicket: { throws: boom } });

    await expect(
      withTelemetry(testDescriptor(), (options) => engine.invoke("AnalyzeTicket", {}, options), {
        collectorFactory: engine,
        bus,
      }),
    ).rejects.toBe(boom);

    expect(recorder.events.map((e) => e.kind)).toEqual(["start", "exception"]);
    const exception = recorder.events[1];
    if (exception?.kind !== "exception") throw new Error("expected exception event");
    expect(exception.metadata.kind).toBe("error");
    expect(exception.metadata.reason).toBe("provider unreachable");
    expect(exception.metadata.error).toBe(boom);
    expect(exception.metadata.stack).toBe(boom.stack);
  });

  it("re-throws without an exception event when exception is not listed", async () => {
    const { engine, bus, recorder } = setup({ AnalyzeTicket: { throws: "raw failure" } });
    const descriptor = testDescriptor({ telemetry: testTelemetryConfig({ events: ["start", "stop"] }) });

    await expect(
      withTelemetry(descriptor, (options) => engine.invoke("AnalyzeTicket", {}, options), {
        collectorFactory: engine,
        bus,
      }),
    ).rejects.toBe("raw failure");

    expect(recorder.events.map((e) => e.kind)).toEqual(["start"]);
  });

  it("emits stop for an error outcome returned as a value", async () => {
    const { engine, bus, recorder } = setup({
      AnalyzeTicket: { outcome: failure("rate limited"), usage: { input_tokens: 3 } },
    });

    const { result } = await withTelemetry<CallOutcome<unknown>>(
      testDescriptor(),
      (options) => engine.invoke("AnalyzeTicket", {}, options),
      { collectorFactory: engine, bus },
    );

    expect(result).toEqual({ ok: false, error: "rate limited" });
    expect(recorder.events.map((e) => e.kind)).toEqual(["start", "stop"]);
  });

  it("uses a custom prefix and only the listed events", async () => {
    const { engine, bus, recorder } = setup();
    const descriptor = testDescriptor({
      telemetry: testTelemetryConfig({ prefix: ["helpdesk", "ai"], events: ["stop"] }),
    });

    await withTelemetry(descriptor, (options) => engine.invoke("AnalyzeTicket", {}, options), {
      collectorFactory: engine,
      bus,
    });

    expect(recorder.events.map((e) => e.name)).toEqual([["helpdesk", "ai", "call", "stop"]]);
  });

  it("adds opt-in metadata fields", async () => {
    const { engine, bus, recorder } = setup();
    const descriptor = testDescriptor({
      telemetry: testTelemetryConfig({ metadata: ["llmClient", "stream"] }),
      context: { llmClient: "Fallback" },
    });

    await withTelemetry(descriptor, (options) => engine.invoke("AnalyzeTicket", {}, options), {
      collectorFactory: engine,
      bus,
    });

    expect(recorder.events[0]?.metadata).toMatchObject({ llmClient: "Fallback", stream: false });
  });

  it("returns the result when the bus itself throws", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { engine } = setup();
    const brokenBus: EventBus = {
      publish: () => {
        throw new Error("bus down");
      },
      subscribe: () => () => {},
    };

    const { result } = await withTelemetry(
      testDescriptor(),
      (options) => engine.invoke("AnalyzeTicket", {}, options),
      { collectorFactory: engine, bus: brokenBus },
    );

    expect(result).toEqual(success({ category: "hardware" }));
    expect(warn).toHaveBeenCalledWith("[telemetry] failed to publish fnbridge.call.start: bus down");
    warn.mockRestore();
  });

  it("adds observability fields to stop metadata", async () => {
    const { engine, bus, recorder } = setup({
      AnalyzeTicket: {
        outcome: success("ok"),
        functionLog: { id: "req-7", calls: [{ provider: "openai", selected: true }] },
      },
    });

    await withTelemetry(testDescriptor(), (options) => engine.invoke("AnalyzeTicket", {}, options), {
      collectorFactory: engine,
      bus,
    });

    expect(recorder.events[1]?.metadata).toMatchObject({ requestId: "req-7", provider: "openai", numAttempts: 1 });
  });
});
