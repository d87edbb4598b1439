import { setTimeout as delay } from "node:timers/promises";
import { success } from "@fnbridge/core";
import { FakeEngine, testDescriptor, testTelemetryConfig } from "@fnbridge/test-utils";
import { SpanStatusCode, trace } from "@opentelemetry/api";
import { InMemorySpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TelemetryBus } from "../bus.js";
import { withTelemetry } from "../instrument.js";
import { createOtelSubscriber, type OtelSubscriber } from "../otel-subscriber.js";

describe("createOtelSubscriber", () => {
  let exporter: InMemorySpanExporter;
  let provider: NodeTracerProvider;
  let bus: TelemetryBus;
  let subscriber: OtelSubscriber;

  const engine = new FakeEngine({
    AnalyzeTicket: {
      outcome: success("ok"),
      usage: { input_tokens: 7, output_tokens: 3 },
      functionLog: { calls: [{ provider: "openai", selected: true, request: { body: '{"model":"model-a"}' } }] },
    },
    Broken: { throws: new Error("provider unreachable") },
  });

  beforeEach(() => {
    exporter = new InMemorySpanExporter();
    provider = new NodeTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    trace.disable();
    provider.register();
    bus = new TelemetryBus();
    subscriber = createOtelSubscriber();
    bus.subscribe(subscriber.handle);
  });

  afterEach(async () => {
    trace.disable();
    exporter.reset();
    await provider.shutdown();
  });

  it("turns start/stop into one OK span with usage attributes", async () => {
    await withTelemetry(testDescriptor(), (options) => engine.invoke("AnalyzeTicket", {}, options), {
      collectorFactory: engine,
      bus,
    });

    const spans = exporter.getFinishedSpans();
    expect(spans).toHaveLength(1);
    const span = spans[0];
    expect(span?.name).toBe("fnbridge.call");
    expect(span?.status.code).toBe(SpanStatusCode.OK);
    expect(span?.attributes).toMatchObject({
      "fnbridge.resource": "Helpdesk.Ticket",
      "fnbridge.action": "analyze_ticket",
      "fnbridge.function": "AnalyzeTicket",
      "fnbridge.tokens.input": 7,
      "fnbridge.tokens.output": 3,
      "fnbridge.tokens.total": 10,
      "fnbridge.model": "model-a",
      "fnbridge.provider": "openai",
    });
  });

  it("records the exception on an ERROR span", async () => {
    const descriptor = testDescriptor({ functionName: "Broken" });
    await expect(
      withTelemetry(descriptor, (options) => engine.invoke("Broken", {}, options), {
        collectorFactory: engine,
        bus,
      }),
    ).rejects.toThrow("provider unreachable");

    const span = exporter.getFinishedSpans()[0];
    expect(span?.status).toEqual({ code: SpanStatusCode.ERROR, message: "provider unreachable" });
    expect(span?.events[0]?.name).toBe("exception");
  });

  it("names spans after a custom prefix", async () => {
    const descriptor = testDescriptor({ telemetry: testTelemetryConfig({ prefix: ["helpdesk", "ai"] }) });
    await withTelemetry(descriptor, (options) => engine.invoke("AnalyzeTicket", {}, options), {
      collectorFactory: engine,
      bus,
    });

    expect(exporter.getFinishedSpans()[0]?.name).toBe("helpdesk.ai.call");
  });

  it("creates a span for a stop event with no start", async () => {
    const descriptor = testDescriptor({ telemetry: testTelemetryConfig({ events: ["stop"] }) });
    await withTelemetry(descriptor, (options) => engine.invoke("AnalyzeTicket", {}, options), {
      collectorFactory: engine,
      bus,
    });

    const spans = exporter.getFinishedSpans();
    expect(spans).toHaveLength(1);
    expect(spans[0]?.attributes["fnbridge.function"]).toBe("AnalyzeTicket");
  });

  it("backdates the span to the start of the call", async () => {
    await withTelemetry(
      testDescriptor(),
      async (options) => {
        await delay(25);
        return engine.invoke("AnalyzeTicket", {}, options);
      },
      { collectorFactory: engine, bus },
    );

    const span = exporter.getFinishedSpans()[0];
    expect(span).toBeDefined();
    if (span === undefined) return;
    const [seconds, nanos] = span.duration;
    expect(seconds * 1_000 + nanos / 1_000_000).toBeGreaterThanOrEqual(20);
  });

  it("leaves nothing behind when a call's events omit stop", async () => {
    const descriptor = testDescriptor({ telemetry: testTelemetryConfig({ events: ["start", "exception"] }) });
    for (let i = 0; i < 20; i++) {
      await withTelemetry(descriptor, (options) => engine.invoke("AnalyzeTicket", {}, options), {
        collectorFactory: engine,
        bus,
      });
    }
    expect(exporter.getFinishedSpans()).toHaveLength(0);

    const broken = testDescriptor({
      functionName: "Broken",
      telemetry: testTelemetryConfig({ events: ["start", "exception"] }),
    });
    await expect(
      withTelemetry(broken, (options) => engine.invoke("Broken", {}, options), {
        collectorFactory: engine,
        bus,
      }),
    ).rejects.toThrow("provider unreachable");

    const spans = exporter.getFinishedSpans();
    expect(spans).toHaveLength(1);
    expect(spans[0]?.status.code).toBe(SpanStatusCode.ERROR);
    expect(spans[0]?.attributes["fnbridge.function"]).toBe("Broken");
  });
});
