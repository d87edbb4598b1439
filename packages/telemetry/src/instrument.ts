import { randomUUID } from "node:crypto";
import {
  type CollectorFactory,
  type CollectorOptions,
  createLogger,
  type InvocationDescriptor,
  type TelemetryEventKind,
  type UsageCollector,
} from "@fnbridge/core";
import { getDefaultBus } from "./bus.js";
import { collectorNameFor } from "./config.js";
import { shouldSample } from "./sampling.js";
import type { CallMetadata, EventBus, TelemetryEvent } from "./types.js";
import { extractObservability, extractUsage } from "./usage.js";

const log = createLogger("telemetry");

export interface WithTelemetryOptions {
  /** Creates the call's collector when none is supplied */
  readonly collectorFactory: CollectorFactory;
  /** Reused as-is instead of creating a new collector */
  readonly collector?: UsageCollector | undefined;
  /** Default: getDefaultBus() */
  readonly bus?: EventBus | undefined;
  /** Sampling draw in [0, 1). Default: Math.random */
  readonly random?: (() => number) | undefined;
  /** Suffix generator for default collector names. Default: randomUUID */
  readonly uuid?: (() => string) | undefined;
}

export interface InstrumentedCall<R> {
  readonly result: R;
  readonly collector: UsageCollector;
  /** Whether events were published for this call */
  readonly instrumented: boolean;
}

function eventName(descriptor: InvocationDescriptor, kind: TelemetryEventKind): readonly string[] {
  return [...descriptor.telemetry.prefix, "call", kind];
}

function callMetadata(descriptor: InvocationDescriptor, collector: UsageCollector): CallMetadata {
  const fields = new Set(descriptor.telemetry.metadata);
  return {
    resource: descriptor.resource,
    action: descriptor.action,
    functionName: descriptor.functionName,
    collectorName: collector.name,
    collectorId: collector.id,
    ...(fields.has("llmClient") ? { llmClient: descriptor.context?.llmClient ?? descriptor.client } : {}),
    ...(fields.has("stream") ? { stream: descriptor.context?.stream ?? false } : {}),
  };
}

function safePublish(bus: EventBus, event: TelemetryEvent): void {
  try {
    bus.publish(event);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`failed to publish ${event.name.join(".")}: ${message}`);
  }
}

/**
 * Run one engine call under telemetry.
 *
 * A collector is always handed to `callFn`, whether or not events are
 * published, so usage stays available to the caller. When the call is
 * enabled and sampled, `start` precedes `stop` (or `exception`), both
 * carrying the same identity metadata. A throw from `callFn` is re-thrown
 * as-is.
 */
export async function withTelemetry<R>(
  descriptor: InvocationDescriptor,
  callFn: (options: CollectorOptions) => Promise<R>,
  options: WithTelemetryOptions,
): Promise<InstrumentedCall<R>> {
  const config = descriptor.telemetry;
  const collector =
    options.collector ??
    options.collectorFactory.createCollector(collectorNameFor(descriptor, options.uuid ?? randomUUID));

  const instrumented = config.enabled && shouldSample(config.sampleRate, options.random);
  if (!instrumented) {
    const result = await callFn({ collectors: [collector] });
    return { result, collector, instrumented };
  }

  const bus = options.bus ?? getDefaultBus();
  const emits = new Set(config.events);
  const metadata = callMetadata(descriptor, collector);

  const startTime = performance.now();
  if (emits.has("start")) {
    safePublish(bus, {
      name: eventName(descriptor, "start"),
      kind: "start",
      measurements: { monotonicTime: startTime, systemTime: Date.now() },
      metadata,
    });
  }

  let result: R;
  try {
    result = await callFn({ collectors: [collector] });
  } catch (error) {
    if (emits.has("exception")) {
      const endTime = performance.now();
      safePublish(bus, {
        name: eventName(descriptor, "exception"),
        kind: "exception",
        measurements: { duration: endTime - startTime, monotonicTime: endTime },
        metadata: {
          ...metadata,
          kind: "error",
          reason: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
          error,
        },
      });
    }
    throw error;
  }

  if (emits.has("stop")) {
    const endTime = performance.now();
    const usage = extractUsage(collector);
    safePublish(bus, {
      name: eventName(descriptor, "stop"),
      kind: "stop",
      measurements: {
        duration: endTime - startTime,
        inputTokens: usage.inputTokens,
        outputTokens: usage.outputTokens,
        totalTokens: usage.totalTokens,
        monotonicTime: endTime,
      },
      metadata: { ...metadata, ...extractObservability(collector) },
    });
  }

  return { result, collector, instrumented };
}
