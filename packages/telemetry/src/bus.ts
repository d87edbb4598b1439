import { createLogger } from "@fnbridge/core";
import type { EventBus, SubscribeOptions, TelemetryEvent, TelemetrySubscriber } from "./types.js";

const log = createLogger("telemetry");

interface SubscriberEntry {
  readonly subscriber: TelemetrySubscriber;
  readonly kinds: ReadonlySet<string> | undefined;
  readonly prefix: readonly string[] | undefined;
}

export interface TelemetryBusConfig {
  /** Called when a subscriber throws or rejects (default: warn log) */
  readonly onSubscriberError?: ((error: unknown, event: TelemetryEvent) => void) | undefined;
}

function matchesPrefix(name: readonly string[], prefix: readonly string[]): boolean {
  if (prefix.length > name.length) return false;
  return prefix.every((segment, i) => name[i] === segment);
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

function defaultSubscriberError(error: unknown, event: TelemetryEvent): void {
  const message = error instanceof Error ? error.message : String(error);
  log.warn(`subscriber failed on ${event.name.join(".")}: ${message}`);
}

/**
 * In-process fan-out of call telemetry events.
 *
 * `publish()` is synchronous and never waits on a subscriber. A subscriber
 * that throws or rejects is reported through `onSubscriberError` and does
 * not stop delivery to the others.
 */
export class TelemetryBus implements EventBus {
  private entries: readonly SubscriberEntry[] = [];
  private readonly onSubscriberError: (error: unknown, event: TelemetryEvent) => void;

  constructor(config?: TelemetryBusConfig) {
    this.onSubscriberError = config?.onSubscriberError ?? defaultSubscriberError;
  }

  subscribe(subscriber: TelemetrySubscriber, options?: SubscribeOptions): () => void {
    const entry: SubscriberEntry = {
      subscriber,
      kinds: options?.kinds !== undefined ? new Set(options.kinds) : undefined,
      prefix: options?.prefix,
    };
    // Replace, never mutate: publish() may be iterating the old array
    this.entries = [...this.entries, entry];

    let disposed = false;
    return () => {
      if (disposed) return;
      disposed = true;
      this.entries = this.entries.filter((e) => e !== entry);
    };
  }

  publish(event: TelemetryEvent): void {
    for (const entry of this.entries) {
      if (entry.kinds !== undefined && !entry.kinds.has(event.kind)) continue;
      if (entry.prefix !== undefined && !matchesPrefix(event.name, entry.prefix)) continue;
      this.deliver(entry.subscriber, event);
    }
  }

  get subscriberCount(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }

  private deliver(subscriber: TelemetrySubscriber, event: TelemetryEvent): void {
    try {
      const result = subscriber(event);
      if (isPromiseLike(result)) {
        result.then(undefined, (error: unknown) => this.reportError(error, event));
      }
    } catch (error) {
      this.reportError(error, event);
    }
  }

  private reportError(error: unknown, event: TelemetryEvent): void {
    try {
      this.onSubscriberError(error, event);
    } catch (reportFailure) {
      defaultSubscriberError(reportFailure, event);
    }
  }
}

/**
 * Bus that drops every event.
 */
export const NOOP_BUS: EventBus = Object.freeze({
  publish(): void {},
  subscribe(): () => void {
    return () => {};
  },
});

let defaultBus: EventBus = new TelemetryBus();

/** Process-wide bus used when a call does not pass its own */
export function getDefaultBus(): EventBus {
  return defaultBus;
}

export function setDefaultBus(bus: EventBus): void {
  defaultBus = bus;
}

/** Install a fresh default bus. Test helper. */
export function resetDefaultBus(): TelemetryBus {
  const bus = new TelemetryBus();
  defaultBus = bus;
  return bus;
}
