/**
 * OTel metrics for bridged function calls.
 *
 * Instruments are created on first access. Without a registered meter
 * provider they are no-ops.
 */

import type { Counter, Histogram } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";
import { METER_NAME } from "./constants.js";

let callCounter: Counter | undefined;
let callLatency: Histogram | undefined;
let tokenCounter: Counter | undefined;

/** Completed and failed calls, labelled by function and status */
export function getCallCounter(): Counter {
  if (callCounter === undefined) {
    callCounter = metrics.getMeter(METER_NAME).createCounter("fnbridge.calls", {
      description: "Total bridged function calls",
    });
  }
  return callCounter;
}

export function getCallLatency(): Histogram {
  if (callLatency === undefined) {
    callLatency = metrics.getMeter(METER_NAME).createHistogram("fnbridge.call.latency_ms", {
      description: "Function call latency in milliseconds",
      unit: "ms",
    });
  }
  return callLatency;
}

export function getTokenCounter(): Counter {
  if (tokenCounter === undefined) {
    tokenCounter = metrics.getMeter(METER_NAME).createCounter("fnbridge.tokens.total", {
      description: "Total tokens consumed by bridged calls",
    });
  }
  return tokenCounter;
}
