/**
 * FakeEngine for testing fnbridge consumers.
 *
 * Each function is scripted up front: its outcome, the usage it reports,
 * and for streams the chunks it pushes. All calls are recorded for assertions.
 */

import { setTimeout as delay } from "node:timers/promises";
import {
  type CallOutcome,
  type Engine,
  type EngineCallOptions,
  type FunctionArgs,
  type FunctionLog,
  type RawUsage,
  type StreamSink,
  success,
  failure,
  type UsageCollector,
} from "@fnbridge/core";
import { FakeCollector } from "./fake-collector.js";

export interface FakeFunction {
  /** Resolved by invoke(), and by invokeStream() when `final` is absent */
  readonly outcome?: CallOutcome<unknown> | undefined;
  /** Rejects the call with this value instead of resolving */
  readonly throws?: unknown;
  /** Usage written into every FakeCollector passed with the call */
  readonly usage?: RawUsage | undefined;
  readonly functionLog?: FunctionLog | undefined;
  /** Chunks pushed by invokeStream(), in order */
  readonly chunks?: readonly unknown[] | undefined;
  readonly final?: CallOutcome<unknown> | undefined;
  /** Delay before each chunk (ms) */
  readonly chunkIntervalMs?: number | undefined;
  /** invokeStream() emits nothing and only settles once aborted */
  readonly silent?: boolean | undefined;
}

export interface FakeCall {
  readonly kind: "invoke" | "invokeStream";
  readonly functionName: string;
  readonly args: FunctionArgs;
  readonly collectors: readonly UsageCollector[];
  readonly signal: AbortSignal | undefined;
}

export class FakeEngine implements Engine {
  readonly calls: FakeCall[] = [];
  readonly createdCollectors: FakeCollector[] = [];
  private readonly functions: Readonly<Record<string, FakeFunction>>;

  constructor(functions: Readonly<Record<string, FakeFunction>> = {}) {
    this.functions = functions;
  }

  createCollector(name: string): FakeCollector {
    const collector = new FakeCollector(name);
    this.createdCollectors.push(collector);
    return collector;
  }

  async invoke(
    functionName: string,
    args: FunctionArgs,
    options: EngineCallOptions,
  ): Promise<CallOutcome<unknown>> {
    this.recordCall("invoke", functionName, args, options);
    const script = this.lookup(functionName);

    this.writeUsage(script, options);
    if ("throws" in script) {
      throw script.throws;
    }
    return script.outcome ?? success(null);
  }

  async invokeStream(
    functionName: string,
    args: FunctionArgs,
    sink: StreamSink,
    options: EngineCallOptions,
  ): Promise<CallOutcome<unknown>> {
    this.recordCall("invokeStream", functionName, args, options);
    const script = this.lookup(functionName);
    const signal = options.signal;

    if (script.silent === true) {
      await abortion(signal);
      return failure(signal?.reason);
    }

    for (const chunk of script.chunks ?? []) {
      if (script.chunkIntervalMs !== undefined) {
        await delay(script.chunkIntervalMs);
      }
      if (signal?.aborted) {
        return failure(signal.reason);
      }
      sink.onChunk(chunk);
    }

    this.writeUsage(script, options);
    if ("throws" in script) {
      throw script.throws;
    }
    return script.final ?? script.outcome ?? success(null);
  }

  private lookup(functionName: string): FakeFunction {
    const script = this.functions[functionName];
    if (script === undefined) {
      throw new Error(`FakeEngine: no script configured for function "${functionName}"`);
    }
    return script;
  }

  private recordCall(
    kind: FakeCall["kind"],
    functionName: string,
    args: FunctionArgs,
    options: EngineCallOptions,
  ): void {
    this.calls.push({
      kind,
      functionName,
      args,
      collectors: options.collectors,
      signal: options.signal,
    });
  }

  private writeUsage(script: FakeFunction, options: EngineCallOptions): void {
    for (const collector of options.collectors) {
      if (collector instanceof FakeCollector) {
        collector.record(script.usage, script.functionLog);
      }
    }
  }
}

function abortion(signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    if (signal === undefined) return;
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}
