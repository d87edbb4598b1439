import type { FunctionLog, RawUsage, UsageCollector } from "@fnbridge/core";

let nextId = 0;

export interface FakeCollectorOptions {
  readonly usage?: RawUsage | undefined;
  readonly functionLog?: FunctionLog | undefined;
  /** Thrown from usage() and lastFunctionLog() */
  readonly failWith?: Error | undefined;
}

/**
 * UsageCollector double. The FakeEngine writes usage into it during a call;
 * tests can also preload or poison it directly.
 */
export class FakeCollector implements UsageCollector {
  readonly id: string;
  readonly name: string;
  usageReads = 0;
  private rawUsage: RawUsage | undefined;
  private functionLog: FunctionLog | undefined;
  private failure: Error | undefined;

  constructor(name: string, options: FakeCollectorOptions = {}) {
    nextId++;
    this.id = `fake-collector-${nextId}`;
    this.name = name;
    this.rawUsage = options.usage;
    this.functionLog = options.functionLog;
    this.failure = options.failWith;
  }

  /** Called by the engine once the call has finished */
  record(usage: RawUsage | undefined, functionLog: FunctionLog | undefined): void {
    if (usage !== undefined) this.rawUsage = usage;
    if (functionLog !== undefined) this.functionLog = functionLog;
  }

  failWith(error: Error): void {
    this.failure = error;
  }

  usage(): RawUsage {
    this.usageReads++;
    if (this.failure !== undefined) throw this.failure;
    return this.rawUsage ?? {};
  }

  lastFunctionLog(): FunctionLog | undefined {
    if (this.failure !== undefined) throw this.failure;
    return this.functionLog;
  }
}
