import type { CollectorFactory, CollectorOptions } from "./collector-types.js";
import type { CallOutcome } from "./outcome-types.js";

export type FunctionArgs = Readonly<Record<string, unknown>>;

export interface EngineCallOptions extends CollectorOptions {
  /** Cooperative cancellation; engines that cannot cancel ignore it */
  readonly signal?: AbortSignal | undefined;
}

/**
 * Receives partial results from a streaming call, in production order.
 */
export interface StreamSink {
  onChunk(chunk: unknown): void;
}

/**
 * External prompt-execution engine.
 *
 * `invoke` resolves with the call's outcome; it rejects only for faults the
 * engine itself could not turn into an outcome. `invokeStream` pushes chunks
 * to the sink and resolves with the final outcome once the stream ends.
 */
export interface Engine extends CollectorFactory {
  invoke(
    functionName: string,
    args: FunctionArgs,
    options: EngineCallOptions,
  ): Promise<CallOutcome<unknown>>;

  invokeStream(
    functionName: string,
    args: FunctionArgs,
    sink: StreamSink,
    options: EngineCallOptions,
  ): Promise<CallOutcome<unknown>>;
}
