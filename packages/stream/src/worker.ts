import {
  type CallOutcome,
  createLogger,
  type Engine,
  failure,
  type FunctionArgs,
  type UsageCollector,
} from "@fnbridge/core";
import type { Mailbox } from "./mailbox.js";
import type { StreamMessage, StreamWorker } from "./types.js";

const log = createLogger("stream");

export interface SpawnWorkerOptions {
  /** Forwarded to the engine so a stream call can record usage */
  readonly collector?: UsageCollector | undefined;
}

/**
 * Start `engine.invokeStream` in the background. Every chunk is sent to
 * `token` as it arrives, followed by exactly one `done` message. A throw
 * from the engine becomes a failed `done`.
 */
export function spawnWorker(
  engine: Engine,
  functionName: string,
  args: FunctionArgs,
  mailbox: Mailbox<StreamMessage>,
  token: string,
  options: SpawnWorkerOptions = {},
): StreamWorker {
  const controller = new AbortController();
  let running = true;

  const run = async (): Promise<void> => {
    let outcome: CallOutcome<unknown>;
    try {
      outcome = await engine.invokeStream(
        functionName,
        args,
        {
          onChunk: (chunk) => {
            mailbox.send(token, { token, type: "chunk", chunk });
          },
        },
        {
          collectors: options.collector !== undefined ? [options.collector] : [],
          signal: controller.signal,
        },
      );
    } catch (error) {
      log.debug(`${functionName} stream threw: ${error instanceof Error ? error.message : String(error)}`);
      outcome = failure(error);
    }
    running = false;
    if (!mailbox.send(token, { token, type: "done", outcome })) {
      log.debug(`${functionName} finished after its stream was released`);
    }
  };

  const finished = run();

  return {
    token,
    finished,
    isRunning: () => running,
    cancel: (reason?: unknown) => {
      if (!controller.signal.aborted) controller.abort(reason);
    },
  };
}
