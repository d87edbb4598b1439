import type { CallOutcome } from "@fnbridge/core";
import type { TimeoutError } from "@fnbridge/errors";

// ---------------------------------------------------------------------------
// Worker -> consumer messages
// ---------------------------------------------------------------------------

export interface ChunkMessage {
  readonly token: string;
  readonly type: "chunk";
  readonly chunk: unknown;
}

/** Always the last message sent for a token */
export interface DoneMessage {
  readonly token: string;
  readonly type: "done";
  readonly outcome: CallOutcome<unknown>;
}

export type StreamMessage = ChunkMessage | DoneMessage;

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export type StreamPhase =
  | { readonly status: "streaming" }
  | { readonly status: "completed" }
  | { readonly status: "failed"; readonly reason: unknown }
  | { readonly status: "abandoned" }
  | { readonly status: "timed_out"; readonly reason: TimeoutError<"STREAM_READ_TIMEOUT"> };

export type StreamStatus = StreamPhase["status"];

export interface StreamWorker {
  readonly token: string;
  /** Settles once the engine call has finished and `done` was sent. Never rejects. */
  readonly finished: Promise<void>;
  isRunning(): boolean;
  /** Abort the engine call through its AbortSignal */
  cancel(reason?: unknown): void;
}

export interface StreamSession {
  readonly token: string;
  readonly functionName: string;
  readonly worker: StreamWorker;
  readonly phase: StreamPhase;
}
