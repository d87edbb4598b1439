import { randomUUID } from "node:crypto";
import { createLogger, type Engine, type FunctionArgs, type UsageCollector } from "@fnbridge/core";
import { TimeoutError, ValidationError } from "@fnbridge/errors";
import { isEmptyChunk } from "./chunks.js";
import { resolveStreamSettings, type StreamSettings, type StreamSettingsInput } from "./config.js";
import { Mailbox } from "./mailbox.js";
import type { StreamMessage, StreamPhase, StreamSession } from "./types.js";
import { spawnWorker } from "./worker.js";

const log = createLogger("stream");

let defaultMailbox = new Mailbox<StreamMessage>();

/** Process-wide mailbox shared by streams that do not bring their own */
export function getDefaultMailbox(): Mailbox<StreamMessage> {
  return defaultMailbox;
}

export function setDefaultMailbox(mailbox: Mailbox<StreamMessage>): void {
  defaultMailbox = mailbox;
}

export interface CreateStreamOptions extends StreamSettingsInput {
  readonly engine: Engine;
  readonly functionName: string;
  readonly args: FunctionArgs;
  readonly collector?: UsageCollector | undefined;
  readonly mailbox?: Mailbox<StreamMessage> | undefined;
  /** Called once with the final session after cleanup */
  readonly onEnd?: ((session: StreamSession) => void) | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
}

export interface BridgeStream<T> extends AsyncIterable<T> {
  /** Session of the latest iteration; undefined until iteration starts */
  readonly session: StreamSession | undefined;
}

type Step<T> =
  | { readonly session: StreamSession; readonly emitted: false }
  | { readonly session: StreamSession; readonly emitted: true; readonly value: T };

function withPhase(session: StreamSession, phase: StreamPhase): StreamSession {
  return { ...session, phase };
}

class SessionStream<T> implements BridgeStream<T> {
  private current: StreamSession | undefined;

  constructor(
    private readonly options: CreateStreamOptions,
    private readonly settings: StreamSettings,
    private readonly mailbox: Mailbox<StreamMessage>,
    private readonly decode: (value: unknown) => T,
  ) {}

  get session(): StreamSession | undefined {
    return this.current;
  }

  /** Every iteration starts its own session and engine call. */
  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.run();
  }

  private async *run(): AsyncGenerator<T, void, undefined> {
    let session = this.init();
    try {
      while (session.phase.status === "streaming") {
        const step = await this.step(session);
        session = step.session;
        this.current = session;
        if (step.emitted) {
          yield step.value;
        }
      }
    } finally {
      this.cleanup(session);
    }
  }

  private init(): StreamSession {
    const token = randomUUID();
    this.mailbox.open(token);
    const worker = spawnWorker(
      this.options.engine,
      this.options.functionName,
      this.options.args,
      this.mailbox,
      token,
      { collector: this.options.collector },
    );
    const session: StreamSession = {
      token,
      functionName: this.options.functionName,
      worker,
      phase: { status: "streaming" },
    };
    this.current = session;
    return session;
  }

  private async step(session: StreamSession): Promise<Step<T>> {
    const { readTimeoutMs, contentKey } = this.settings;
    const message = await this.mailbox.receive(session.token, readTimeoutMs);

    if (message === undefined) {
      const reason = new TimeoutError({
        code: "STREAM_READ_TIMEOUT",
        message: `No message from ${session.functionName} within ${readTimeoutMs}ms`,
        metadata: { functionName: session.functionName, token: session.token },
      });
      return { session: withPhase(session, { status: "timed_out", reason }), emitted: false };
    }

    if (message.type === "chunk") {
      if (isEmptyChunk(message.chunk, contentKey)) {
        return { session, emitted: false };
      }
      return this.emit(session, message.chunk, session);
    }

    if (message.outcome.ok) {
      return this.emit(session, message.outcome.data, withPhase(session, { status: "completed" }));
    }
    return {
      session: withPhase(session, { status: "failed", reason: message.outcome.error }),
      emitted: false,
    };
  }

  private emit(session: StreamSession, raw: unknown, next: StreamSession): Step<T> {
    try {
      return { session: next, emitted: true, value: this.decode(raw) };
    } catch (error) {
      const reason = new ValidationError({
        code: "ENGINE_RESPONSE_INVALID",
        message: `Stream chunk from ${session.functionName} failed to decode`,
        cause: error,
      });
      return { session: withPhase(session, { status: "failed", reason }), emitted: false };
    }
  }

  private cleanup(session: StreamSession): void {
    const drained = this.mailbox.drain(session.token, this.settings.maxDrain);
    const final =
      session.phase.status === "streaming" ? withPhase(session, { status: "abandoned" }) : session;

    if (this.settings.cancelOnCleanup && session.worker.isRunning()) {
      session.worker.cancel(`stream ${final.phase.status}`);
    }
    const dropped = this.mailbox.release(session.token);
    this.current = final;
    log.debug(
      `${session.functionName} stream ${final.phase.status} (drained ${drained}, dropped ${dropped} past the bound)`,
    );

    if (this.options.onEnd !== undefined) {
      try {
        this.options.onEnd(final);
      } catch (error) {
        log.warn(`onEnd callback failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
}

/**
 * Expose an engine stream call as an async iterable.
 *
 * The engine call starts on the first pull. Iterating again starts a fresh
 * session with a new token and a new engine call. Each pull waits at most
 * `readTimeoutMs` for the next message; a timeout or a failed completion
 * ends the iteration without throwing, leaving the reason on the session.
 * Content-less chunks are skipped; the final value is yielded last.
 */
export function createStream(options: CreateStreamOptions): BridgeStream<unknown>;
export function createStream<T>(
  options: CreateStreamOptions,
  decode: (value: unknown) => T,
): BridgeStream<T>;
export function createStream(
  options: CreateStreamOptions,
  decode: (value: unknown) => unknown = (value) => value,
): BridgeStream<unknown> {
  const settings = resolveStreamSettings(
    {
      readTimeoutMs: options.readTimeoutMs,
      maxDrain: options.maxDrain,
      contentKey: options.contentKey,
      cancelOnCleanup: options.cancelOnCleanup,
    },
    options.env,
  );
  return new SessionStream(options, settings, options.mailbox ?? getDefaultMailbox(), decode);
}
