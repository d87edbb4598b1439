import { success } from "@fnbridge/core";
import { NotFoundError } from "@fnbridge/errors";
import { type StreamMessage, Mailbox } from "@fnbridge/stream";
import { FakeCollector, FakeEngine, testDescriptor } from "@fnbridge/test-utils";
import { describe, expect, it } from "vitest";
import { callStream } from "../call-stream.js";
import { ClientRegistry } from "../client-registry.js";

async function collect<T>(stream: AsyncIterable<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of stream) values.push(value);
  return values;
}

describe("callStream", () => {
  const descriptor = testDescriptor({ functionName: "ExtractTasks", action: "extract_tasks_stream" });

  it("returns a stream of the engine's chunks", async () => {
    const engine = new FakeEngine({
      ExtractTasks: { chunks: [{ content: "fix" }, { content: "" }, { content: "fix printer" }], final: success({ content: "fix printer." }) },
    });
    const registry = new ClientRegistry().register({ name: "support", engine });

    const outcome = callStream(registry, descriptor, { mailbox: new Mailbox<StreamMessage>() });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(await collect(outcome.data)).toEqual([
      { content: "fix" },
      { content: "fix printer" },
      { content: "fix printer." },
    ]);
    expect(outcome.data.session?.phase.status).toBe("completed");
  });

  it("hands the collector to the engine", async () => {
    const engine = new FakeEngine({ ExtractTasks: { chunks: ["a"], usage: { input_tokens: 3, output_tokens: 4 } } });
    const registry = new ClientRegistry().register({ name: "support", engine });
    const collector = new FakeCollector("stream");

    const outcome = callStream(registry, descriptor, { collector, mailbox: new Mailbox<StreamMessage>() });
    if (!outcome.ok) throw new Error("expected a stream");
    await collect(outcome.data);

    expect(engine.calls[0]?.collectors).toEqual([collector]);
    expect(collector.usage()).toEqual({ input_tokens: 3, output_tokens: 4 });
  });

  it("applies a decoder", async () => {
    const engine = new FakeEngine({ ExtractTasks: { chunks: ["a", "b"], final: success("ab") } });
    const registry = new ClientRegistry().register({ name: "support", engine });

    const outcome = callStream(registry, descriptor, {}, (value) => String(value).toUpperCase());
    if (!outcome.ok) throw new Error("expected a stream");

    expect(await collect(outcome.data)).toEqual(["A", "B", "AB"]);
  });

  it("returns ENGINE_FUNCTION_NOT_FOUND for a function the client does not expose", () => {
    const registry = new ClientRegistry().register({
      name: "support",
      engine: new FakeEngine(),
      functions: ["AnalyzeTicket"],
    });

    const outcome = callStream(registry, descriptor);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(NotFoundError);
  });

  it("returns CLIENT_NOT_CONFIGURED for an unknown client without calling an engine", () => {
    const engine = new FakeEngine({ ExtractTasks: { chunks: ["a"] } });
    const registry = new ClientRegistry().register({ name: "support", engine });

    const outcome = callStream(registry, { ...descriptor, client: "billing" });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error instanceof NotFoundError && outcome.error.code).toBe("CLIENT_NOT_CONFIGURED");
    expect(engine.calls).toHaveLength(0);
  });
});
