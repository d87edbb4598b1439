import { type CallOutcome, failure, type InvocationDescriptor, success } from "@fnbridge/core";
import { type BridgeStream, createStream, type CreateStreamOptions } from "@fnbridge/stream";
import {
  type ClientRegistry,
  clientNotConfigured,
  exposesFunction,
  functionNotFound,
} from "./client-registry.js";

export type CallStreamOptions = Omit<CreateStreamOptions, "engine" | "functionName" | "args">;

/**
 * Open a stream for a function through its client's engine.
 *
 * The returned iterable starts the engine call on first pull. Stream calls
 * publish no telemetry events; pass `collector` to have the engine record
 * usage for the stream. An unknown client or a function the client does
 * not expose comes back as a NotFoundError failure.
 */
export function callStream(
  registry: ClientRegistry,
  descriptor: InvocationDescriptor,
  options?: CallStreamOptions,
): CallOutcome<BridgeStream<unknown>>;
export function callStream<T>(
  registry: ClientRegistry,
  descriptor: InvocationDescriptor,
  options: CallStreamOptions,
  decode: (value: unknown) => T,
): CallOutcome<BridgeStream<T>>;
export function callStream(
  registry: ClientRegistry,
  descriptor: InvocationDescriptor,
  options: CallStreamOptions = {},
  decode: (value: unknown) => unknown = (value) => value,
): CallOutcome<BridgeStream<unknown>> {
  const client = registry.find(descriptor.client);
  if (client === undefined) {
    return failure(clientNotConfigured(descriptor.client));
  }
  if (!exposesFunction(client, descriptor.functionName)) {
    return failure(functionNotFound(client, descriptor.functionName));
  }
  return success(
    createStream(
      { ...options, engine: client.engine, functionName: descriptor.functionName, args: descriptor.args },
      decode,
    ),
  );
}
