import {
  type CallOutcome,
  createLogger,
  failure,
  type InvocationDescriptor,
  success,
  type UsageCollector,
} from "@fnbridge/core";
import { ValidationError } from "@fnbridge/errors";
import { type Response, wrapOutcome } from "@fnbridge/response";
import { type EventBus, withTelemetry } from "@fnbridge/telemetry";
import {
  type ClientRegistry,
  clientNotConfigured,
  exposesFunction,
  functionNotFound,
} from "./client-registry.js";

const log = createLogger("bridge");

export interface CallFunctionOptions {
  /** Default: the process-wide telemetry bus */
  readonly bus?: EventBus | undefined;
  /** Reused instead of creating a collector for this call */
  readonly collector?: UsageCollector | undefined;
  /** Sampling draw, for deterministic tests */
  readonly random?: (() => number) | undefined;
}

/**
 * Call a function through its client's engine under telemetry.
 *
 * A success comes back wrapped in a Response carrying usage. Error outcomes
 * from the engine come back unwrapped, as do CLIENT_NOT_CONFIGURED for an
 * unknown client and ENGINE_FUNCTION_NOT_FOUND when the client does not
 * expose the function. When `resolve` is given it runs on the raw data
 * before wrapping; a throw from it yields an ENGINE_RESPONSE_INVALID
 * failure. Engine throws propagate.
 */
export function callFunction(
  registry: ClientRegistry,
  descriptor: InvocationDescriptor,
  options?: CallFunctionOptions,
): Promise<CallOutcome<Response<unknown>>>;
export function callFunction<T>(
  registry: ClientRegistry,
  descriptor: InvocationDescriptor,
  options: CallFunctionOptions,
  resolve: (data: unknown) => T,
): Promise<CallOutcome<Response<T>>>;
export async function callFunction(
  registry: ClientRegistry,
  descriptor: InvocationDescriptor,
  options: CallFunctionOptions = {},
  resolve: (data: unknown) => unknown = (data) => data,
): Promise<CallOutcome<Response<unknown>>> {
  const client = registry.find(descriptor.client);
  if (client === undefined) {
    return failure(clientNotConfigured(descriptor.client));
  }
  if (!exposesFunction(client, descriptor.functionName)) {
    return failure(functionNotFound(client, descriptor.functionName));
  }

  const { engine } = client;
  const { result, collector } = await withTelemetry(
    descriptor,
    (collectorOptions) => engine.invoke(descriptor.functionName, descriptor.args, collectorOptions),
    {
      collectorFactory: engine,
      collector: options.collector,
      bus: options.bus,
      random: options.random,
    },
  );

  if (!result.ok) {
    log.debug(`${client.name}.${descriptor.functionName} returned an error outcome`);
    return result;
  }

  let resolved: unknown;
  try {
    resolved = resolve(result.data);
  } catch (error) {
    return failure(
      new ValidationError({
        code: "ENGINE_RESPONSE_INVALID",
        message: `Result of ${descriptor.functionName} could not be resolved`,
        metadata: { client: client.name, functionName: descriptor.functionName },
        cause: error,
      }),
    );
  }
  return wrapOutcome(success(resolved), collector);
}
