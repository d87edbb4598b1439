import { createLogger, type Engine, isEngine } from "@fnbridge/core";
import { ConflictError, NotFoundError, ValidationError } from "@fnbridge/errors";
import { z } from "zod";

const log = createLogger("bridge");

/**
 * A named engine the bridge can call. When `functions` is given, only those
 * function names are callable through it.
 */
export interface BridgeClient {
  readonly name: string;
  readonly engine: Engine;
  readonly functions?: readonly string[] | undefined;
}

export const BridgeClientSchema = z.object({
  name: z.string().min(1),
  engine: z.custom<Engine>(isEngine, {
    message: "engine must implement invoke, invokeStream and createCollector",
  }),
  functions: z.array(z.string().min(1)).optional(),
});

export class ClientRegistry {
  private readonly clients = new Map<string, BridgeClient>();

  /**
   * @throws ValidationError (VALIDATION_FAILED) for a malformed client
   * @throws ConflictError (CLIENT_ALREADY_REGISTERED) for a duplicate name
   */
  register(client: BridgeClient): this {
    const parsed = BridgeClientSchema.safeParse(client);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
        code: issue.code,
      }));
      throw new ValidationError({
        code: "VALIDATION_FAILED",
        message: `Invalid client: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`,
        issues,
      });
    }
    if (this.clients.has(client.name)) {
      throw new ConflictError({
        code: "CLIENT_ALREADY_REGISTERED",
        message: `Client "${client.name}" is already registered`,
        metadata: { client: client.name },
      });
    }
    this.clients.set(client.name, client);
    log.debug(`registered client ${client.name}`);
    return this;
  }

  /**
   * @throws NotFoundError (CLIENT_NOT_CONFIGURED) for an unknown name
   */
  get(name: string): BridgeClient {
    const client = this.clients.get(name);
    if (client === undefined) {
      throw clientNotConfigured(name);
    }
    return client;
  }

  find(name: string): BridgeClient | undefined {
    return this.clients.get(name);
  }

  has(name: string): boolean {
    return this.clients.has(name);
  }

  names(): string[] {
    return [...this.clients.keys()];
  }
}

/** Whether `functionName` may be called through `client` */
export function exposesFunction(client: BridgeClient, functionName: string): boolean {
  return client.functions === undefined || client.functions.includes(functionName);
}

export function clientNotConfigured(name: string): NotFoundError<"CLIENT_NOT_CONFIGURED"> {
  return new NotFoundError({
    code: "CLIENT_NOT_CONFIGURED",
    message: `No client named "${name}" is configured`,
    metadata: { client: name },
  });
}

export function functionNotFound(client: BridgeClient, functionName: string): NotFoundError<"ENGINE_FUNCTION_NOT_FOUND"> {
  return new NotFoundError({
    code: "ENGINE_FUNCTION_NOT_FOUND",
    message: `Function "${functionName}" is not available on client "${client.name}"`,
    metadata: { client: client.name, functionName },
  });
}
