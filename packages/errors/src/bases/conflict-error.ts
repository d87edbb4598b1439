import { BridgeError } from "../base.js";
import type { ConflictCodes } from "../types.js";

/**
 * Errors caused by a state conflict, such as registering a client name twice.
 * The `.code` field discriminates the specific error.
 */
export class ConflictError<C extends ConflictCodes = "CLIENT_ALREADY_REGISTERED"> extends BridgeError<C> {
  override readonly _tag = "ConflictError" as const;
}
