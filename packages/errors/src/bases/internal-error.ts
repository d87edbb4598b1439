import { BridgeError } from "../base.js";
import type { InternalCodes } from "../types.js";

/**
 * Errors caused by bugs or unexpected states.
 * The `.code` field discriminates the specific error.
 */
export class InternalError<C extends InternalCodes = "INTERNAL_ERROR"> extends BridgeError<C> {
  override readonly _tag = "InternalError" as const;
}
