import { BridgeError } from "../base.js";
import type { NotFoundCodes } from "../types.js";

/**
 * Errors for a missing client or function.
 * The `.code` field discriminates the specific error.
 */
export class NotFoundError<C extends NotFoundCodes = "ENGINE_FUNCTION_NOT_FOUND"> extends BridgeError<C> {
  override readonly _tag = "NotFoundError" as const;
}
