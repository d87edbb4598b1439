import { BridgeError } from "../base.js";
import type { ExternalCodes } from "../types.js";

/**
 * Errors caused by failures in external dependencies such as the engine.
 * The `.code` field discriminates the specific error.
 */
export class ExternalError<C extends ExternalCodes = "ENGINE_CALL_FAILED"> extends BridgeError<C> {
  override readonly _tag = "ExternalError" as const;
}
