import { BridgeError } from "../base.js";
import type { TimeoutCodes } from "../types.js";

/**
 * Errors caused by an exceeded deadline.
 * The `.code` field discriminates the specific error.
 */
export class TimeoutError<C extends TimeoutCodes = "STREAM_READ_TIMEOUT"> extends BridgeError<C> {
  override readonly _tag = "TimeoutError" as const;
}
