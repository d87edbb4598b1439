import { BridgeError } from "../base.js";
import type { BridgeErrorOptions, ValidationCodes, ValidationIssue } from "../types.js";

export interface ValidationErrorOptions<C extends ValidationCodes> extends BridgeErrorOptions<C> {
  issues?: readonly ValidationIssue[] | undefined;
}

/**
 * Errors caused by invalid input, configuration, or engine output that fails to decode.
 * Carries field-level issues.
 */
export class ValidationError<C extends ValidationCodes = "VALIDATION_FAILED"> extends BridgeError<C> {
  override readonly _tag = "ValidationError" as const;
  readonly issues: readonly ValidationIssue[];

  constructor(options: ValidationErrorOptions<C>) {
    super(options);
    this.issues = options.issues ?? [];
  }
}
