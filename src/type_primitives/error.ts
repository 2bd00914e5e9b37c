/***
 * Validation errors - raised by the dev-mode checks in assertions.ts.
 *
 * Kept apart from the World and group error hierarchies so that the
 * primitives do not depend on either.
 *
 ***/

import { AppError } from "utils/error";

export enum VALIDATION {
  VALIDATION_FAIL_CONDITION = "VALIDATION_FAIL_CONDITION",
}

export class ValidationError extends AppError {
  constructor(
    public readonly category: VALIDATION,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message, false, context);
  }
}
