/***
 * Assertions - Dev-only runtime validation and branded casting.
 *
 * Checks are guarded by __DEV__ and disappear from production builds.
 * validate_and_cast creates branded IDs: it validates in dev and returns
 * the value as the branded type. unsafe_cast skips every check and is
 * reserved for values the caller has already proven valid.
 *
 ***/

import { VALIDATION, ValidationError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

/** True for anything other than null and undefined. */
export const is_present = <T>(v: T | null | undefined): v is T =>
  v !== null && v !== undefined;

/** True for `{}`-style objects: not arrays, not class instances. */
export const is_plain_object = (
  v: unknown,
): v is Record<string, unknown> => {
  if (typeof v !== "object" || v === null || Array.isArray(v)) return false;
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
};

export function validate_and_cast<T, Result extends T = T>(
  value: T,
  validator: (v: T) => boolean,
  err_message: string,
): Result {
  if (__DEV__ && !validator(value)) {
    throw new ValidationError(
      VALIDATION.VALIDATION_FAIL_CONDITION,
      `Expected value to meet validation: ${err_message}`,
    );
  }
  return value as Result;
}

export function unsafe_cast<T>(value: unknown): T {
  return value as T;
}
