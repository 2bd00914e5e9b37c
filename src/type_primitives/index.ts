export type { Brand } from "./brand";
export {
  validate_and_cast,
  unsafe_cast,
  is_non_negative_integer,
  is_present,
  is_plain_object,
} from "./assertions";
export { VALIDATION, ValidationError } from "./error";
export { ok, err, OK_VOID, type Ok, type Err, type Result } from "./result";
