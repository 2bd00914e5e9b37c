/***
 *
 * ComponentField - One field of a component group, classified as
 * required or optional.
 *
 * The test is purely syntactic. A field is optional when its declared
 * type is written exactly as `Option<T>`: a single unqualified path
 * segment named Option with one angle-bracketed type argument. Nothing
 * is resolved, so:
 *
 *   Option<Animation>               optional, payload Animation
 *   std::option::Option<Animation>  required, payload is the whole path
 *   ::Option<Animation>             required
 *   Option::<Animation>             required
 *   Option<'a>                      required (lifetime, not a type)
 *
 * and a user type that happens to be called Option is treated as the
 * optional wrapper.
 *
 ***/

import { print_type, type TypeExpr } from "../type_syntax";
import { OPTION_TYPE_NAME } from "utils/constants";

export interface SourceSpan {
  readonly line: number;
  readonly column: number;
}

export interface FieldSpec {
  readonly name: string;
  readonly declared_type: TypeExpr;
  readonly span?: SourceSpan;
}

export interface ClassifiedField {
  readonly name: string;
  readonly declared_type: TypeExpr;
  /** Type of the value stored per component. */
  readonly payload_type: TypeExpr;
  /** Canonical text of payload_type; the World looks components up by it. */
  readonly payload_name: string;
  readonly is_optional: boolean;
  readonly span: SourceSpan | null;
}

/** Returns the inner type if `type` is spelled as the Option wrapper. */
export function inner_option_type(type: TypeExpr): TypeExpr | null {
  // Any other form (reference, tuple, qualified self, ...) is required
  if (type.kind !== "path" || type.qself !== null) return null;

  const { path } = type;
  if (path.leading_colon || path.segments.length !== 1) return null;

  const [segment] = path.segments;
  const args = segment.arguments;
  if (
    segment.ident !== OPTION_TYPE_NAME ||
    args.kind !== "angle_bracketed" ||
    args.colon2 ||
    args.args.length !== 1
  ) {
    return null;
  }

  const [arg] = args.args;
  return arg.kind === "type" ? arg.type : null;
}

export function classify(field: FieldSpec): ClassifiedField {
  const inner = inner_option_type(field.declared_type);
  const payload_type = inner ?? field.declared_type;
  return {
    name: field.name,
    declared_type: field.declared_type,
    payload_type,
    payload_name: print_type(payload_type),
    is_optional: inner !== null,
    span: field.span ?? null,
  };
}
