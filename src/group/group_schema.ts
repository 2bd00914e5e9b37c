/***
 *
 * GroupSchema - Validated, classified field list of one record.
 *
 * All schema-definition failures surface here, once, before any
 * behavior is synthesized: the record must have named fields, at least
 * one of them, no name twice, and every declared type must parse.
 * Field order is kept exactly as declared; storage handles are
 * requested and records are built in this order.
 *
 ***/

import {
  is_type_expr,
  parse_type,
  TypeSyntaxError,
  type TypeExpr,
} from "../type_syntax";
import {
  classify,
  type ClassifiedField,
  type SourceSpan,
} from "./component_field";
import { GROUP_ERROR, GroupError } from "utils/error";

//=========================================================
// Record definitions
//=========================================================

export interface FieldDeclaration {
  readonly name: string;
  /**
   * Type as written (`Option<Animation>`) or an already parsed TypeExpr.
   * Anything else is rejected with INVALID_FIELD_TYPE.
   */
  readonly declared_type: unknown;
  readonly span?: SourceSpan;
}

export type RecordShape =
  | { readonly kind: "named"; readonly fields: readonly FieldDeclaration[] }
  | { readonly kind: "positional"; readonly fields: readonly (string | TypeExpr)[] }
  | { readonly kind: "unit" }
  | { readonly kind: "variants"; readonly variants: readonly string[] };

export interface RecordDefinition {
  readonly name: string;
  readonly shape: RecordShape;
  readonly span?: SourceSpan;
}

export interface GroupSchema {
  readonly name: string;
  readonly fields: readonly ClassifiedField[];
}

//=========================================================
// Validation
//=========================================================

const SHAPE_DESCRIPTIONS: Readonly<Record<RecordShape["kind"], string>> = {
  named: "named fields",
  positional: "positional fields",
  unit: "no fields",
  variants: "variants",
};

const at = (span: SourceSpan | undefined): string =>
  span === undefined ? "" : ` (at ${span.line}:${span.column})`;

export function create_group_schema(definition: RecordDefinition): GroupSchema {
  const { name, shape, span } = definition;

  if (shape.kind !== "named") {
    throw new GroupError(
      GROUP_ERROR.UNSUPPORTED_SHAPE,
      `${name}: only records with named fields are supported, found a record with ${SHAPE_DESCRIPTIONS[shape.kind]}${at(span)}`,
      { record: name, shape: shape.kind, span },
    );
  }

  if (shape.fields.length === 0) {
    throw new GroupError(
      GROUP_ERROR.EMPTY_GROUP,
      `${name}: record must have at least one field to define a component group${at(span)}`,
      { record: name, span },
    );
  }

  const seen = new Set<string>();
  const fields: ClassifiedField[] = [];

  for (const field of shape.fields) {
    if (seen.has(field.name)) {
      throw new GroupError(
        GROUP_ERROR.DUPLICATE_FIELD,
        `${name}: field "${field.name}" is declared more than once${at(field.span)}`,
        { record: name, field: field.name, span: field.span },
      );
    }
    seen.add(field.name);

    fields.push(
      classify({
        name: field.name,
        declared_type: resolve_declared_type(name, field),
        span: field.span,
      }),
    );
  }

  return { name, fields };
}

function resolve_declared_type(record: string, field: FieldDeclaration): TypeExpr {
  const declared = field.declared_type;

  if (typeof declared === "string") {
    try {
      return parse_type(declared);
    } catch (error) {
      if (!(error instanceof TypeSyntaxError)) throw error;
      throw new GroupError(
        GROUP_ERROR.INVALID_FIELD_TYPE,
        `${record}.${field.name}: invalid type "${declared}": ${error.message}${at(field.span)}`,
        { record, field: field.name, span: field.span, column: error.column },
      );
    }
  }

  if (is_type_expr(declared)) return declared;

  throw new GroupError(
    GROUP_ERROR.INVALID_FIELD_TYPE,
    `${record}.${field.name}: declared type must be a type string or TypeExpr, found ${describe_value(declared)}${at(field.span)}`,
    { record, field: field.name, span: field.span },
  );
}

function describe_value(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
