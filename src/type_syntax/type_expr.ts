/***
 * TypeExpr - Syntax tree for declared field types.
 *
 * Mirrors what a reader sees in a type as written: paths with generic
 * arguments, references, pointers, tuples, arrays, slices, trait
 * objects and function types. Nothing here is resolved; `Option` is
 * just an identifier until the field classifier looks at it.
 *
 ***/

import { is_plain_object } from "type_primitives";

//=========================================================
// Paths
//=========================================================

export interface Path {
  /** True for paths written with a leading `::`. */
  readonly leading_colon: boolean;
  readonly segments: readonly PathSegment[];
}

export interface PathSegment {
  readonly ident: string;
  readonly arguments: PathArguments;
}

export type PathArguments =
  | { readonly kind: "none" }
  | {
      readonly kind: "angle_bracketed";
      /** True for the turbofish form `Name::<T>`. */
      readonly colon2: boolean;
      readonly args: readonly GenericArgument[];
    }
  | {
      readonly kind: "parenthesized";
      readonly inputs: readonly TypeExpr[];
      readonly output: TypeExpr | null;
    };

export type GenericArgument =
  | { readonly kind: "type"; readonly type: TypeExpr }
  | { readonly kind: "lifetime"; readonly name: string }
  | { readonly kind: "const"; readonly value: string }
  | { readonly kind: "binding"; readonly ident: string; readonly type: TypeExpr };

/** `<T as Trait>` in front of a path. */
export interface QSelf {
  readonly type: TypeExpr;
  readonly as_trait: Path | null;
}

export type TypeParamBound =
  /** `maybe` marks a relaxed bound such as `?Sized`. */
  | { readonly kind: "trait"; readonly maybe: boolean; readonly path: Path }
  | { readonly kind: "lifetime"; readonly name: string };

//=========================================================
// Types
//=========================================================

export type TypeExpr =
  | { readonly kind: "path"; readonly qself: QSelf | null; readonly path: Path }
  | {
      readonly kind: "reference";
      readonly lifetime: string | null;
      readonly mutable: boolean;
      readonly elem: TypeExpr;
    }
  | { readonly kind: "pointer"; readonly mutable: boolean; readonly elem: TypeExpr }
  | { readonly kind: "tuple"; readonly elems: readonly TypeExpr[] }
  | { readonly kind: "paren"; readonly elem: TypeExpr }
  | { readonly kind: "array"; readonly elem: TypeExpr; readonly len: string }
  | { readonly kind: "slice"; readonly elem: TypeExpr }
  | {
      readonly kind: "trait_object";
      readonly dyn: boolean;
      readonly bounds: readonly TypeParamBound[];
    }
  | { readonly kind: "impl_trait"; readonly bounds: readonly TypeParamBound[] }
  | {
      readonly kind: "bare_fn";
      readonly inputs: readonly TypeExpr[];
      readonly output: TypeExpr | null;
    }
  | { readonly kind: "never" }
  | { readonly kind: "infer" };

export type TypeKind = TypeExpr["kind"];

export type TypeOfKind<K extends TypeKind> = Extract<TypeExpr, { kind: K }>;

const TYPE_KINDS: Readonly<Record<TypeKind, true>> = {
  path: true,
  reference: true,
  pointer: true,
  tuple: true,
  paren: true,
  array: true,
  slice: true,
  trait_object: true,
  impl_trait: true,
  bare_fn: true,
  never: true,
  infer: true,
};

/** Shallow check: a plain object tagged with a known type kind. */
export const is_type_expr = (value: unknown): value is TypeExpr =>
  is_plain_object(value) &&
  typeof value.kind === "string" &&
  Object.hasOwn(TYPE_KINDS, value.kind);

/** Build a plain single-segment path type, e.g. `path_type("Position")`. */
export const path_type = (
  ident: string,
  args?: readonly TypeExpr[],
): TypeOfKind<"path"> => ({
  kind: "path",
  qself: null,
  path: {
    leading_colon: false,
    segments: [
      {
        ident,
        arguments:
          args === undefined
            ? { kind: "none" }
            : {
                kind: "angle_bracketed",
                colon2: false,
                args: args.map((type): GenericArgument => ({ kind: "type", type })),
              },
      },
    ],
  },
});
