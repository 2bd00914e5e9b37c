/***
 *
 * Printer - Canonical text for a TypeExpr.
 *
 * Output is single-spaced and stable: parse_type(print_type(t)) gives
 * back t, and two spellings of the same type (`Vec< u8 >`, `Vec<u8>`)
 * print identically. Component registries key on this text.
 *
 ***/

import type {
  GenericArgument,
  Path,
  PathArguments,
  TypeExpr,
  TypeParamBound,
} from "./type_expr";

export function print_type(type: TypeExpr): string {
  switch (type.kind) {
    case "path": {
      const path = print_path(type.path);
      if (type.qself === null) return path;
      const self_ty = print_type(type.qself.type);
      const qself =
        type.qself.as_trait === null
          ? `<${self_ty}>`
          : `<${self_ty} as ${print_path(type.qself.as_trait)}>`;
      return `${qself}::${path}`;
    }
    case "reference": {
      const lifetime = type.lifetime === null ? "" : `${type.lifetime} `;
      const mutability = type.mutable ? "mut " : "";
      return `&${lifetime}${mutability}${print_type(type.elem)}`;
    }
    case "pointer":
      return `*${type.mutable ? "mut" : "const"} ${print_type(type.elem)}`;
    case "tuple":
      if (type.elems.length === 1) return `(${print_type(type.elems[0])},)`;
      return `(${type.elems.map(print_type).join(", ")})`;
    case "paren":
      return `(${print_type(type.elem)})`;
    case "array":
      return `[${print_type(type.elem)}; ${type.len}]`;
    case "slice":
      return `[${print_type(type.elem)}]`;
    case "trait_object": {
      const bounds = print_bounds(type.bounds);
      return type.dyn ? `dyn ${bounds}` : bounds;
    }
    case "impl_trait":
      return `impl ${print_bounds(type.bounds)}`;
    case "bare_fn": {
      const output = type.output === null ? "" : ` -> ${print_type(type.output)}`;
      return `fn(${type.inputs.map(print_type).join(", ")})${output}`;
    }
    case "never":
      return "!";
    case "infer":
      return "_";
  }
}

export function print_path(path: Path): string {
  const segments = path.segments
    .map((segment) => segment.ident + print_arguments(segment.arguments))
    .join("::");
  return path.leading_colon ? `::${segments}` : segments;
}

function print_arguments(args: PathArguments): string {
  switch (args.kind) {
    case "none":
      return "";
    case "angle_bracketed": {
      const inner = `<${args.args.map(print_generic_argument).join(", ")}>`;
      return args.colon2 ? `::${inner}` : inner;
    }
    case "parenthesized": {
      const output = args.output === null ? "" : ` -> ${print_type(args.output)}`;
      return `(${args.inputs.map(print_type).join(", ")})${output}`;
    }
  }
}

function print_generic_argument(arg: GenericArgument): string {
  switch (arg.kind) {
    case "type":
      return print_type(arg.type);
    case "lifetime":
      return arg.name;
    case "const":
      return arg.value;
    case "binding":
      return `${arg.ident} = ${print_type(arg.type)}`;
  }
}

function print_bounds(bounds: readonly TypeParamBound[]): string {
  return bounds
    .map((bound) =>
      bound.kind === "lifetime"
        ? bound.name
        : `${bound.maybe ? "?" : ""}${print_path(bound.path)}`,
    )
    .join(" + ");
}
