export { parse_type } from "./parser";
export { print_type, print_path } from "./printer";
export { tokenize, TOKEN, type Token } from "./lexer";
export { TYPE_SYNTAX_ERROR, TypeSyntaxError } from "./error";
export {
  path_type,
  is_type_expr,
  type TypeExpr,
  type TypeKind,
  type TypeOfKind,
  type Path,
  type PathSegment,
  type PathArguments,
  type GenericArgument,
  type QSelf,
  type TypeParamBound,
} from "./type_expr";
