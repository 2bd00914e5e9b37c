export {
  ComponentGroup,
  synthesize,
  derive_group,
  define_group,
  type DerivedGroup,
  type DeclaredFieldTypes,
  type Option,
} from "./component_group";
export {
  create_group_schema,
  type FieldDeclaration,
  type RecordShape,
  type RecordDefinition,
  type GroupSchema,
} from "./group_schema";
export {
  classify,
  inner_option_type,
  type FieldSpec,
  type ClassifiedField,
  type SourceSpan,
} from "./component_field";
