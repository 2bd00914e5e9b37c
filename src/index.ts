// Component groups
export {
  ComponentGroup,
  synthesize,
  derive_group,
  define_group,
  create_group_schema,
  classify,
  inner_option_type,
  type DerivedGroup,
  type DeclaredFieldTypes,
  type Option,
  type FieldDeclaration,
  type RecordShape,
  type RecordDefinition,
  type GroupSchema,
  type FieldSpec,
  type ClassifiedField,
  type SourceSpan,
} from "./group";

// World
export {
  JOIN_ORDER,
  required,
  maybe,
  type World,
  type ReadHandle,
  type WriteHandle,
  type ReadHandles,
  type WriteHandles,
  type StorageBorrow,
  type EntitiesHandle,
  type EntityBuilder,
  type JoinTerm,
  type JoinRow,
} from "./world/world";
export { MemoryWorld, type WorldOptions } from "./world/memory_world";
export { STORAGE_EVENT, type StorageEvent } from "./world/storage_event";

// Entities
export { format_entity, type EntityID } from "./entity/entity";

// Components
export { canonical_type_name } from "./component/component_registry";
export type {
  ComponentDef,
  ComponentID,
  ComponentInfo,
  ComponentOptions,
  ComponentValue,
  CloneFn,
} from "./component/component";

// Type syntax
export {
  parse_type,
  print_type,
  TYPE_SYNTAX_ERROR,
  TypeSyntaxError,
  type TypeExpr,
} from "./type_syntax";

// Errors & results
export {
  AppError,
  ECS_ERROR,
  ECSError,
  is_ecs_error,
  GROUP_ERROR,
  GroupError,
  is_group_error,
  STORAGE_ERROR,
  StorageError,
  UpdateError,
  LOOKUP_ERROR,
  LookupError,
} from "./utils/error";
export { ok, err, type Ok, type Err, type Result } from "./type_primitives";
