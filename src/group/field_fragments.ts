/***
 *
 * FieldFragments - Per-field behavior for each group operation.
 *
 * A classified field yields one fragment set, chosen once at synthesis
 * time: the required variant treats absence as a broken invariant, the
 * optional variant maps absence to null. Group operations never branch
 * on is_optional themselves; they run every field's fragment in schema
 * order.
 *
 ***/

import { format_entity, type EntityID } from "../entity/entity";
import type { ComponentInfo } from "../component/component";
import {
  maybe,
  required,
  type EntityBuilder,
  type JoinTerm,
  type ReadHandle,
  type WriteHandle,
} from "../world/world";
import type { ClassifiedField } from "./component_field";
import { GROUP_ERROR, GroupError, UpdateError } from "utils/error";
import { err, is_present, OK_VOID, type Result } from "type_primitives";

export interface FieldFragments {
  readonly field: ClassifiedField;
  /** How this field constrains a join: hard filter or present-or-absent. */
  join_term(handle: ReadHandle<unknown>): JoinTerm;
  /** Turn a joined value into the record's field value. */
  from_join(info: ComponentInfo, joined: unknown): unknown;
  /** load: read the field for a known entity. */
  read(info: ComponentInfo, handle: ReadHandle<unknown>, entity: EntityID): unknown;
  /** create: attach the field to a fresh entity. */
  attach(info: ComponentInfo, builder: EntityBuilder, value: unknown): EntityBuilder;
  /** update: overwrite the stored component. */
  write(handle: WriteHandle<unknown>, entity: EntityID, value: unknown): Result<void, UpdateError>;
  /** remove: detach the component and return it as the field value. */
  take(handle: WriteHandle<unknown>, entity: EntityID): unknown;
  /** Dev check of a record value before it is written. */
  check(value: unknown): void;
}

function missing_component(
  group: string,
  field: ClassifiedField,
  entity: EntityID,
): GroupError {
  return new GroupError(
    GROUP_ERROR.MISSING_REQUIRED_COMPONENT,
    `expected a ${field.payload_name} component to be present on entity ${format_entity(entity)} ` +
      `for field "${field.name}" of ${group}; this is a bug in the caller, ` +
      `the entity was assumed to carry every required component of the group`,
    { group, field: field.name, component: field.payload_name, entity },
  );
}

function insert(
  field: ClassifiedField,
  handle: WriteHandle<unknown>,
  entity: EntityID,
  value: unknown,
): Result<void, UpdateError> {
  const res = handle.insert(entity, value);
  if (!res.ok) return err(new UpdateError(field.name, field.payload_name, res.error));
  return OK_VOID;
}

//=========================================================
// Required
//=========================================================

function required_fragments(group: string, field: ClassifiedField): FieldFragments {
  return {
    field,
    join_term: (handle) => required(handle),
    from_join: (info, joined) => info.clone(joined),
    read(info, handle, entity) {
      const value = handle.get(entity);
      if (value === undefined) throw missing_component(group, field, entity);
      return info.clone(value);
    },
    attach: (info, builder, value) => builder.attach(info.def, value),
    write: (handle, entity, value) => insert(field, handle, entity, value),
    take(handle, entity) {
      const value = handle.remove(entity);
      if (value === undefined) throw missing_component(group, field, entity);
      return value;
    },
    check(value) {
      if (__DEV__ && !is_present(value)) {
        throw new GroupError(
          GROUP_ERROR.INVALID_RECORD,
          `${group}: required field "${field.name}" (${field.payload_name}) has no value`,
          { group, field: field.name, component: field.payload_name },
        );
      }
    },
  };
}

//=========================================================
// Optional
//=========================================================

function optional_fragments(field: ClassifiedField): FieldFragments {
  return {
    field,
    join_term: (handle) => maybe(handle),
    from_join: (info, joined) => (is_present(joined) ? info.clone(joined) : null),
    read(info, handle, entity) {
      const value = handle.get(entity);
      return value === undefined ? null : info.clone(value);
    },
    // Absent values are never attached, not attached-then-removed
    attach: (info, builder, value) =>
      is_present(value) ? builder.attach(info.def, value) : builder,
    write(handle, entity, value) {
      if (is_present(value)) return insert(field, handle, entity, value);
      handle.remove(entity);
      return OK_VOID;
    },
    take: (handle, entity) => handle.remove(entity) ?? null,
    check() {},
  };
}

export function field_fragments(group: string, field: ClassifiedField): FieldFragments {
  return field.is_optional ? optional_fragments(field) : required_fragments(group, field);
}
