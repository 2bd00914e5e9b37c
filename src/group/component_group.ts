/***
 * ComponentGroup - Moves a record's worth of components in and out of a World.
 *
 * A record type names a fixed set of components. Declaring it once as a
 * group gives every operation needed to copy it out of one World and
 * into another, without listing the components again at each call site:
 *
 *   interface Player {
 *     position: Position;
 *     health: Health;
 *     animation: Animation | null;
 *   }
 *
 *   const PlayerComponents = define_group<Player>("PlayerComponents", {
 *     position: "Position",
 *     health: "Health",
 *     animation: "Option<Animation>", // may be absent
 *   });
 *
 *   const player = PlayerComponents.exactly_one(level1);
 *   if (player.ok) PlayerComponents.create(player.value, level2);
 *
 * Operations:
 *   first_match(world)            first entity carrying every required component
 *   load(world, entity)           read a known entity; missing required → GroupError
 *   create(record, world)         new entity; null optionals are never attached
 *   update(record, world, entity) overwrite; null optionals are removed
 *   remove(world, entity)         detach and return; other components untouched
 *   exactly_one(world)            NO_MATCH / AMBIGUOUS instead of guessing
 *   all(world)                    every match, in join order
 *
 * Reads return copies (the component's clone function), so a record
 * loaded from one World and created in another shares nothing with its
 * source. create and update take ownership of the record's values.
 *
 * update stops at the first field whose write fails. Fields before it
 * keep their new values; callers needing all-or-nothing semantics must
 * validate before updating.
 *
 ***/

import type { EntityID } from "../entity/entity";
import type { ComponentDef, ComponentInfo } from "../component/component";
import type { World } from "../world/world";
import { create_group_schema, type GroupSchema, type RecordDefinition } from "./group_schema";
import { field_fragments, type FieldFragments } from "./field_fragments";
import {
  GROUP_ERROR,
  GroupError,
  LOOKUP_ERROR,
  LookupError,
  UpdateError,
} from "utils/error";
import {
  err,
  ok,
  OK_VOID,
  is_plain_object,
  unsafe_cast,
  type Result,
} from "type_primitives";

/** Record field value for a component that may be absent. */
export type Option<T> = T | null;

/**
 * Declared type text per record field. Fields that can hold null must
 * be declared with the `Option<...>` wrapper.
 */
export type DeclaredFieldTypes<R> = {
  readonly [K in keyof R & string]-?: null extends R[K] ? `Option<${string}>` : string;
};

//=========================================================
// ComponentGroup
//=========================================================

/**
 * The protocol a group implements. first_match and exactly_one are
 * derived from all(); hand-written groups extend this class and pick
 * their own update error type.
 */
export abstract class ComponentGroup<R, E = UpdateError> {
  abstract all(world: World): IterableIterator<[EntityID, R]>;
  abstract load(world: World, entity: EntityID): R;
  abstract create(record: R, world: World): EntityID;
  abstract update(record: R, world: World, entity: EntityID): Result<void, E>;
  abstract remove(world: World, entity: EntityID): R;

  /** First match in the World's join order, or null. */
  first_match(world: World): [EntityID, R] | null {
    for (const row of this.all(world)) return row;
    return null;
  }

  /** The only match, or NO_MATCH / AMBIGUOUS. */
  exactly_one(world: World): Result<R, LookupError> {
    let first: [EntityID, R] | null = null;
    for (const row of this.all(world)) {
      if (first !== null) {
        return err(
          new LookupError(
            LOOKUP_ERROR.AMBIGUOUS,
            `expected exactly one ${this.describe()} but found more than one`,
            { entities: [first[0], row[0]] },
          ),
        );
      }
      first = row;
    }
    if (first === null) {
      return err(
        new LookupError(
          LOOKUP_ERROR.NO_MATCH,
          `expected exactly one ${this.describe()} but found none`,
        ),
      );
    }
    return ok(first[1]);
  }

  protected describe(): string {
    return "component group";
  }
}

//=========================================================
// Synthesized groups
//=========================================================

class SynthesizedGroup<R> extends ComponentGroup<R> {
  private readonly fragments: readonly FieldFragments[];
  // Resolved infos per World, in schema order
  private readonly resolved = new WeakMap<World, readonly ComponentInfo[]>();

  constructor(public readonly schema: GroupSchema) {
    super();
    this.fragments = schema.fields.map((field) => field_fragments(schema.name, field));
  }

  *all(world: World): IterableIterator<[EntityID, R]> {
    const infos = this.resolve(world);
    const borrow = world.read_storages(this.defs(infos));
    try {
      const terms = this.fragments.map((f, i) => f.join_term(borrow.handles[i]));
      for (const row of world.join(world.entities(), terms)) {
        const record = this.build((f, i) => f.from_join(infos[i], row.values[i]));
        yield [row.entity, record];
      }
    } finally {
      borrow.release();
    }
  }

  load(world: World, entity: EntityID): R {
    const infos = this.resolve(world);
    const borrow = world.read_storages(this.defs(infos));
    try {
      return this.build((f, i) => f.read(infos[i], borrow.handles[i], entity));
    } finally {
      borrow.release();
    }
  }

  create(record: R, world: World): EntityID {
    const infos = this.resolve(world);
    const values = this.values_of(record);
    let builder = world.create_entity();
    for (let i = 0; i < this.fragments.length; i++) {
      builder = this.fragments[i].attach(infos[i], builder, values[i]);
    }
    return builder.finish();
  }

  update(record: R, world: World, entity: EntityID): Result<void, UpdateError> {
    const infos = this.resolve(world);
    const values = this.values_of(record);
    const borrow = world.write_storages(this.defs(infos));
    try {
      for (let i = 0; i < this.fragments.length; i++) {
        const res = this.fragments[i].write(borrow.handles[i], entity, values[i]);
        if (!res.ok) return res;
      }
      return OK_VOID;
    } finally {
      borrow.release();
    }
  }

  remove(world: World, entity: EntityID): R {
    const infos = this.resolve(world);
    const borrow = world.write_storages(this.defs(infos));
    try {
      return this.build((f, i) => f.take(borrow.handles[i], entity));
    } finally {
      borrow.release();
    }
  }

  protected override describe(): string {
    return this.schema.name;
  }

  //=========================================================
  // Internal
  //=========================================================

  private resolve(world: World): readonly ComponentInfo[] {
    let infos = this.resolved.get(world);
    if (infos === undefined) {
      infos = this.schema.fields.map((field) => world.component(field.payload_name));
      this.resolved.set(world, infos);
    }
    return infos;
  }

  private defs(infos: readonly ComponentInfo[]): ComponentDef[] {
    return infos.map((info) => info.def);
  }

  private build(value_at: (fragment: FieldFragments, i: number) => unknown): R {
    const record: Record<string, unknown> = {};
    for (let i = 0; i < this.fragments.length; i++) {
      record[this.fragments[i].field.name] = value_at(this.fragments[i], i);
    }
    return unsafe_cast<R>(record);
  }

  /** Field values in schema order, checked in dev builds. */
  private values_of(record: R): unknown[] {
    if (__DEV__ && (typeof record !== "object" || record === null)) {
      throw new GroupError(
        GROUP_ERROR.INVALID_RECORD,
        `${this.schema.name}: expected a record object, found ${record === null ? "null" : typeof record}`,
        { group: this.schema.name },
      );
    }
    const fields = unsafe_cast<Readonly<Record<string, unknown>>>(record);
    return this.fragments.map((f) => {
      const value = fields[f.field.name];
      f.check(value);
      return value;
    });
  }
}

/** A group synthesized from a schema, exposing the schema it was built from. */
export type DerivedGroup<R> = ComponentGroup<R, UpdateError> & {
  readonly schema: GroupSchema;
};

/** Build the group operations for a validated schema. */
export function synthesize<R>(schema: GroupSchema): DerivedGroup<R> {
  return new SynthesizedGroup<R>(schema);
}

/** Validate a record definition and synthesize its group. */
export function derive_group<R>(definition: RecordDefinition): DerivedGroup<R> {
  return synthesize<R>(create_group_schema(definition));
}

/**
 * Define a group from an object literal of declared types. Key order
 * is field order.
 */
export function define_group<R>(
  name: string,
  fields: DeclaredFieldTypes<R>,
): DerivedGroup<R> {
  const declared: unknown = fields;
  if (Array.isArray(declared)) {
    return derive_group<R>({ name, shape: { kind: "positional", fields: declared } });
  }
  if (!is_plain_object(declared)) {
    return derive_group<R>({ name, shape: { kind: "unit" } });
  }
  return derive_group<R>({
    name,
    shape: {
      kind: "named",
      fields: Object.entries(declared).map(([field, declared_type]) => ({
        name: field,
        declared_type,
      })),
    },
  });
}
