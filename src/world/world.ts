/***
 * World - The storage contract component groups are synthesized against.
 *
 * A World stores, per registered component type, a mapping from entity
 * to value. Groups never touch a World's internals; every operation goes
 * through the handles described here:
 *
 *   const borrow = world.read_storages([Pos, Vel]);
 *   try {
 *     const [pos, vel] = borrow.handles;
 *     pos.get(entity);
 *   } finally {
 *     borrow.release();
 *   }
 *
 * Handles are only valid until their borrow is released. A World must
 * reject, at the moment a batch is requested, any batch that would read
 * a component currently being written or write one currently borrowed.
 *
 ***/

import type { EntityID } from "../entity/entity";
import type {
  ComponentDef,
  ComponentInfo,
  ComponentValue,
} from "../component/component";
import type { StorageError } from "utils/error";
import type { Result } from "type_primitives";

//=========================================================
// Storage handles
//=========================================================

export interface ReadHandle<T> {
  readonly def: ComponentDef<T>;
  get(entity: EntityID): T | undefined;
}

export interface WriteHandle<T> extends ReadHandle<T> {
  /** Insert or overwrite. Fails when the entity is no longer alive. */
  insert(entity: EntityID, value: T): Result<void, StorageError>;
  /** Detach and return the value. Absent components yield undefined. */
  remove(entity: EntityID): T | undefined;
}

export type ReadHandles<D extends readonly ComponentDef[]> = {
  readonly [K in keyof D]: ReadHandle<ComponentValue<D[K]>>;
};

export type WriteHandles<D extends readonly ComponentDef[]> = {
  readonly [K in keyof D]: WriteHandle<ComponentValue<D[K]>>;
};

/** Handles acquired together and released together. */
export interface StorageBorrow<H> {
  readonly handles: H;
  release(): void;
}

/** Enumeration of live entities, in the World's join order. */
export interface EntitiesHandle extends Iterable<EntityID> {
  is_alive(entity: EntityID): boolean;
}

//=========================================================
// Join
//=========================================================

/**
 * Ordering guarantee of a World's join.
 *
 * ENTITY_INDEX: ascending entity slot index.
 * STABLE: unspecified, but repeated joins over an unchanged World yield
 * the same order within one process run.
 */
export enum JOIN_ORDER {
  ENTITY_INDEX = "ENTITY_INDEX",
  STABLE = "STABLE",
}

/** `required` terms filter candidates; `maybe` terms never exclude one. */
export type JoinTerm<T = unknown> =
  | { readonly mode: "required"; readonly handle: ReadHandle<T> }
  | { readonly mode: "maybe"; readonly handle: ReadHandle<T> };

export const required = <T>(handle: ReadHandle<T>): JoinTerm<T> => ({
  mode: "required",
  handle,
});

export const maybe = <T>(handle: ReadHandle<T>): JoinTerm<T> => ({
  mode: "maybe",
  handle,
});

/**
 * One joined entity. `values[i]` belongs to `terms[i]`: the component
 * value for a required term, the value or null for a maybe term.
 */
export interface JoinRow {
  readonly entity: EntityID;
  readonly values: readonly unknown[];
}

//=========================================================
// Entity creation
//=========================================================

/**
 * Collects components for a new entity. finish() requests write access
 * to all of them as one batch and allocates the entity only once that
 * batch is granted.
 */
export interface EntityBuilder {
  attach<T>(def: ComponentDef<T>, value: T): EntityBuilder;
  finish(): EntityID;
}

//=========================================================
// World
//=========================================================

export interface World {
  readonly join_order: JOIN_ORDER;

  /** Resolve a registered component by its type text. */
  component(type_name: string): ComponentInfo;

  read_storages<const D extends readonly ComponentDef[]>(
    defs: D,
  ): StorageBorrow<ReadHandles<D>>;

  write_storages<const D extends readonly ComponentDef[]>(
    defs: D,
  ): StorageBorrow<WriteHandles<D>>;

  entities(): EntitiesHandle;

  join(
    entities: EntitiesHandle,
    terms: readonly JoinTerm[],
  ): IterableIterator<JoinRow>;

  create_entity(): EntityBuilder;
}
