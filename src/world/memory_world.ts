/***
 * MemoryWorld - In-process World backed by one sparse storage per component.
 *
 * Implements the World contract for applications and tests:
 *
 *   const world = new MemoryWorld();
 *   const Pos = world.register_component<Position>("Position");
 *
 *   const e = world.create_entity().attach(Pos, { x: 0, y: 0 }).finish();
 *   world.get(Pos, e); // { x: 0, y: 0 }
 *
 * Borrow bookkeeping is kept per ComponentID: any number of readers or
 * a single writer. A batch is checked as a whole before any of it is
 * granted, so a conflicting request fails immediately and leaves the
 * bookkeeping untouched.
 *
 * Entity builders buffer their components and write them in a single
 * batch on finish(), so a refused batch allocates no entity.
 *
 * Joins walk live entities in ascending slot index order.
 *
 ***/

import { EntityRegistry } from "../entity/entity_registry";
import { format_entity, type EntityID } from "../entity/entity";
import { ComponentRegistry } from "../component/component_registry";
import type {
  ComponentDef,
  ComponentID,
  ComponentInfo,
  ComponentOptions,
} from "../component/component";
import { ComponentStorage } from "../storage/component_storage";
import { join } from "./join";
import {
  JOIN_ORDER,
  type EntitiesHandle,
  type EntityBuilder,
  type JoinRow,
  type JoinTerm,
  type ReadHandle,
  type ReadHandles,
  type StorageBorrow,
  type World,
  type WriteHandle,
  type WriteHandles,
} from "./world";
import {
  STORAGE_EVENT,
  StorageEventLog,
  type StorageEvent,
} from "./storage_event";
import {
  ECS_ERROR,
  ECSError,
  STORAGE_ERROR,
  StorageError,
} from "utils/error";
import {
  DEFAULT_STORAGE_CAPACITY,
  DEFAULT_TRACK_EVENTS,
} from "utils/constants";
import {
  err,
  is_non_negative_integer,
  OK_VOID,
  unsafe_cast,
  validate_and_cast,
  type Result,
} from "type_primitives";

export interface WorldOptions {
  /** Initial slot capacity of the entity registry and each storage. */
  initial_capacity?: number;
  /** Record every component insert, overwrite and removal. */
  track_events?: boolean;
}

//=========================================================
// Borrow leases
//=========================================================

interface Lease {
  active: boolean;
}

function check_lease(lease: Lease): void {
  if (!lease.active) {
    throw new ECSError(
      ECS_ERROR.BORROW_ALREADY_RELEASED,
      "storage handle used after its borrow was released",
    );
  }
}

class MemoryReadHandle<T> implements ReadHandle<T> {
  constructor(
    public readonly def: ComponentDef<T>,
    protected readonly storage: ComponentStorage<T>,
    protected readonly lease: Lease,
  ) {}

  get(entity: EntityID): T | undefined {
    check_lease(this.lease);
    return this.storage.get(entity);
  }
}

class MemoryWriteHandle<T> extends MemoryReadHandle<T> implements WriteHandle<T> {
  constructor(
    def: ComponentDef<T>,
    storage: ComponentStorage<T>,
    lease: Lease,
    private readonly world: MemoryWorld,
    private readonly events: StorageEventLog,
  ) {
    super(def, storage, lease);
  }

  insert(entity: EntityID, value: T): Result<void, StorageError> {
    check_lease(this.lease);
    if (!this.world.is_alive(entity)) {
      return err(
        new StorageError(
          STORAGE_ERROR.ENTITY_NOT_ALIVE,
          `entity ${format_entity(entity)} is not alive`,
          { entity },
        ),
      );
    }
    const existed = this.storage.set(entity, value);
    this.events.push(
      existed ? STORAGE_EVENT.MODIFIED : STORAGE_EVENT.INSERTED,
      this.def,
      entity,
    );
    return OK_VOID;
  }

  remove(entity: EntityID): T | undefined {
    check_lease(this.lease);
    const value = this.storage.take(entity);
    if (value !== undefined) {
      this.events.push(STORAGE_EVENT.REMOVED, this.def, entity);
    }
    return value;
  }
}

//=========================================================
// Entity builder
//=========================================================

class MemoryEntityBuilder implements EntityBuilder {
  // Keyed by component; a repeated attach replaces the pending value
  private readonly pending = new Map<ComponentDef, unknown>();
  private finished = false;

  constructor(private readonly world: MemoryWorld) {}

  attach<T>(def: ComponentDef<T>, value: T): EntityBuilder {
    this.check_open();
    this.pending.set(def, value);
    return this;
  }

  finish(): EntityID {
    this.check_open();
    this.finished = true;
    return this.world.spawn(this.pending);
  }

  private check_open(): void {
    if (this.finished) {
      throw new ECSError(ECS_ERROR.ENTITY_BUILDER_FINISHED, undefined, {
        pending: this.pending.size,
      });
    }
  }
}

//=========================================================
// MemoryWorld
//=========================================================

export class MemoryWorld implements World {
  public readonly join_order = JOIN_ORDER.ENTITY_INDEX;

  private readonly entity_registry: EntityRegistry;
  private readonly component_registry = new ComponentRegistry();
  private readonly storages: ComponentStorage<unknown>[] = [];
  private readonly events: StorageEventLog;
  private readonly initial_capacity: number;

  // Indexed by ComponentID
  private readonly readers: number[] = [];
  private readonly writers: boolean[] = [];

  constructor(options?: WorldOptions) {
    this.initial_capacity = validate_and_cast(
      options?.initial_capacity ?? DEFAULT_STORAGE_CAPACITY,
      is_non_negative_integer,
      "initial_capacity must be a non-negative integer",
    );
    this.entity_registry = new EntityRegistry(this.initial_capacity);
    this.events = new StorageEventLog(options?.track_events ?? DEFAULT_TRACK_EVENTS);
  }

  //=========================================================
  // Components
  //=========================================================

  public register_component<T>(
    type_name: string,
    options?: ComponentOptions<T>,
  ): ComponentDef<T> {
    const def = this.component_registry.register(type_name, options);
    this.storages.push(new ComponentStorage<unknown>(this.initial_capacity));
    this.readers.push(0);
    this.writers.push(false);
    return def;
  }

  public component(type_name: string): ComponentInfo {
    return this.component_registry.lookup(type_name);
  }

  public get component_count(): number {
    return this.component_registry.count;
  }

  //=========================================================
  // Entities
  //=========================================================

  /** Nothing is allocated until finish() is granted its write batch. */
  public create_entity(): EntityBuilder {
    return new MemoryEntityBuilder(this);
  }

  /**
   * Allocate an entity holding `components`, written in insertion order
   * under one write batch. Throws STORAGE_BORROW_CONFLICT before
   * allocating when any of them is borrowed.
   */
  public spawn(components: ReadonlyMap<ComponentDef, unknown>): EntityID {
    const borrow = this.write_storages([...components.keys()]);
    try {
      const entity = this.entity_registry.create_entity();
      let i = 0;
      for (const value of components.values()) {
        const res = borrow.handles[i++].insert(entity, value);
        if (!res.ok) {
          throw new ECSError(ECS_ERROR.ENTITY_NOT_ALIVE, res.error.message, {
            entity,
          });
        }
      }
      return entity;
    } finally {
      borrow.release();
    }
  }

  /** Destroy an entity and drop every component attached to it. */
  public destroy_entity(entity: EntityID): void {
    if (!this.entity_registry.is_alive(entity)) {
      throw new ECSError(
        ECS_ERROR.ENTITY_CANT_DESTROY_DEAD,
        `entity ${format_entity(entity)} is not alive`,
        { entity },
      );
    }
    const all = this.storages.map((_, id) => this.def_at(id));
    const borrow = this.write_storages(all);
    try {
      for (const handle of borrow.handles) handle.remove(entity);
    } finally {
      borrow.release();
    }
    this.entity_registry.destroy(entity);
  }

  public is_alive(entity: EntityID): boolean {
    return this.entity_registry.is_alive(entity);
  }

  public get entity_count(): number {
    return this.entity_registry.count;
  }

  public entities(): EntitiesHandle {
    const registry = this.entity_registry;
    return {
      [Symbol.iterator]: () => registry.alive(),
      is_alive: (entity) => registry.is_alive(entity),
    };
  }

  //=========================================================
  // Direct component access
  //=========================================================

  public get<T>(def: ComponentDef<T>, entity: EntityID): T | undefined {
    const borrow = this.read_storages([def] as const);
    try {
      return borrow.handles[0].get(entity);
    } finally {
      borrow.release();
    }
  }

  public has(def: ComponentDef, entity: EntityID): boolean {
    return this.get(def, entity) !== undefined;
  }

  /** Insert or overwrite. Throws for dead entities. */
  public insert<T>(def: ComponentDef<T>, entity: EntityID, value: T): void {
    const borrow = this.write_storages([def] as const);
    try {
      const res = borrow.handles[0].insert(entity, value);
      if (!res.ok) {
        throw new ECSError(ECS_ERROR.ENTITY_NOT_ALIVE, res.error.message, {
          entity,
        });
      }
    } finally {
      borrow.release();
    }
  }

  public remove_component<T>(def: ComponentDef<T>, entity: EntityID): T | undefined {
    const borrow = this.write_storages([def] as const);
    try {
      return borrow.handles[0].remove(entity);
    } finally {
      borrow.release();
    }
  }

  //=========================================================
  // Storage borrows
  //=========================================================

  public read_storages<const D extends readonly ComponentDef[]>(
    defs: D,
  ): StorageBorrow<ReadHandles<D>> {
    const lease = this.acquire(defs, []);
    const handles = defs.map(
      (def) => new MemoryReadHandle<unknown>(def, this.storage_at(def), lease),
    );
    return this.borrow(lease, defs, [], unsafe_cast<ReadHandles<D>>(handles));
  }

  public write_storages<const D extends readonly ComponentDef[]>(
    defs: D,
  ): StorageBorrow<WriteHandles<D>> {
    const lease = this.acquire([], defs);
    const handles = defs.map(
      (def) =>
        new MemoryWriteHandle<unknown>(
          def,
          this.storage_at(def),
          lease,
          this,
          this.events,
        ),
    );
    return this.borrow(lease, [], defs, unsafe_cast<WriteHandles<D>>(handles));
  }

  /** True while any handle on this component is outstanding. */
  public is_borrowed(def: ComponentDef): boolean {
    return this.readers[def] > 0 || this.writers[def] === true;
  }

  //=========================================================
  // Join
  //=========================================================

  public join(
    entities: EntitiesHandle,
    terms: readonly JoinTerm[],
  ): IterableIterator<JoinRow> {
    return join(entities, terms);
  }

  //=========================================================
  // Events
  //=========================================================

  public drain_events(): StorageEvent[] {
    return this.events.drain();
  }

  //=========================================================
  // Internal
  //=========================================================

  private storage_at(def: ComponentDef): ComponentStorage<unknown> {
    const storage = this.storages[def];
    if (storage === undefined) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_NOT_REGISTERED,
        `component #${def} is not registered`,
        { component_id: def },
      );
    }
    return storage;
  }

  private def_at(id: number): ComponentDef {
    return this.component_registry.get(unsafe_cast<ComponentID>(id)).def;
  }

  /** Validate a whole batch, then grant it. Nothing is granted on conflict. */
  private acquire(
    reads: readonly ComponentDef[],
    writes: readonly ComponentDef[],
  ): Lease {
    const writing = new Set<number>();
    for (const def of writes) {
      this.storage_at(def);
      if (writing.has(def) || this.is_borrowed(def)) {
        throw this.conflict(def, "write");
      }
      writing.add(def);
    }
    for (const def of reads) {
      this.storage_at(def);
      if (this.writers[def]) throw this.conflict(def, "read");
    }

    for (const def of reads) this.readers[def]++;
    for (const def of writes) this.writers[def] = true;
    return { active: true };
  }

  private borrow<H>(
    lease: Lease,
    reads: readonly ComponentDef[],
    writes: readonly ComponentDef[],
    handles: H,
  ): StorageBorrow<H> {
    return {
      handles,
      release: () => {
        if (!lease.active) return;
        lease.active = false;
        for (const def of reads) this.readers[def]--;
        for (const def of writes) this.writers[def] = false;
      },
    };
  }

  private conflict(def: ComponentDef, access: "read" | "write"): ECSError {
    const name = this.component_registry.get(def).name;
    return new ECSError(
      ECS_ERROR.STORAGE_BORROW_CONFLICT,
      `cannot borrow ${name} for ${access}: it is already borrowed`,
      { component: name, access },
    );
  }
}
