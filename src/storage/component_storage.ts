/***
 *
 * ComponentStorage - Entity-keyed sparse storage for one component type
 *
 * Two parallel dense arrays (owning entity, value) keep the members
 * packed for iteration. A sparse Int32Array maps entity index → dense
 * row for O(1) get/set/take. Removal swaps the last row into the hole.
 *
 * Rows remember the full EntityID they were written for, so a stale ID
 * whose slot has been recycled never reads the new occupant's value.
 *
 ***/

import { get_entity_index, type EntityID } from "../entity/entity";
import {
  ABSENT,
  DEFAULT_STORAGE_CAPACITY,
  GROWTH_FACTOR,
} from "utils/constants";

export class ComponentStorage<T> {
  private dense_entities: EntityID[] = [];
  private dense_values: T[] = [];
  private sparse: Int32Array;
  private capacity: number;

  constructor(initial_capacity = DEFAULT_STORAGE_CAPACITY) {
    this.capacity = Math.max(initial_capacity, 1);
    this.sparse = new Int32Array(this.capacity).fill(ABSENT);
  }

  get size(): number {
    return this.dense_entities.length;
  }

  has(entity: EntityID): boolean {
    return this.row_of(entity) !== ABSENT;
  }

  get(entity: EntityID): T | undefined {
    const row = this.row_of(entity);
    return row === ABSENT ? undefined : this.dense_values[row];
  }

  /**
   * Insert or overwrite the value for an entity.
   * Returns true when a value was already present.
   */
  set(entity: EntityID, value: T): boolean {
    const row = this.row_of(entity);
    if (row !== ABSENT) {
      this.dense_values[row] = value;
      return true;
    }
    const index = get_entity_index(entity);
    this.ensure(index);
    // A stale row for an older generation of this slot is replaced
    const stale = this.sparse[index];
    if (stale !== ABSENT) this.remove_row(stale);
    this.sparse[index] = this.dense_entities.length;
    this.dense_entities.push(entity);
    this.dense_values.push(value);
    return false;
  }

  /** Remove and return the value for an entity, or undefined if absent. */
  take(entity: EntityID): T | undefined {
    const row = this.row_of(entity);
    if (row === ABSENT) return undefined;
    const value = this.dense_values[row];
    this.remove_row(row);
    return value;
  }

  //=========================================================
  // Internal
  //=========================================================

  private row_of(entity: EntityID): number {
    const index = get_entity_index(entity);
    if (index >= this.capacity) return ABSENT;
    const row = this.sparse[index];
    if (row === ABSENT || this.dense_entities[row] !== entity) return ABSENT;
    return row;
  }

  private remove_row(row: number): void {
    const last = this.dense_entities.length - 1;
    const removed = this.dense_entities[row];
    if (row !== last) {
      const moved = this.dense_entities[last];
      this.dense_entities[row] = moved;
      this.dense_values[row] = this.dense_values[last];
      this.sparse[get_entity_index(moved)] = row;
    }
    this.dense_entities.pop();
    this.dense_values.pop();
    this.sparse[get_entity_index(removed)] = ABSENT;
  }

  private ensure(index: number): void {
    if (index < this.capacity) return;
    let cap = this.capacity;
    while (cap <= index) cap *= GROWTH_FACTOR;
    const next = new Int32Array(cap).fill(ABSENT);
    next.set(this.sparse);
    this.sparse = next;
    this.capacity = cap;
  }
}
