/***
 *
 * EntityRegistry - Allocates, recycles and enumerates generational entity IDs.
 *
 * Enumeration walks slots in ascending index order, which is the order
 * every World join inherits. The order is stable for as long as no
 * entity is created or destroyed.
 *
 ***/

import {
  type EntityID,
  MAX_GENERATION,
  get_entity_generation,
  create_entity_id,
  get_entity_index,
} from "./entity";
import { ECS_ERROR, ECSError } from "utils/error";
import {
  DEFAULT_ENTITY_CAPACITY,
  GROWTH_FACTOR,
  INITIAL_GENERATION,
} from "utils/constants";

export class EntityRegistry {
  private generations: number[];
  private live: boolean[];
  private high_water = 0;
  private free_indices: number[] = [];
  private alive_count = 0;

  constructor(initial_capacity = DEFAULT_ENTITY_CAPACITY) {
    this.generations = new Array(initial_capacity).fill(INITIAL_GENERATION);
    this.live = new Array(initial_capacity).fill(false);
  }

  //=========================================================
  // Queries
  //=========================================================

  /** Number of entities currently alive. */
  public get count(): number {
    return this.alive_count;
  }

  /**
   * Check whether an ID refers to a living entity.
   *
   * The index must fall within the allocated range, the slot must be
   * occupied, and the generation baked into the ID must match the
   * slot's current generation. A recycled slot has a bumped
   * generation, so stale IDs fail the last check.
   */
  public is_alive(id: EntityID): boolean {
    const index = get_entity_index(id);
    return (
      index < this.high_water &&
      this.live[index] &&
      this.generations[index] === get_entity_generation(id)
    );
  }

  /** Live entities in ascending slot index order. */
  public *alive(): IterableIterator<EntityID> {
    for (let index = 0; index < this.high_water; index++) {
      if (this.live[index]) {
        yield create_entity_id(index, this.generations[index]);
      }
    }
  }

  //=========================================================
  // Mutations
  //=========================================================

  /**
   * Allocate a new entity.
   *
   * Recycled slots are reused first (their generation was bumped
   * during destroy). Otherwise the high-water mark advances and the
   * fresh slot starts at the initial generation.
   */
  public create_entity(): EntityID {
    let index: number;

    const recycled = this.free_indices.pop();
    if (recycled !== undefined) {
      index = recycled;
    } else {
      index = this.high_water++;
      if (index >= this.generations.length) {
        this.grow(index + 1);
      }
      this.generations[index] = INITIAL_GENERATION;
    }

    this.live[index] = true;
    this.alive_count++;
    return create_entity_id(index, this.generations[index]);
  }

  /**
   * Destroy a living entity.
   *
   * Bumps the slot generation (wrapping at MAX_GENERATION) so the old
   * ID goes stale, then queues the slot for reuse. Destroying a dead
   * ID is a logic error.
   */
  public destroy(id: EntityID): void {
    if (!this.is_alive(id)) {
      throw new ECSError(ECS_ERROR.ENTITY_CANT_DESTROY_DEAD, undefined, {
        entity: id,
      });
    }

    const index = get_entity_index(id);
    this.generations[index] = (get_entity_generation(id) + 1) & MAX_GENERATION;
    this.live[index] = false;
    this.free_indices.push(index);
    this.alive_count--;
  }

  //=========================================================
  // Internal
  //=========================================================

  private grow(min_capacity: number): void {
    let cap = this.generations.length || 1;
    while (cap < min_capacity) cap *= GROWTH_FACTOR;
    const generations = new Array(cap).fill(INITIAL_GENERATION);
    const live = new Array(cap).fill(false);
    for (let i = 0; i < this.generations.length; i++) {
      generations[i] = this.generations[i];
      live[i] = this.live[i];
    }
    this.generations = generations;
    this.live = live;
  }
}
