/***
 * Entity - Packed generational ID (20-bit index | 12-bit generation).
 *
 * The low 20 bits hold the slot index (max ~1M live entities), the high
 * 12 bits the slot's generation (max 4095). Destroying an entity bumps
 * its slot's generation, so an old ID still pointing at a recycled slot
 * is recognised as dead by comparing generations.
 *
 * Layout: [generation:12][index:20]
 *
 *   create_entity_id(index, gen) → (gen << 20) | index
 *   get_entity_index(id)         → id & 0xFFFFF
 *   get_entity_generation(id)    → (id >>> 20) & 0xFFF
 *
 ***/

import { type Brand, unsafe_cast } from "type_primitives";
import { ECS_ERROR, ECSError } from "utils/error";

export type EntityID = Brand<number, "entity_id">;

export const INDEX_BITS = 20;
export const INDEX_MASK = (1 << INDEX_BITS) - 1; // 0xFFFFF
export const MAX_INDEX = INDEX_MASK; // 1,048,575
export const MAX_GENERATION = (1 << (32 - INDEX_BITS)) - 1; // 0xFFF (4095)

export const create_entity_id = (
  index: number,
  generation: number,
): EntityID => {
  if (__DEV__) {
    if (index < 0 || index > MAX_INDEX) {
      throw new ECSError(ECS_ERROR.EID_MAX_INDEX_OVERFLOW, undefined, {
        index,
      });
    }

    if (generation < 0 || generation > MAX_GENERATION) {
      throw new ECSError(ECS_ERROR.EID_MAX_GEN_OVERFLOW, undefined, {
        generation,
      });
    }
  }
  // >>> 0 keeps the result unsigned when the generation reaches the sign bit
  return unsafe_cast<EntityID>(((generation << INDEX_BITS) | index) >>> 0);
};

export const get_entity_index = (id: EntityID): number => id & INDEX_MASK;

export const get_entity_generation = (id: EntityID): number =>
  (id >>> INDEX_BITS) & MAX_GENERATION;

/** Human-readable form used in diagnostics: `index@generation`. */
export const format_entity = (id: EntityID): string =>
  `${get_entity_index(id)}@${get_entity_generation(id)}`;
