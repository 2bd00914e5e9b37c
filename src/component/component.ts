/***
 *
 * Component - Phantom-typed handles for component storages.
 *
 * Components are registered with a World under the canonical text of
 * their type (`Position`, `Vec<u8>`). A ComponentDef<T> is just a
 * ComponentID (number) at runtime; the generic T is erased but carried
 * at compile time, so handles fetched through it are typed without
 * casts at the call site.
 *
 ***/

import {
  type Brand,
  validate_and_cast,
  is_non_negative_integer,
} from "type_primitives";

//=========================================================
// ComponentID
//=========================================================
export type ComponentID = Brand<number, "component_id">;
export const as_component_id = (value: number) =>
  validate_and_cast<number, ComponentID>(
    value,
    is_non_negative_integer,
    "ComponentID must be a non-negative integer",
  );

//=========================================================
// ComponentDef<T> - phantom-typed component handle
//=========================================================

// Never exists at runtime; gives ComponentDef<Position> and
// ComponentDef<Health> distinct types even though both are numbers.
declare const __value: unique symbol;

export type ComponentDef<T = unknown> = ComponentID & {
  readonly [__value]: T;
};

/** The value type a ComponentDef stands for. */
export type ComponentValue<D> = D extends ComponentDef<infer T> ? T : never;

//=========================================================
// Registration metadata
//=========================================================

export type CloneFn<T> = (value: T) => T;

export interface ComponentOptions<T> {
  /**
   * Copies a stored value when a group reads it out of the World.
   * Defaults to structuredClone, which drops class prototypes; pass
   * a clone for class-based components.
   */
  readonly clone?: CloneFn<T>;
}

export interface ComponentInfo<T = unknown> {
  readonly def: ComponentDef<T>;
  /** Canonical type text the component was registered under. */
  readonly name: string;
  clone(value: T): T;
}
