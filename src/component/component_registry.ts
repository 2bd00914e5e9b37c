/***
 *
 * ComponentRegistry - Names, IDs and clone functions of registered components
 *
 * Components are keyed by the canonical text of their type, so
 * `Vec< u8 >` and `Vec<u8>` name the same component. IDs are handed out
 * sequentially and never reused.
 *
 ***/

import { unsafe_cast } from "type_primitives";
import { parse_type, print_type } from "../type_syntax";
import {
  as_component_id,
  type ComponentDef,
  type ComponentID,
  type ComponentInfo,
  type ComponentOptions,
} from "./component";
import { ECS_ERROR, ECSError } from "utils/error";

const default_clone = <T>(value: T): T => structuredClone(value);

/** Canonical registry key for a type written as text. */
export const canonical_type_name = (type_name: string): string =>
  print_type(parse_type(type_name));

export class ComponentRegistry {
  private infos: ComponentInfo[] = [];
  private by_name: Map<string, ComponentInfo> = new Map();

  //=========================================================
  // Queries
  //=========================================================

  /** Number of registered components. */
  public get count(): number {
    return this.infos.length;
  }

  public has(type_name: string): boolean {
    return this.by_name.has(canonical_type_name(type_name));
  }

  /** Look a component up by type text. Throws if it was never registered. */
  public lookup(type_name: string): ComponentInfo {
    const name = canonical_type_name(type_name);
    const info = this.by_name.get(name);
    if (info === undefined) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_NOT_REGISTERED,
        `component ${name} is not registered`,
        { component: name },
      );
    }
    return info;
  }

  public get(id: ComponentID): ComponentInfo {
    const info = this.infos[id];
    if (info === undefined) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_NOT_REGISTERED,
        `component #${id} is not registered`,
        { component_id: id },
      );
    }
    return info;
  }

  //=========================================================
  // Registration
  //=========================================================

  /**
   * Register a component under its type text.
   *
   * Returns a phantom-typed ComponentDef so that storage handles fetched
   * through it carry T at compile time.
   */
  public register<T>(
    type_name: string,
    options?: ComponentOptions<T>,
  ): ComponentDef<T> {
    const name = canonical_type_name(type_name);
    if (this.by_name.has(name)) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_ALREADY_REGISTERED,
        `component ${name} is already registered`,
        { component: name },
      );
    }

    const def = unsafe_cast<ComponentDef<T>>(as_component_id(this.infos.length));
    const info: ComponentInfo<T> = {
      def,
      name,
      clone: options?.clone ?? default_clone,
    };
    this.infos.push(info);
    this.by_name.set(name, info);
    return def;
  }
}
