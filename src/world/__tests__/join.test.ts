import { describe, expect, it } from "vitest";
import { join } from "../join";
import { maybe, required, type EntitiesHandle, type ReadHandle } from "../world";
import { create_entity_id, type EntityID } from "../../entity/entity";
import type { ComponentDef } from "../../component/component";
import { unsafe_cast } from "type_primitives";

const [a, b, c] = [0, 1, 2].map((index) => create_entity_id(index, 0));

function entities_of(ids: EntityID[]): EntitiesHandle {
  return {
    [Symbol.iterator]: () => ids[Symbol.iterator](),
    is_alive: (entity) => ids.includes(entity),
  };
}

function handle_of<T>(id: number, values: Map<EntityID, T>): ReadHandle<T> {
  return {
    def: unsafe_cast<ComponentDef<T>>(id),
    get: (entity) => values.get(entity),
  };
}

describe("join", () => {
  const names = handle_of(0, new Map([[a, "a"], [b, "b"], [c, "c"]]));
  const speeds = handle_of(1, new Map([[a, 1], [c, 3]]));
  const tags = handle_of(2, new Map([[b, "tagged"]]));

  it("yields only entities present in every required term", () => {
    const rows = [...join(entities_of([a, b, c]), [required(names), required(speeds)])];
    expect(rows).toEqual([
      { entity: a, values: ["a", 1] },
      { entity: c, values: ["c", 3] },
    ]);
  });

  it("fills maybe terms with null instead of filtering", () => {
    const rows = [...join(entities_of([a, b, c]), [required(names), maybe(tags)])];
    expect(rows).toEqual([
      { entity: a, values: ["a", null] },
      { entity: b, values: ["b", "tagged"] },
      { entity: c, values: ["c", null] },
    ]);
  });

  it("follows the enumeration's order", () => {
    const rows = [...join(entities_of([c, a]), [required(speeds)])];
    expect(rows.map((row) => row.entity)).toEqual([c, a]);
  });

  it("yields nothing when a required term never matches", () => {
    const empty = handle_of<number>(3, new Map());
    expect([...join(entities_of([a, b, c]), [required(names), required(empty)])]).toEqual([]);
  });

  it("produces rows lazily", () => {
    const seen: EntityID[] = [];
    const tracking: ReadHandle<string> = {
      def: names.def,
      get: (entity) => {
        seen.push(entity);
        return names.get(entity);
      },
    };

    const rows = join(entities_of([a, b, c]), [required(tracking)]);
    rows.next();

    expect(seen).toEqual([a]);
  });
});
