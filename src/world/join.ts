/***
 *
 * Join - Intersects storage handles over an entity enumeration.
 *
 * Candidates come from the enumeration in its own order. A candidate is
 * emitted when every required term has a value for it; maybe terms
 * contribute their value or null and never exclude anything. Rows are
 * produced lazily, so taking the first row touches no more entities
 * than needed.
 *
 ***/

import type { EntitiesHandle, JoinRow, JoinTerm } from "./world";

export function* join(
  entities: EntitiesHandle,
  terms: readonly JoinTerm[],
): IterableIterator<JoinRow> {
  for (const entity of entities) {
    const values: unknown[] = new Array(terms.length);
    let matched = true;

    for (let i = 0; i < terms.length; i++) {
      const term = terms[i];
      const value = term.handle.get(entity);
      if (value === undefined) {
        if (term.mode === "required") {
          matched = false;
          break;
        }
        values[i] = null;
      } else {
        values[i] = value;
      }
    }

    if (matched) yield { entity, values };
  }
}
