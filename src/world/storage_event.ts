/***
 * StorageEvent - Optional log of component writes in a MemoryWorld.
 *
 * Enabled with `new MemoryWorld({ track_events: true })`. Every insert,
 * overwrite and removal is appended in the order it happened, which
 * makes "was this component ever attached?" an observable question.
 *
 ***/

import type { EntityID } from "../entity/entity";
import type { ComponentID } from "../component/component";

export enum STORAGE_EVENT {
  INSERTED = "INSERTED",
  MODIFIED = "MODIFIED",
  REMOVED = "REMOVED",
}

export interface StorageEvent {
  readonly kind: STORAGE_EVENT;
  readonly component: ComponentID;
  readonly entity: EntityID;
}

export class StorageEventLog {
  private events: StorageEvent[] = [];

  constructor(private readonly enabled: boolean) {}

  push(kind: STORAGE_EVENT, component: ComponentID, entity: EntityID): void {
    if (!this.enabled) return;
    this.events.push({ kind, component, entity });
  }

  /** Return every event recorded since the last drain and forget them. */
  drain(): StorageEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }
}
