import { MIN_TIMESTAMP, type Location, type LogEntry, type Timestamp } from "./parser.js";

export type EntityState = {
  name: string;
  online: boolean;
  lastSeen: Timestamp;
  lastLocation: Location;
};

export type EntityView = Readonly<{
  name: string;
  online: boolean;
  lastSeen: Timestamp;
  lastLocation: Readonly<Location>;
}>;

/**
 * Read-only view of entity state for collaborators that render it.
 */
export type PresenceQuery = {
  listEntities: () => EntityView[];
  getEntity: (name: string) => EntityView | undefined;
  onlineCount: () => number;
};

function toView(state: EntityState): EntityView {
  return {
    name: state.name,
    online: state.online,
    lastSeen: state.lastSeen,
    lastLocation: { ...state.lastLocation },
  };
}

/**
 * In-memory entity state. Updates are accepted only when strictly newer than
 * the entity's lastSeen, so replaying or re-reading events in any order
 * converges to the same state.
 *
 * Mutated only by history replay and the reconciliation loop.
 */
export class EntityStateStore implements PresenceQuery {
  private readonly entities = new Map<string, EntityState>();

  getOrCreate(name: string): EntityState {
    let state = this.entities.get(name);
    if (!state) {
      state = { name, online: false, lastSeen: MIN_TIMESTAMP, lastLocation: { x: 0, y: 0 } };
      this.entities.set(name, state);
    }
    return state;
  }

  applyConnected(name: string, timestamp: Timestamp, location: Location): boolean {
    return this.update(name, timestamp, location, true);
  }

  applyDisconnected(name: string, timestamp: Timestamp, location: Location): boolean {
    return this.update(name, timestamp, location, false);
  }

  /**
   * Applies a parsed entry. Returns false for stale events and for entries
   * that carry no presence change.
   */
  apply(entry: LogEntry): boolean {
    switch (entry.event.kind) {
      case "connected":
        return this.applyConnected(entry.event.name, entry.timestamp, entry.event.location);
      case "disconnected":
        return this.applyDisconnected(entry.event.name, entry.timestamp, entry.event.location);
      case "other":
        return false;
    }
  }

  onlineCount(): number {
    let count = 0;
    for (const state of this.entities.values()) {
      if (state.online) {
        count += 1;
      }
    }
    return count;
  }

  listEntities(): EntityView[] {
    return Array.from(this.entities.values(), toView);
  }

  getEntity(name: string): EntityView | undefined {
    const state = this.entities.get(name);
    return state ? toView(state) : undefined;
  }

  get size(): number {
    return this.entities.size;
  }

  private update(name: string, timestamp: Timestamp, location: Location, online: boolean): boolean {
    const state = this.getOrCreate(name);
    if (timestamp <= state.lastSeen) {
      return false;
    }
    state.online = online;
    state.lastSeen = timestamp;
    state.lastLocation = { x: location.x, y: location.y };
    return true;
  }
}
