import { Table } from '../game/Table';
import { getRule } from '../rules/RuleRegistry';

export class RoomManager {
  private rooms = new Map<string, Table>();

  constructor(private ttlMs: number) {}

  /** Existing room, or a new one on the given rule preset. */
  get(roomId: string, ruleId?: string | null): Table {
    let t = this.rooms.get(roomId);
    if (!t) {
      t = new Table(getRule(ruleId));
      this.rooms.set(roomId, t);
    }
    return t;
  }

  has(roomId: string): boolean {
    return this.rooms.has(roomId);
  }

  get size(): number {
    return this.rooms.size;
  }

  /** Drops rooms idle for longer than the TTL; returns how many went. */
  cleanup(now: number = Date.now()): number {
    let removed = 0;
    for (const [id, table] of this.rooms.entries()) {
      if (now - table.lastActiveMs > this.ttlMs) {
        this.rooms.delete(id);
        removed++;
      }
    }
    return removed;
  }
}
