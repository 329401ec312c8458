import type { EventLedger } from "../types.js";

export class MemoryEventLedger implements EventLedger {
  private applied = new Map<string, { eventType: string; appliedAt: Date }>();

  constructor(private now: () => Date = () => new Date()) {}

  async recordIfNew(eventId: string, eventType: string): Promise<{ firstTime: boolean }> {
    if (this.applied.has(eventId)) return { firstTime: false };
    this.applied.set(eventId, { eventType, appliedAt: this.now() });
    return { firstTime: true };
  }

  /** Drop a claim. Used to roll back a failed unit of work. */
  forget(eventId: string): void {
    this.applied.delete(eventId);
  }

  async pruneOlderThan(cutoff: Date): Promise<number> {
    let removed = 0;
    for (const [eventId, record] of this.applied) {
      if (record.appliedAt.getTime() < cutoff.getTime()) {
        this.applied.delete(eventId);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.applied.size;
  }
}
