import { lt } from "drizzle-orm";
import type { EventLedger } from "@keyturn/engine";
import type { KeyturnExecutor } from "./database.js";
import { appliedEvents } from "./schema.js";

/**
 * Applied-event ledger backed by the `applied_events` primary key. Concurrent
 * inserts of one event id resolve to a single winner inside PostgreSQL; inside
 * a transaction a second insert waits until the first commits or rolls back.
 */
export class PostgresEventLedger implements EventLedger {
  constructor(private db: KeyturnExecutor) {}

  async recordIfNew(eventId: string, eventType: string): Promise<{ firstTime: boolean }> {
    const rows = await this.db
      .insert(appliedEvents)
      .values({ eventId, eventType })
      .onConflictDoNothing({ target: appliedEvents.eventId })
      .returning({ eventId: appliedEvents.eventId });
    return { firstTime: rows.length > 0 };
  }

  async pruneOlderThan(cutoff: Date): Promise<number> {
    const rows = await this.db
      .delete(appliedEvents)
      .where(lt(appliedEvents.appliedAt, cutoff))
      .returning({ eventId: appliedEvents.eventId });
    return rows.length;
  }
}
