import { and, eq, isNull, lte, or } from "drizzle-orm";
import type {
  InsertResult,
  License,
  LicensePatch,
  LicenseStore,
  NewLicense,
  UpdateGuard,
} from "@keyturn/engine";
import { licenseConflictFrom } from "./conflicts.js";
import type { KeyturnExecutor } from "./database.js";
import { licenses, type LicenseRow, type NewLicenseRow } from "./schema.js";

export function toLicense(row: LicenseRow): License {
  return {
    id: row.id,
    licenseKey: row.licenseKey,
    pluginId: row.pluginId,
    email: row.email,
    stripeCustomerId: row.stripeCustomerId,
    stripeSubscriptionId: row.stripeSubscriptionId,
    stripeCheckoutSessionId: row.stripeCheckoutSessionId,
    status: row.status,
    expiresAt: row.expiresAt,
    terminal: row.terminal,
    lastEventAt: row.lastEventAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Column values for a guarded update. `expiresAt` and `terminal` are only
 * written when the patch carries them.
 */
export function updateValues(patch: LicensePatch, guard: UpdateGuard, now: Date): Partial<NewLicenseRow> {
  const values: Partial<NewLicenseRow> = {
    status: patch.status,
    lastEventAt: guard.eventAt,
    updatedAt: now,
  };
  if (patch.expiresAt !== undefined) values.expiresAt = patch.expiresAt;
  if (patch.terminal !== undefined) values.terminal = patch.terminal;
  return values;
}

export class PostgresLicenseStore implements LicenseStore {
  constructor(private db: KeyturnExecutor) {}

  async findBySubscriptionId(subscriptionId: string): Promise<License | null> {
    const rows = await this.db
      .select()
      .from(licenses)
      .where(eq(licenses.stripeSubscriptionId, subscriptionId))
      .limit(1);
    return rows.length > 0 ? toLicense(rows[0]) : null;
  }

  async findByCheckoutSessionId(sessionId: string): Promise<License | null> {
    const rows = await this.db
      .select()
      .from(licenses)
      .where(eq(licenses.stripeCheckoutSessionId, sessionId))
      .limit(1);
    return rows.length > 0 ? toLicense(rows[0]) : null;
  }

  async findByKey(pluginId: string, licenseKey: string): Promise<License | null> {
    const rows = await this.db
      .select()
      .from(licenses)
      .where(and(eq(licenses.pluginId, pluginId), eq(licenses.licenseKey, licenseKey)))
      .limit(1);
    return rows.length > 0 ? toLicense(rows[0]) : null;
  }

  /**
   * Runs in its own savepoint when called inside a transaction, so a unique
   * violation leaves the surrounding transaction usable for a retry.
   */
  async insert(license: NewLicense): Promise<InsertResult> {
    try {
      const rows = await this.db.transaction(async (tx) => tx.insert(licenses).values(license).returning());
      return { inserted: true, license: toLicense(rows[0]) };
    } catch (error) {
      const conflict = licenseConflictFrom(error);
      if (conflict) return { inserted: false, conflict };
      throw error;
    }
  }

  /**
   * Single conditional UPDATE: the row changes only if it is not terminal and
   * no newer event has been applied to it.
   */
  async update(id: string, patch: LicensePatch, guard: UpdateGuard): Promise<License | null> {
    const rows = await this.db
      .update(licenses)
      .set(updateValues(patch, guard, new Date()))
      .where(
        and(
          eq(licenses.id, id),
          eq(licenses.terminal, false),
          or(isNull(licenses.lastEventAt), lte(licenses.lastEventAt, guard.eventAt))
        )
      )
      .returning();
    return rows.length > 0 ? toLicense(rows[0]) : null;
  }
}
