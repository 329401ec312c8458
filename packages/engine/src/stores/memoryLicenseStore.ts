import { randomUUID } from "crypto";
import type {
  InsertResult,
  License,
  LicensePatch,
  LicenseStore,
  NewLicense,
  UpdateGuard,
} from "../types.js";

/**
 * In-memory license table with the same unique constraints and update guard
 * as the PostgreSQL store.
 */
export class MemoryLicenseStore implements LicenseStore {
  private rows = new Map<string, License>();
  private now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async findBySubscriptionId(subscriptionId: string): Promise<License | null> {
    return this.find((l) => l.stripeSubscriptionId === subscriptionId);
  }

  async findByCheckoutSessionId(sessionId: string): Promise<License | null> {
    return this.find((l) => l.stripeCheckoutSessionId === sessionId);
  }

  async findByKey(pluginId: string, licenseKey: string): Promise<License | null> {
    return this.find((l) => l.pluginId === pluginId && l.licenseKey === licenseKey);
  }

  async insert(input: NewLicense): Promise<InsertResult> {
    for (const row of this.rows.values()) {
      if (row.licenseKey === input.licenseKey) {
        return { inserted: false, conflict: "license_key" };
      }
      if (
        input.stripeSubscriptionId !== null &&
        row.pluginId === input.pluginId &&
        row.stripeSubscriptionId === input.stripeSubscriptionId
      ) {
        return { inserted: false, conflict: "subscription" };
      }
      if (input.stripeCheckoutSessionId !== null && row.stripeCheckoutSessionId === input.stripeCheckoutSessionId) {
        return { inserted: false, conflict: "checkout_session" };
      }
    }

    const now = this.now();
    const license: License = { ...input, id: randomUUID(), createdAt: now, updatedAt: now };
    this.rows.set(license.id, license);
    return { inserted: true, license: { ...license } };
  }

  async update(id: string, patch: LicensePatch, guard: UpdateGuard): Promise<License | null> {
    const row = this.rows.get(id);
    if (!row) return null;
    if (row.terminal) return null;
    if (row.lastEventAt && row.lastEventAt.getTime() > guard.eventAt.getTime()) return null;

    const updated: License = {
      ...row,
      status: patch.status,
      expiresAt: patch.expiresAt === undefined ? row.expiresAt : patch.expiresAt,
      terminal: patch.terminal ?? row.terminal,
      lastEventAt: guard.eventAt,
      updatedAt: this.now(),
    };
    this.rows.set(id, updated);
    return { ...updated };
  }

  /** All rows, oldest first. */
  list(): License[] {
    return [...this.rows.values()].map((l) => ({ ...l }));
  }

  private find(predicate: (license: License) => boolean): License | null {
    for (const row of this.rows.values()) {
      if (predicate(row)) return { ...row };
    }
    return null;
  }
}
