import { eq } from "drizzle-orm";
import type { Plugin, PluginDirectory } from "@keyturn/engine";
import type { KeyturnExecutor } from "./database.js";
import { plugins, type PluginRow } from "./schema.js";

export function toPlugin(row: PluginRow): Plugin {
  return {
    id: row.id,
    slug: row.slug,
    name: row.name,
    stripeAccountId: row.stripeAccountId,
    oneTimePriceId: row.oneTimePriceId,
    recurringPriceId: row.recurringPriceId,
    trialPeriodDays: row.trialPeriodDays,
  };
}

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export class PostgresPluginDirectory implements PluginDirectory {
  constructor(private db: KeyturnExecutor) {}

  /** Ids that are not UUIDs match no row; PostgreSQL would reject them. */
  async findById(id: string): Promise<Plugin | null> {
    if (!UUID.test(id)) return null;
    const rows = await this.db.select().from(plugins).where(eq(plugins.id, id)).limit(1);
    return rows.length > 0 ? toPlugin(rows[0]) : null;
  }

  async findBySlug(slug: string): Promise<Plugin | null> {
    const rows = await this.db.select().from(plugins).where(eq(plugins.slug, slug)).limit(1);
    return rows.length > 0 ? toPlugin(rows[0]) : null;
  }
}
