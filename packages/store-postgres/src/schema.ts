import { boolean, index, integer, pgTable, text, timestamp, uniqueIndex, uuid, varchar } from "drizzle-orm/pg-core";
import type { LicenseStatus } from "@keyturn/engine";

/**
 * Plugins. Written by the admin collaborator; Keyturn only reads them.
 */
export const plugins = pgTable("plugins", {
  id: uuid("id").primaryKey().defaultRandom(),
  slug: varchar("slug", { length: 100 }).notNull().unique(),
  name: varchar("name", { length: 255 }).notNull(),
  stripeAccountId: varchar("stripe_account_id", { length: 255 }),
  oneTimePriceId: varchar("one_time_price_id", { length: 255 }),
  recurringPriceId: varchar("recurring_price_id", { length: 255 }),
  trialPeriodDays: integer("trial_period_days"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export const licenses = pgTable(
  "licenses",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    licenseKey: varchar("license_key", { length: 32 }).notNull(),
    pluginId: uuid("plugin_id")
      .notNull()
      .references(() => plugins.id),
    email: varchar("email", { length: 320 }),
    stripeCustomerId: varchar("stripe_customer_id", { length: 255 }),
    stripeSubscriptionId: varchar("stripe_subscription_id", { length: 255 }),
    stripeCheckoutSessionId: varchar("stripe_checkout_session_id", { length: 255 }),
    status: varchar("status", { length: 20 }).notNull().$type<LicenseStatus>(),
    expiresAt: timestamp("expires_at", { withTimezone: true }),
    terminal: boolean("terminal").notNull().default(false),
    lastEventAt: timestamp("last_event_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    licenseKeyUnique: uniqueIndex("licenses_license_key_key").on(table.licenseKey),
    subscriptionUnique: uniqueIndex("licenses_plugin_subscription_key").on(table.pluginId, table.stripeSubscriptionId),
    checkoutSessionUnique: uniqueIndex("licenses_checkout_session_key").on(table.stripeCheckoutSessionId),
    subscriptionIdx: index("idx_licenses_subscription").on(table.stripeSubscriptionId),
  })
);

/**
 * Processor events already applied, keyed by event id.
 */
export const appliedEvents = pgTable(
  "applied_events",
  {
    eventId: varchar("event_id", { length: 255 }).primaryKey(),
    eventType: varchar("event_type", { length: 100 }).notNull(),
    appliedAt: timestamp("applied_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    appliedAtIdx: index("idx_applied_events_applied_at").on(table.appliedAt),
  })
);

export type PluginRow = typeof plugins.$inferSelect;
export type LicenseRow = typeof licenses.$inferSelect;
export type NewLicenseRow = typeof licenses.$inferInsert;
export type AppliedEventRow = typeof appliedEvents.$inferSelect;
