import type { BaseLogger } from "pino";

export type LicenseStatus = "active" | "trial" | "inactive" | "expired" | "canceled";

export const LICENSE_STATUSES: readonly LicenseStatus[] = ["active", "trial", "inactive", "expired", "canceled"];

export type PlanType = "one_time" | "subscription";

/**
 * A plugin record. Owned by the admin collaborator; read-only here.
 */
export interface Plugin {
  id: string;
  /** Immutable, URL-safe, unique. */
  slug: string;
  name: string;
  /** Connected Stripe account that owns the plugin's prices. */
  stripeAccountId?: string | null;
  oneTimePriceId?: string | null;
  recurringPriceId?: string | null;
  trialPeriodDays?: number | null;
}

export interface License {
  id: string;
  licenseKey: string;
  pluginId: string;
  email: string | null;
  stripeCustomerId: string | null;
  stripeSubscriptionId: string | null;
  stripeCheckoutSessionId: string | null;
  status: LicenseStatus;
  expiresAt: Date | null;
  /** Set once the subscription is gone for good. No later event moves the license. */
  terminal: boolean;
  /** Processor `created` time of the last event applied to this row. */
  lastEventAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewLicense = Omit<License, "id" | "createdAt" | "updatedAt">;

export interface LicensePatch {
  status: LicenseStatus;
  /** Omitted means unchanged. */
  expiresAt?: Date | null;
  /** Omitted means unchanged. */
  terminal?: boolean;
}

/**
 * Condition the row must still satisfy when an update is committed: it is not
 * terminal and no event newer than `eventAt` has been applied to it.
 */
export interface UpdateGuard {
  eventAt: Date;
}

/** Which unique constraint an insert ran into. */
export type LicenseConflict = "license_key" | "subscription" | "checkout_session";

export type InsertResult =
  | { inserted: true; license: License }
  | { inserted: false; conflict: LicenseConflict };

/**
 * The persisted license table; the only place state transitions are committed.
 */
export interface LicenseStore {
  findBySubscriptionId(subscriptionId: string): Promise<License | null>;
  findByCheckoutSessionId(sessionId: string): Promise<License | null>;
  /** Scoped lookup; keys issued by other plugins are invisible. */
  findByKey(pluginId: string, licenseKey: string): Promise<License | null>;
  insert(license: NewLicense): Promise<InsertResult>;
  /** Returns the updated row, or null when the guard no longer holds. */
  update(id: string, patch: LicensePatch, guard: UpdateGuard): Promise<License | null>;
}

export interface EventLedger {
  /** Atomic check-and-insert. Exactly one concurrent caller sees `firstTime: true`. */
  recordIfNew(eventId: string, eventType: string): Promise<{ firstTime: boolean }>;
  /** Delete records applied before the cutoff. Returns the number removed. */
  pruneOlderThan(cutoff: Date): Promise<number>;
}

/** Stores bound to one unit of work. */
export interface TransactionStores {
  ledger: Pick<EventLedger, "recordIfNew">;
  licenses: LicenseStore;
}

/**
 * Runs a ledger claim and the license writes it guards as one atomic unit.
 * When `work` rejects, nothing it wrote stays, the claim included.
 */
export interface UnitOfWork {
  run<T>(work: (stores: TransactionStores) => Promise<T>): Promise<T>;
}

export interface PluginDirectory {
  findById(id: string): Promise<Plugin | null>;
  findBySlug(slug: string): Promise<Plugin | null>;
}

export interface LicenseMailJob {
  licenseKey: string;
  email: string | null;
  pluginId: string;
  pluginSlug: string | null;
  pluginName: string | null;
}

/**
 * Hand-off point to the mail collaborator. Enqueueing must not wait for delivery.
 */
export interface MailQueue {
  enqueue(job: LicenseMailJob): Promise<void>;
}

export type ProcessorSubscriptionStatus =
  | "active"
  | "trialing"
  | "past_due"
  | "canceled"
  | "unpaid"
  | "incomplete"
  | "incomplete_expired"
  | "paused";

export interface SubscriptionSnapshot {
  id: string;
  status: ProcessorSubscriptionStatus;
  currentPeriodEnd: Date | null;
  trialEnd: Date | null;
}

/**
 * Read access to processor-side objects needed to interpret events.
 */
export interface ProcessorGateway {
  retrieveSubscription(subscriptionId: string, options?: { account?: string }): Promise<SubscriptionSnapshot>;
}

export interface CheckoutSessionParams {
  mode: PlanType;
  priceId: string;
  customerEmail?: string;
  /** Copied onto the session and, for subscriptions, onto the subscription. */
  metadata: Record<string, string>;
  trialPeriodDays?: number;
  account?: string;
}

export interface CheckoutGateway {
  /** Throws CheckoutRejectedError when the processor refuses the request. */
  createCheckoutSession(params: CheckoutSessionParams): Promise<{ id: string; url: string }>;
}

export interface RateLimitStore {
  /**
   * Increment the counter for `key` and return its new value.
   * The counter expires `ttlSeconds` after its first increment.
   */
  increment(key: string, ttlSeconds: number): Promise<number>;
}

export type Logger = Pick<BaseLogger, "error" | "warn" | "info" | "debug">;
