import type { EventEnvelope } from "../webhooks/envelope.js";
import type { PlanType, ProcessorSubscriptionStatus, SubscriptionSnapshot } from "../types.js";

export interface CheckoutCompletedEvent {
  kind: "checkout_completed";
  mode: PlanType;
  sessionId: string;
  pluginId: string | null;
  email: string | null;
  customerId: string | null;
  subscriptionId: string | null;
  /** Present when the session carried an expanded subscription, or after enrichment. */
  subscription: SubscriptionSnapshot | null;
}

export interface SubscriptionUpdatedEvent {
  kind: "subscription_updated";
  subscription: SubscriptionSnapshot;
}

export interface SubscriptionDeletedEvent {
  kind: "subscription_deleted";
  subscriptionId: string;
}

export interface InvoiceEvent {
  kind: "invoice_paid" | "invoice_failed";
  invoiceId: string;
  subscriptionId: string | null;
}

export interface UnknownEvent {
  kind: "unknown";
  eventType: string;
}

export type LicensingEvent =
  | CheckoutCompletedEvent
  | SubscriptionUpdatedEvent
  | SubscriptionDeletedEvent
  | InvoiceEvent
  | UnknownEvent;

const SUBSCRIPTION_STATUSES: readonly ProcessorSubscriptionStatus[] = [
  "active",
  "trialing",
  "past_due",
  "canceled",
  "unpaid",
  "incomplete",
  "incomplete_expired",
  "paused",
];

/**
 * Map a verified processor event onto the domain events the state machine understands.
 * Event types the engine does not handle come back as `unknown`.
 */
export function interpretEvent(envelope: EventEnvelope): LicensingEvent {
  const object = envelope.data.object;

  switch (envelope.type) {
    case "checkout.session.completed":
      return interpretCheckout(object, envelope.type);

    case "customer.subscription.updated": {
      const subscription = toSubscriptionSnapshot(object);
      return subscription ? { kind: "subscription_updated", subscription } : unknown(envelope.type);
    }

    case "customer.subscription.deleted": {
      const subscriptionId = str(object.id);
      return subscriptionId ? { kind: "subscription_deleted", subscriptionId } : unknown(envelope.type);
    }

    case "invoice.payment_succeeded":
    case "invoice.paid":
    case "invoice.payment_failed":
      return {
        kind: envelope.type === "invoice.payment_failed" ? "invoice_failed" : "invoice_paid",
        invoiceId: str(object.id) ?? "",
        subscriptionId: invoiceSubscriptionId(object),
      };

    default:
      return unknown(envelope.type);
  }
}

function interpretCheckout(object: Record<string, unknown>, eventType: string): LicensingEvent {
  const sessionId = str(object.id);
  if (!sessionId) return unknown(eventType);

  const mode = object.mode === "subscription" ? "subscription" : object.mode === "payment" ? "one_time" : null;
  if (!mode) return unknown(eventType);

  const metadata = record(object.metadata);
  const details = record(object.customer_details);
  const expanded = record(object.subscription);

  return {
    kind: "checkout_completed",
    mode,
    sessionId,
    pluginId: str(metadata?.plugin_id),
    email: str(details?.email) ?? str(object.customer_email),
    customerId: idOf(object.customer),
    subscriptionId: mode === "subscription" ? idOf(object.subscription) : null,
    subscription: expanded ? toSubscriptionSnapshot(expanded) : null,
  };
}

/**
 * Read a subscription snapshot from a processor subscription object.
 */
export function toSubscriptionSnapshot(object: Record<string, unknown>): SubscriptionSnapshot | null {
  const id = str(object.id);
  const status = object.status;
  if (!id || !isSubscriptionStatus(status)) return null;

  return {
    id,
    status,
    currentPeriodEnd: fromUnix(object.current_period_end),
    trialEnd: fromUnix(object.trial_end),
  };
}

export function isSubscriptionStatus(value: unknown): value is ProcessorSubscriptionStatus {
  return typeof value === "string" && SUBSCRIPTION_STATUSES.some((s) => s === value);
}

// Newer API versions moved the reference under parent.subscription_details.
function invoiceSubscriptionId(invoice: Record<string, unknown>): string | null {
  const details = record(record(invoice.parent)?.subscription_details);
  return idOf(invoice.subscription) ?? idOf(details?.subscription);
}

function unknown(eventType: string): UnknownEvent {
  return { kind: "unknown", eventType };
}

function str(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

function record(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

/** Processor references are either an id string or an expanded object. */
function idOf(value: unknown): string | null {
  return str(value) ?? str(record(value)?.id);
}

function fromUnix(value: unknown): Date | null {
  return typeof value === "number" && Number.isFinite(value) ? new Date(value * 1000) : null;
}
