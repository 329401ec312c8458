import { pino } from "pino";
import type { EventEnvelope } from "../webhooks/envelope.js";
import type { Plugin } from "../types.js";

export const silentLogger = pino({ level: "silent" });

/** 2025-10-09T08:53:20Z */
export const T0 = 1_760_000_000;

/** 2100-01-01T00:00:00Z, comfortably in the future for validity checks. */
export const FAR_FUTURE = 4_102_444_800;

export const acmeTool: Plugin = {
  id: "plg_acme",
  slug: "acme-tool",
  name: "Acme Tool",
  oneTimePriceId: "price_once",
  recurringPriceId: "price_monthly",
  trialPeriodDays: 14,
};

export const otherTool: Plugin = {
  id: "plg_other",
  slug: "other-tool",
  name: "Other Tool",
  oneTimePriceId: "price_other_once",
  recurringPriceId: null,
};

export function envelope(
  id: string,
  type: string,
  object: Record<string, unknown>,
  created: number = T0
): EventEnvelope {
  return { id, type, created, data: { object } };
}

export function oneTimeCheckout(eventId: string, sessionId = "cs_once_1", created = T0): EventEnvelope {
  return envelope(
    eventId,
    "checkout.session.completed",
    {
      id: sessionId,
      object: "checkout.session",
      mode: "payment",
      customer: "cus_1",
      customer_details: { email: "u@example.com" },
      metadata: { plugin_id: acmeTool.id, plugin_slug: acmeTool.slug },
    },
    created
  );
}

export function subscriptionCheckout(
  eventId: string,
  subscriptionId = "sub_1",
  created = T0,
  subscription?: Record<string, unknown>
): EventEnvelope {
  return envelope(
    eventId,
    "checkout.session.completed",
    {
      id: `cs_${subscriptionId}`,
      object: "checkout.session",
      mode: "subscription",
      customer: "cus_2",
      customer_email: "sub@example.com",
      subscription: subscription ?? subscriptionId,
      metadata: { plugin_id: acmeTool.id },
    },
    created
  );
}

export function subscriptionUpdated(
  eventId: string,
  subscriptionId: string,
  status: string,
  created: number,
  periodEnd = FAR_FUTURE,
  trialEnd: number | null = null
): EventEnvelope {
  return envelope(
    eventId,
    "customer.subscription.updated",
    { id: subscriptionId, object: "subscription", status, current_period_end: periodEnd, trial_end: trialEnd },
    created
  );
}

export function subscriptionDeleted(eventId: string, subscriptionId: string, created: number): EventEnvelope {
  return envelope(
    eventId,
    "customer.subscription.deleted",
    { id: subscriptionId, object: "subscription", status: "canceled" },
    created
  );
}

export function invoice(
  eventId: string,
  type: "invoice.payment_succeeded" | "invoice.payment_failed",
  subscriptionId: string | null,
  created: number
): EventEnvelope {
  return envelope(eventId, type, { id: `in_${eventId}`, object: "invoice", subscription: subscriptionId }, created);
}

/** Let fire-and-forget work scheduled during the test settle. */
export function flushAsync(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
