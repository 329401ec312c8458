import type { LicensingEvent } from "../events/interpret.js";
import type {
  License,
  LicensePatch,
  LicenseStatus,
  NewLicense,
  ProcessorSubscriptionStatus,
  SubscriptionSnapshot,
  UpdateGuard,
} from "../types.js";

export type IgnoreReason =
  | "unknown_event_type"
  | "missing_plugin"
  | "account_mismatch"
  | "no_subscription"
  | "orphan_subscription"
  | "already_created"
  | "stale_event"
  | "terminal_state";

export type LicenseDraft = Omit<NewLicense, "licenseKey">;

export type Decision =
  | { action: "create"; draft: LicenseDraft }
  | { action: "update"; licenseId: string; patch: LicensePatch; guard: UpdateGuard }
  | { action: "ignore"; reason: IgnoreReason };

/** How the existing license for an event is found. */
export type LicenseAnchor = { by: "checkout_session"; id: string } | { by: "subscription"; id: string };

/**
 * The key an event's license is looked up by, or null when the event cannot
 * concern a license.
 */
export function anchorFor(event: LicensingEvent): LicenseAnchor | null {
  switch (event.kind) {
    case "checkout_completed":
      if (event.mode === "one_time") return { by: "checkout_session", id: event.sessionId };
      return event.subscriptionId ? { by: "subscription", id: event.subscriptionId } : null;
    case "subscription_updated":
      return { by: "subscription", id: event.subscription.id };
    case "subscription_deleted":
      return { by: "subscription", id: event.subscriptionId };
    case "invoice_paid":
    case "invoice_failed":
      return event.subscriptionId ? { by: "subscription", id: event.subscriptionId } : null;
    case "unknown":
      return null;
  }
}

/**
 * Decide what an event does to the license it concerns.
 *
 * Pure: `existing` is the license found through {@link anchorFor}, and
 * `eventAt` is the processor's creation time for the event. A terminal
 * license (subscription deleted or canceled) is never revived, and an event
 * older than the last one applied to a license is dropped.
 */
export function decide(event: LicensingEvent, existing: License | null, eventAt: Date): Decision {
  switch (event.kind) {
    case "unknown":
      return ignore("unknown_event_type");

    case "checkout_completed": {
      if (existing) return ignore("already_created");
      if (!event.pluginId) return ignore("missing_plugin");

      const base = {
        pluginId: event.pluginId,
        email: event.email,
        stripeCustomerId: event.customerId,
        stripeCheckoutSessionId: event.sessionId,
        terminal: false,
        lastEventAt: eventAt,
      };

      if (event.mode === "one_time") {
        return {
          action: "create",
          draft: { ...base, stripeSubscriptionId: null, status: "active", expiresAt: null },
        };
      }

      if (!event.subscriptionId) return ignore("no_subscription");
      const trialing = event.subscription?.status === "trialing";
      return {
        action: "create",
        draft: {
          ...base,
          stripeSubscriptionId: event.subscriptionId,
          status: trialing ? "trial" : "active",
          expiresAt: trialing ? event.subscription?.trialEnd ?? null : null,
        },
      };
    }

    case "subscription_updated":
      return transition(existing, eventAt, patchForSubscription(event.subscription));

    case "subscription_deleted":
      return transition(existing, eventAt, { status: "canceled", terminal: true });

    case "invoice_paid":
    case "invoice_failed":
      if (!event.subscriptionId) return ignore("no_subscription");
      return transition(existing, eventAt, { status: event.kind === "invoice_paid" ? "active" : "inactive" });
  }
}

const STATUS_BY_SUBSCRIPTION: Record<ProcessorSubscriptionStatus, LicenseStatus> = {
  active: "active",
  trialing: "trial",
  past_due: "inactive",
  canceled: "canceled",
  unpaid: "canceled",
  incomplete: "inactive",
  incomplete_expired: "expired",
  paused: "inactive",
};

/**
 * License status and expiry for a processor subscription state. Only a
 * `canceled` subscription is final; an `unpaid` one can still be paid.
 */
export function patchForSubscription(subscription: SubscriptionSnapshot): LicensePatch {
  const status = STATUS_BY_SUBSCRIPTION[subscription.status];
  return {
    status,
    expiresAt: status === "trial" ? subscription.trialEnd : subscription.currentPeriodEnd,
    terminal: subscription.status === "canceled",
  };
}

function transition(existing: License | null, eventAt: Date, patch: LicensePatch): Decision {
  if (!existing) return ignore("orphan_subscription");
  if (existing.terminal) return ignore("terminal_state");
  if (existing.lastEventAt && eventAt.getTime() < existing.lastEventAt.getTime()) {
    return ignore("stale_event");
  }

  return {
    action: "update",
    licenseId: existing.id,
    patch,
    guard: { eventAt },
  };
}

function ignore(reason: IgnoreReason): Decision {
  return { action: "ignore", reason };
}
