import { describe, it, expect } from "vitest";
import { interpretEvent } from "../events/interpret.js";
import { anchorFor, decide, patchForSubscription } from "../lifecycle/stateMachine.js";
import { invalidReason, isLicenseValid } from "../lifecycle/validity.js";
import type { License } from "../types.js";
import {
  FAR_FUTURE,
  T0,
  envelope,
  invoice,
  oneTimeCheckout,
  subscriptionCheckout,
  subscriptionDeleted,
  subscriptionUpdated,
} from "./fixtures.js";

const at = (seconds: number) => new Date(seconds * 1000);

function license(overrides: Partial<License> = {}): License {
  return {
    id: "lic_1",
    licenseKey: "A".repeat(32),
    pluginId: "plg_acme",
    email: "u@example.com",
    stripeCustomerId: "cus_2",
    stripeSubscriptionId: "sub_1",
    stripeCheckoutSessionId: "cs_sub_1",
    status: "active",
    expiresAt: null,
    terminal: false,
    lastEventAt: at(T0),
    createdAt: at(T0),
    updatedAt: at(T0),
    ...overrides,
  };
}

describe("interpretEvent", () => {
  it("reads a one-time checkout", () => {
    expect(interpretEvent(oneTimeCheckout("evt_1"))).toEqual({
      kind: "checkout_completed",
      mode: "one_time",
      sessionId: "cs_once_1",
      pluginId: "plg_acme",
      email: "u@example.com",
      customerId: "cus_1",
      subscriptionId: null,
      subscription: null,
    });
  });

  it("falls back to customer_email and reads an expanded subscription", () => {
    const event = interpretEvent(
      subscriptionCheckout("evt_1", "sub_9", T0, { id: "sub_9", status: "trialing", trial_end: FAR_FUTURE })
    );
    expect(event).toMatchObject({
      kind: "checkout_completed",
      mode: "subscription",
      email: "sub@example.com",
      subscriptionId: "sub_9",
      subscription: { id: "sub_9", status: "trialing", trialEnd: at(FAR_FUTURE), currentPeriodEnd: null },
    });
  });

  it("reads the subscription of an invoice from either location", () => {
    expect(interpretEvent(invoice("evt_1", "invoice.payment_failed", "sub_1", T0))).toEqual({
      kind: "invoice_failed",
      invoiceId: "in_evt_1",
      subscriptionId: "sub_1",
    });
    const nested = envelope("evt_2", "invoice.paid", {
      id: "in_2",
      parent: { subscription_details: { subscription: "sub_7" } },
    });
    expect(interpretEvent(nested)).toEqual({ kind: "invoice_paid", invoiceId: "in_2", subscriptionId: "sub_7" });
  });

  it("treats unhandled types and unreadable objects as unknown", () => {
    expect(interpretEvent(envelope("evt_1", "charge.refunded", { id: "ch_1" }))).toEqual({
      kind: "unknown",
      eventType: "charge.refunded",
    });
    expect(interpretEvent(subscriptionUpdated("evt_2", "sub_1", "bogus", T0))).toEqual({
      kind: "unknown",
      eventType: "customer.subscription.updated",
    });
  });
});

describe("anchorFor", () => {
  it("anchors one-time purchases on the checkout session", () => {
    expect(anchorFor(interpretEvent(oneTimeCheckout("evt_1")))).toEqual({ by: "checkout_session", id: "cs_once_1" });
  });

  it("anchors subscription events on the subscription id", () => {
    expect(anchorFor(interpretEvent(subscriptionCheckout("evt_1")))).toEqual({ by: "subscription", id: "sub_1" });
    expect(anchorFor(interpretEvent(subscriptionDeleted("evt_2", "sub_3", T0)))).toEqual({
      by: "subscription",
      id: "sub_3",
    });
  });

  it("has no anchor for unknown events or invoices without a subscription", () => {
    expect(anchorFor(interpretEvent(envelope("evt_1", "ping", {})))).toBeNull();
    expect(anchorFor(interpretEvent(invoice("evt_2", "invoice.payment_succeeded", null, T0)))).toBeNull();
  });
});

describe("decide", () => {
  it("creates an active, non-expiring license for a one-time purchase", () => {
    const decision = decide(interpretEvent(oneTimeCheckout("evt_1")), null, at(T0));
    expect(decision).toEqual({
      action: "create",
      draft: {
        pluginId: "plg_acme",
        email: "u@example.com",
        stripeCustomerId: "cus_1",
        stripeCheckoutSessionId: "cs_once_1",
        stripeSubscriptionId: null,
        status: "active",
        expiresAt: null,
        terminal: false,
        lastEventAt: at(T0),
      },
    });
  });

  it("creates a trial license ending with the subscription trial", () => {
    const event = interpretEvent(
      subscriptionCheckout("evt_1", "sub_1", T0, { id: "sub_1", status: "trialing", trial_end: FAR_FUTURE })
    );
    expect(decide(event, null, at(T0))).toMatchObject({
      action: "create",
      draft: { status: "trial", expiresAt: at(FAR_FUTURE), stripeSubscriptionId: "sub_1" },
    });
  });

  it("creates an active license for a paid subscription", () => {
    const event = interpretEvent(subscriptionCheckout("evt_1", "sub_1", T0, { id: "sub_1", status: "active" }));
    expect(decide(event, null, at(T0))).toMatchObject({ action: "create", draft: { status: "active", expiresAt: null } });
  });

  it("does nothing when the license already exists", () => {
    expect(decide(interpretEvent(subscriptionCheckout("evt_1")), license(), at(T0))).toEqual({
      action: "ignore",
      reason: "already_created",
    });
  });

  it("ignores a checkout without plugin metadata", () => {
    const event = envelope("evt_1", "checkout.session.completed", { id: "cs_1", mode: "payment" });
    expect(decide(interpretEvent(event), null, at(T0))).toEqual({ action: "ignore", reason: "missing_plugin" });
  });

  it.each([
    ["active", "active", at(FAR_FUTURE)],
    ["past_due", "inactive", at(FAR_FUTURE)],
    ["canceled", "canceled", at(FAR_FUTURE)],
    ["unpaid", "canceled", at(FAR_FUTURE)],
    ["incomplete_expired", "expired", at(FAR_FUTURE)],
  ])("maps subscription status %s to %s", (processorStatus, status, expiresAt) => {
    const event = interpretEvent(subscriptionUpdated("evt_1", "sub_1", processorStatus, T0 + 1));
    expect(decide(event, license(), at(T0 + 1))).toMatchObject({
      action: "update",
      licenseId: "lic_1",
      patch: { status, expiresAt },
    });
  });

  it("marks only a canceled subscription as final", () => {
    const canceledEvent = interpretEvent(subscriptionUpdated("evt_1", "sub_1", "canceled", T0 + 1));
    expect(decide(canceledEvent, license(), at(T0 + 1))).toMatchObject({ patch: { status: "canceled", terminal: true } });

    const unpaidEvent = interpretEvent(subscriptionUpdated("evt_2", "sub_1", "unpaid", T0 + 1));
    expect(decide(unpaidEvent, license(), at(T0 + 1))).toMatchObject({ patch: { status: "canceled", terminal: false } });
  });

  it("lets a newer payment move a license canceled for non-payment", () => {
    const event = interpretEvent(invoice("evt_1", "invoice.payment_succeeded", "sub_1", T0 + 5));
    expect(decide(event, license({ status: "canceled" }), at(T0 + 5))).toMatchObject({
      action: "update",
      patch: { status: "active" },
    });
  });

  it("uses the trial end for a trialing subscription", () => {
    const event = interpretEvent(subscriptionUpdated("evt_1", "sub_1", "trialing", T0 + 1, T0 + 100, T0 + 50));
    expect(decide(event, license(), at(T0 + 1))).toMatchObject({
      patch: { status: "trial", expiresAt: at(T0 + 50) },
    });
  });

  it("cancels on deletion without touching the expiry", () => {
    const decision = decide(interpretEvent(subscriptionDeleted("evt_1", "sub_1", T0 + 1)), license(), at(T0 + 1));
    expect(decision).toMatchObject({ action: "update", patch: { status: "canceled", terminal: true } });
    expect(decision.action === "update" && "expiresAt" in decision.patch).toBe(false);
  });

  it("follows invoice outcomes", () => {
    const paid = decide(
      interpretEvent(invoice("evt_1", "invoice.payment_succeeded", "sub_1", T0 + 1)),
      license({ status: "inactive" }),
      at(T0 + 1)
    );
    expect(paid).toMatchObject({ action: "update", patch: { status: "active" } });

    const failed = decide(interpretEvent(invoice("evt_2", "invoice.payment_failed", "sub_1", T0 + 1)), license(), at(T0 + 1));
    expect(failed).toMatchObject({ action: "update", patch: { status: "inactive" } });
  });

  it("ignores events for subscriptions without a license", () => {
    const event = interpretEvent(subscriptionUpdated("evt_1", "sub_404", "active", T0));
    expect(decide(event, null, at(T0))).toEqual({ action: "ignore", reason: "orphan_subscription" });
  });

  it("never revives a terminal license", () => {
    const event = interpretEvent(subscriptionUpdated("evt_1", "sub_1", "active", T0 + 5));
    expect(decide(event, license({ status: "canceled", terminal: true }), at(T0 + 5))).toEqual({
      action: "ignore",
      reason: "terminal_state",
    });
  });

  it("drops events older than the last one applied", () => {
    const event = interpretEvent(subscriptionUpdated("evt_1", "sub_1", "active", T0 - 1));
    expect(decide(event, license(), at(T0 - 1))).toEqual({ action: "ignore", reason: "stale_event" });
  });

  it("applies an event with the same timestamp as the last one", () => {
    const event = interpretEvent(invoice("evt_1", "invoice.payment_failed", "sub_1", T0));
    expect(decide(event, license(), at(T0))).toMatchObject({ action: "update", guard: { eventAt: at(T0) } });
  });
});

describe("patchForSubscription", () => {
  it("maps paused and incomplete subscriptions to inactive", () => {
    const base = { id: "sub_1", currentPeriodEnd: at(T0), trialEnd: null };
    expect(patchForSubscription({ ...base, status: "paused" })).toEqual({
      status: "inactive",
      expiresAt: at(T0),
      terminal: false,
    });
    expect(patchForSubscription({ ...base, status: "incomplete" })).toEqual({
      status: "inactive",
      expiresAt: at(T0),
      terminal: false,
    });
  });
});

describe("isLicenseValid", () => {
  const now = at(T0);

  it("accepts active and trial licenses that have not expired", () => {
    expect(isLicenseValid({ status: "active", expiresAt: null }, now)).toBe(true);
    expect(isLicenseValid({ status: "trial", expiresAt: at(T0 + 1) }, now)).toBe(true);
  });

  it("rejects licenses at or past their expiry whatever the status says", () => {
    expect(isLicenseValid({ status: "active", expiresAt: at(T0) }, now)).toBe(false);
    expect(isLicenseValid({ status: "trial", expiresAt: at(T0 - 1) }, now)).toBe(false);
  });

  it("rejects every other status", () => {
    for (const status of ["inactive", "expired", "canceled"] as const) {
      expect(isLicenseValid({ status, expiresAt: null }, now)).toBe(false);
    }
  });

  it("explains why a license is invalid", () => {
    expect(invalidReason({ status: "trial", expiresAt: at(T0 - 1) })).toBe("expired");
    expect(invalidReason({ status: "expired", expiresAt: null })).toBe("expired");
    expect(invalidReason({ status: "inactive", expiresAt: null })).toBe("inactive");
    expect(invalidReason({ status: "canceled", expiresAt: null })).toBe("canceled");
  });
});
