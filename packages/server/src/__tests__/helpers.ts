import { vi } from "vitest";
import type { FastifyInstance } from "fastify";
import {
  computeSignature,
  MemoryEventLedger,
  MemoryLicenseStore,
  MemoryMailQueue,
  MemoryPluginDirectory,
  MemoryRateLimitStore,
  MemoryUnitOfWork,
  type LicenseStore,
  type Plugin,
} from "@keyturn/engine";
import { createServer, type ServerOptions } from "../app.js";
import type { HealthDependencies } from "../health.js";

export const SECRET = "test-secret";

export const acmeTool: Plugin = {
  id: "plg_acme",
  slug: "acme-tool",
  name: "Acme Tool",
  oneTimePriceId: "price_once",
  recurringPriceId: "price_monthly",
  trialPeriodDays: 14,
};

export const freeTool: Plugin = {
  id: "plg_free",
  slug: "free-tool",
  name: "Free Tool",
  oneTimePriceId: "price_free_once",
  recurringPriceId: null,
};

export interface TestServerOptions {
  licenses?: LicenseStore;
  health?: HealthDependencies;
  options?: Partial<ServerOptions>;
}

export async function buildTestServer(overrides: TestServerOptions = {}) {
  const ledger = new MemoryEventLedger();
  const licenses = new MemoryLicenseStore();
  const licenseStore = overrides.licenses ?? licenses;
  const mail = new MemoryMailQueue();
  const gateway = {
    retrieveSubscription: vi.fn(async (id: string) => ({
      id,
      status: "trialing" as const,
      currentPeriodEnd: new Date("2100-01-01T00:00:00Z"),
      trialEnd: new Date("2100-01-01T00:00:00Z"),
    })),
    createCheckoutSession: vi.fn(async (params: { priceId: string }) => ({
      id: `cs_for_${params.priceId}`,
      url: `https://checkout.example.com/${params.priceId}`,
    })),
  };

  const server: FastifyInstance = await createServer(
    {
      transactions: new MemoryUnitOfWork(ledger, licenseStore),
      licenses: licenseStore,
      plugins: new MemoryPluginDirectory([acmeTool, freeTool]),
      gateway,
      mail,
      rateLimitStore: new MemoryRateLimitStore(),
      health: overrides.health,
    },
    {
      logLevel: "silent",
      webhookSecret: SECRET,
      rateLimits: {
        validate: { limit: 100, windowSeconds: 3600 },
        checkout: { limit: 10, windowSeconds: 60 },
      },
      ...overrides.options,
    }
  );

  return { server, ledger, licenses, mail, gateway };
}

/** An inject request carrying a correctly signed webhook delivery. */
export function signedDelivery(event: object, header: "stripe-signature" | "signature" = "stripe-signature") {
  const payload = JSON.stringify(event);
  const timestamp = Math.floor(Date.now() / 1000);
  return {
    method: "POST" as const,
    url: "/webhooks/payment-events",
    headers: {
      "content-type": "application/json",
      [header]: `t=${timestamp},v1=${computeSignature(payload, SECRET, timestamp)}`,
    },
    payload,
  };
}

export function checkoutCompleted(eventId: string, sessionId = "cs_once_1") {
  return {
    id: eventId,
    object: "event",
    type: "checkout.session.completed",
    created: Math.floor(Date.now() / 1000),
    data: {
      object: {
        id: sessionId,
        object: "checkout.session",
        mode: "payment",
        customer: "cus_1",
        customer_details: { email: "u@example.com" },
        metadata: { plugin_id: acmeTool.id, plugin_slug: acmeTool.slug },
      },
    },
  };
}

export function subscriptionEvent(eventId: string, type: string, object: Record<string, unknown>, created: number) {
  return { id: eventId, object: "event", type, created, data: { object } };
}

export function flushAsync(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
