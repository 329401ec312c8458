import type { CheckoutGateway, PlanType, PluginDirectory } from "./types.js";

export interface CheckoutRequest {
  pluginSlug: string;
  planType: PlanType;
  customerEmail?: string;
}

export type CheckoutResult =
  | { kind: "plugin_not_found" }
  | { kind: "price_not_configured"; planType: PlanType }
  | { kind: "created"; sessionId: string; sessionUrl: string };

export interface CheckoutServiceOptions {
  plugins: PluginDirectory;
  gateway: CheckoutGateway;
}

/**
 * Starts a processor-hosted checkout for one of a plugin's prices. The plugin
 * id travels in the session metadata and comes back on the completion event.
 */
export class CheckoutService {
  private plugins: PluginDirectory;
  private gateway: CheckoutGateway;

  constructor(options: CheckoutServiceOptions) {
    this.plugins = options.plugins;
    this.gateway = options.gateway;
  }

  async createSession(request: CheckoutRequest): Promise<CheckoutResult> {
    const plugin = await this.plugins.findBySlug(request.pluginSlug);
    if (!plugin) return { kind: "plugin_not_found" };

    const priceId = request.planType === "one_time" ? plugin.oneTimePriceId : plugin.recurringPriceId;
    if (!priceId) return { kind: "price_not_configured", planType: request.planType };

    const session = await this.gateway.createCheckoutSession({
      mode: request.planType,
      priceId,
      customerEmail: request.customerEmail,
      metadata: { plugin_id: plugin.id, plugin_slug: plugin.slug },
      trialPeriodDays:
        request.planType === "subscription" && plugin.trialPeriodDays ? plugin.trialPeriodDays : undefined,
      account: plugin.stripeAccountId ?? undefined,
    });

    return { kind: "created", sessionId: session.id, sessionUrl: session.url };
  }
}
