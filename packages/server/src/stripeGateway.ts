import Stripe from "stripe";
import {
  CheckoutRejectedError,
  type CheckoutGateway,
  type CheckoutSessionParams,
  type ProcessorGateway,
  type SubscriptionSnapshot,
} from "@keyturn/engine";

export interface StripeGatewayOptions {
  stripe: Stripe;
  /** Where Stripe sends the buyer after paying. May contain {CHECKOUT_SESSION_ID}. */
  successUrl: string;
  cancelUrl: string;
}

type SubscriptionFields = Pick<Stripe.Subscription, "id" | "status" | "current_period_end" | "trial_end">;

export function toSnapshot(subscription: SubscriptionFields): SubscriptionSnapshot {
  return {
    id: subscription.id,
    status: subscription.status,
    currentPeriodEnd: subscription.current_period_end ? new Date(subscription.current_period_end * 1000) : null,
    trialEnd: subscription.trial_end ? new Date(subscription.trial_end * 1000) : null,
  };
}

/**
 * Session parameters for one plugin price. Metadata goes on the session and,
 * for subscriptions, on the subscription so later events can be traced back.
 */
export function toSessionParams(
  params: CheckoutSessionParams,
  urls: Pick<StripeGatewayOptions, "successUrl" | "cancelUrl">
): Stripe.Checkout.SessionCreateParams {
  const session: Stripe.Checkout.SessionCreateParams = {
    mode: params.mode === "one_time" ? "payment" : "subscription",
    line_items: [{ price: params.priceId, quantity: 1 }],
    success_url: urls.successUrl,
    cancel_url: urls.cancelUrl,
    metadata: params.metadata,
  };
  if (params.customerEmail) session.customer_email = params.customerEmail;

  if (params.mode === "subscription") {
    session.subscription_data = { metadata: params.metadata };
    if (params.trialPeriodDays) session.subscription_data.trial_period_days = params.trialPeriodDays;
  }
  return session;
}

/**
 * Stripe errors caused by the request itself (unknown price, inactive
 * account, card refused) become a CheckoutRejectedError; outages are not.
 */
export function toCheckoutRejection(error: unknown): CheckoutRejectedError | null {
  if (error instanceof Stripe.errors.StripeInvalidRequestError || error instanceof Stripe.errors.StripeCardError) {
    return new CheckoutRejectedError(error.message);
  }
  return null;
}

function requestOptions(account: string | undefined): Stripe.RequestOptions | undefined {
  return account ? { stripeAccount: account } : undefined;
}

/**
 * Stripe-backed processor access: subscription lookups for event enrichment
 * and checkout session creation. Calls run on the plugin's connected account
 * when one is given.
 */
export class StripeGateway implements ProcessorGateway, CheckoutGateway {
  private stripe: Stripe;
  private successUrl: string;
  private cancelUrl: string;

  constructor(options: StripeGatewayOptions) {
    this.stripe = options.stripe;
    this.successUrl = options.successUrl;
    this.cancelUrl = options.cancelUrl;
  }

  async retrieveSubscription(subscriptionId: string, options: { account?: string } = {}): Promise<SubscriptionSnapshot> {
    const subscription = await this.stripe.subscriptions.retrieve(subscriptionId, {}, requestOptions(options.account));
    return toSnapshot(subscription);
  }

  async createCheckoutSession(params: CheckoutSessionParams): Promise<{ id: string; url: string }> {
    let session: Stripe.Checkout.Session;
    try {
      session = await this.stripe.checkout.sessions.create(
        toSessionParams(params, { successUrl: this.successUrl, cancelUrl: this.cancelUrl }),
        requestOptions(params.account)
      );
    } catch (error) {
      throw toCheckoutRejection(error) ?? error;
    }

    if (!session.url) {
      throw new CheckoutRejectedError("Stripe returned a checkout session without a URL");
    }
    return { id: session.id, url: session.url };
  }
}
