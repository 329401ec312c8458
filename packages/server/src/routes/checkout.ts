import type { FastifyPluginAsync } from "fastify";
import { CheckoutRejectedError, type CheckoutResult, type PlanType } from "@keyturn/engine";
import { enforceRateLimit } from "../rateLimit.js";

interface CheckoutBody {
  plugin_slug: string;
  plan_type: PlanType;
  customer_email?: string;
}

const checkoutBodySchema = {
  type: "object",
  required: ["plugin_slug", "plan_type"],
  properties: {
    plugin_slug: { type: "string", minLength: 1 },
    plan_type: { type: "string", enum: ["one_time", "subscription"] },
    customer_email: { type: "string", format: "email" },
  },
} as const;

/**
 * Starts a hosted checkout for a plugin.
 * POST /checkout-session
 */
export const checkoutRoutes: FastifyPluginAsync = async (fastify) => {
  enforceRateLimit(fastify, "checkout");

  fastify.post<{ Body: CheckoutBody }>(
    "/checkout-session",
    { schema: { body: checkoutBodySchema } },
    async (request, reply) => {
      const { checkout, metrics } = fastify.keyturn;

      let result: CheckoutResult;
      try {
        result = await checkout.createSession({
          pluginSlug: request.body.plugin_slug,
          planType: request.body.plan_type,
          customerEmail: request.body.customer_email,
        });
      } catch (error) {
        if (error instanceof CheckoutRejectedError) {
          metrics.checkout("rejected");
          request.log.warn({ reason: error.message, pluginSlug: request.body.plugin_slug }, "Checkout rejected");
          return reply.status(422).send({ error: error.message });
        }
        throw error;
      }
      metrics.checkout(result.kind);

      switch (result.kind) {
        case "plugin_not_found":
          return reply.status(404).send({ error: "Plugin not found" });

        case "price_not_configured":
          return reply.status(400).send({
            error: `No ${result.planType === "one_time" ? "one-time" : "recurring"} price configured for this plugin`,
          });

        case "created":
          return { session_url: result.sessionUrl, session_id: result.sessionId };
      }
    }
  );
};
