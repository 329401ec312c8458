import type { FastifyPluginAsync } from "fastify";
import { InvalidSignatureError, MalformedPayloadError, verifyEvent, type EventEnvelope } from "@keyturn/engine";

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Processor webhook receiver.
 * POST /webhooks/payment-events
 *
 * The body is kept as the raw string the signature was computed over.
 * Answers 200 for every verified event that was applied, ignored or already
 * seen, and 500 when applying failed so the processor redelivers.
 */
export const webhookRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.addContentTypeParser("application/json", { parseAs: "string" }, (_request, body, done) => {
    done(null, body);
  });

  fastify.post<{ Body: string }>("/webhooks/payment-events", async (request, reply) => {
    const { processor, metrics, webhook, clock } = fastify.keyturn;
    const signature =
      firstHeader(request.headers["stripe-signature"]) ?? firstHeader(request.headers["signature"]);

    let envelope: EventEnvelope;
    try {
      envelope = verifyEvent(typeof request.body === "string" ? request.body : "", signature, webhook.secret, {
        toleranceSeconds: webhook.toleranceSeconds,
        now: Math.floor(clock().getTime() / 1000),
      });
    } catch (error) {
      if (error instanceof InvalidSignatureError || error instanceof MalformedPayloadError) {
        metrics.webhook(error.code);
        request.log.warn({ reason: error.message }, "Rejected webhook delivery");
        return reply.status(400).send({ error: error.message });
      }
      throw error;
    }

    try {
      const result = await processor.process(envelope);
      metrics.webhook(result.outcome);
      return { status: "success" };
    } catch (error) {
      metrics.webhook("failed");
      request.log.error({ err: error, eventId: envelope.id, eventType: envelope.type }, "Failed to process event");
      return reply.status(500).send({ error: "Failed to process event" });
    }
  });
};
