import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { CheckoutRejectedError, InvalidSignatureError, MalformedPayloadError } from "@keyturn/engine";

/**
 * Turns anything a route throws into a `{ error }` body. Server errors are
 * logged and answered without detail.
 */
export function errorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply): FastifyReply {
  if (error.validation) {
    return reply.status(400).send({ error: error.message });
  }

  if (error instanceof InvalidSignatureError || error instanceof MalformedPayloadError) {
    return reply.status(400).send({ error: error.message });
  }

  if (error instanceof CheckoutRejectedError) {
    return reply.status(422).send({ error: error.message });
  }

  const statusCode = error.statusCode ?? 500;
  if (statusCode >= 400 && statusCode < 500) {
    return reply.status(statusCode).send({ error: error.message });
  }

  request.log.error({ err: error }, "Unhandled error");
  return reply.status(500).send({ error: "Internal server error" });
}
