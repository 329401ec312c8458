import Ajv from "ajv";
import { MalformedPayloadError } from "../errors.js";

/**
 * The parts of a processor event this engine relies on.
 */
export interface EventEnvelope {
  id: string;
  type: string;
  /** Unix seconds. */
  created: number;
  /** Connected account the event originated from, if any. */
  account?: string;
  data: {
    object: Record<string, unknown>;
  };
}

const envelopeSchema = {
  type: "object",
  required: ["id", "type", "created", "data"],
  properties: {
    id: { type: "string", minLength: 1, maxLength: 255 },
    type: { type: "string", minLength: 1, maxLength: 255 },
    created: { type: "integer", minimum: 0 },
    account: { type: "string" },
    data: {
      type: "object",
      required: ["object"],
      properties: {
        object: { type: "object" },
      },
    },
  },
};

const ajv = new Ajv.default({ allErrors: true, strict: false });
const validateEnvelope = ajv.compile<EventEnvelope>(envelopeSchema);

/**
 * Check that a decoded body is a well-formed event envelope.
 */
export function parseEnvelope(body: unknown): EventEnvelope {
  if (!validateEnvelope(body)) {
    throw new MalformedPayloadError(`Malformed event: ${ajv.errorsText(validateEnvelope.errors)}`);
  }
  return body;
}
