import crypto from "crypto";
import { InvalidSignatureError, MalformedPayloadError } from "../errors.js";
import { parseEnvelope, type EventEnvelope } from "./envelope.js";

export interface VerifyOptions {
  /** Maximum age of the signature timestamp in seconds. Default: 300 */
  toleranceSeconds?: number;
  /** Current time in Unix seconds. Default: now */
  now?: number;
}

export interface ParsedSignature {
  timestamp: number;
  signatures: string[];
}

/**
 * Verify a Stripe-signed webhook payload and return its event envelope.
 *
 * Signature format: t=<timestamp>,v1=<signature>[,v1=<signature>]
 * Algorithm: HMAC SHA-256
 * Payload: <timestamp>.<raw_body>
 *
 * Throws before the body is trusted for anything, so the event id is never
 * used as a dedup key unless the processor signed it.
 *
 * @see https://stripe.com/docs/webhooks/signatures
 */
export function verifyEvent(
  rawBody: string,
  signatureHeader: string | undefined,
  secret: string,
  options: VerifyOptions = {}
): EventEnvelope {
  if (!signatureHeader) {
    throw new InvalidSignatureError("Missing Stripe-Signature header");
  }

  const parsed = parseSignatureHeader(signatureHeader);
  if (!parsed) {
    throw new InvalidSignatureError("Invalid Stripe-Signature format");
  }

  const tolerance = options.toleranceSeconds ?? 300;
  const now = options.now ?? Math.floor(Date.now() / 1000);
  if (Math.abs(now - parsed.timestamp) > tolerance) {
    throw new InvalidSignatureError("Signature timestamp outside tolerance");
  }

  const expected = computeSignature(rawBody, secret, parsed.timestamp);
  if (!parsed.signatures.some((candidate) => timingSafeEqualHex(expected, candidate))) {
    throw new InvalidSignatureError("Signature mismatch");
  }

  let body: unknown;
  try {
    body = JSON.parse(rawBody);
  } catch {
    throw new MalformedPayloadError("Body is not valid JSON");
  }

  return parseEnvelope(body);
}

/**
 * HMAC-SHA256 of `<timestamp>.<payload>`, hex encoded.
 */
export function computeSignature(payload: string, secret: string, timestamp: number): string {
  return crypto.createHmac("sha256", secret).update(`${timestamp}.${payload}`, "utf8").digest("hex");
}

/**
 * Parse a signature header. Several v1 entries appear while a secret is rotated.
 */
export function parseSignatureHeader(header: string): ParsedSignature | null {
  const parts = header.split(",").map((s) => s.trim());
  const t = parts.find((p) => p.startsWith("t="))?.slice(2);
  const signatures = parts.filter((p) => p.startsWith("v1=")).map((p) => p.slice(3));

  if (!t || signatures.length === 0) return null;

  const timestamp = Number(t);
  if (!Number.isInteger(timestamp)) return null;

  return { timestamp, signatures };
}

function timingSafeEqualHex(a: string, b: string): boolean {
  if (!/^[0-9a-f]+$/i.test(b)) return false;
  const bufA = Buffer.from(a, "hex");
  const bufB = Buffer.from(b, "hex");
  if (bufA.length !== bufB.length) return false;
  return crypto.timingSafeEqual(bufA, bufB);
}
