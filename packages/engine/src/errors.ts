export type ErrorCode =
  | "invalid_signature"
  | "malformed_payload"
  | "key_generation_failed"
  | "checkout_rejected"
  | "ledger_retention"
  | "invalid_config";

/**
 * Base class for errors raised by Keyturn.
 */
export class KeyturnError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "KeyturnError";
    this.code = code;
    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** The event was not signed by the processor, or the signature is too old. */
export class InvalidSignatureError extends KeyturnError {
  constructor(message: string) {
    super("invalid_signature", message);
    this.name = "InvalidSignatureError";
  }
}

export class MalformedPayloadError extends KeyturnError {
  constructor(message: string) {
    super("malformed_payload", message);
    this.name = "MalformedPayloadError";
  }
}

export class KeyGenerationError extends KeyturnError {
  readonly attempts: number;

  constructor(attempts: number) {
    super("key_generation_failed", `Could not generate a unique license key after ${attempts} attempts`);
    this.name = "KeyGenerationError";
    this.attempts = attempts;
  }
}

/** The processor refused to create a checkout session. */
export class CheckoutRejectedError extends KeyturnError {
  constructor(message: string) {
    super("checkout_rejected", message);
    this.name = "CheckoutRejectedError";
  }
}

export class LedgerRetentionError extends KeyturnError {
  constructor(message: string) {
    super("ledger_retention", message);
    this.name = "LedgerRetentionError";
  }
}

export class ConfigError extends KeyturnError {
  constructor(message: string) {
    super("invalid_config", message);
    this.name = "ConfigError";
  }
}
