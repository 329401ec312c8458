import type { LicenseConflict } from "@keyturn/engine";

const UNIQUE_VIOLATION = "23505";

const CONFLICT_BY_CONSTRAINT: Record<string, LicenseConflict> = {
  licenses_license_key_key: "license_key",
  licenses_plugin_subscription_key: "subscription",
  licenses_checkout_session_key: "checkout_session",
};

interface PgErrorFields {
  code?: unknown;
  constraint?: unknown;
  cause?: unknown;
}

function fields(value: unknown): PgErrorFields | null {
  if (typeof value !== "object" || value === null) return null;
  return {
    code: "code" in value ? value.code : undefined,
    constraint: "constraint" in value ? value.constraint : undefined,
    cause: "cause" in value ? value.cause : undefined,
  };
}

/**
 * Map a unique-violation raised by an insert into `licenses` to the constraint
 * it hit. Returns null for any other error. Looks through one level of
 * `cause`, where newer drizzle releases put the driver error.
 */
export function licenseConflictFrom(error: unknown): LicenseConflict | null {
  let candidate = fields(error);
  for (let depth = 0; candidate && depth < 2; depth++) {
    if (candidate.code === UNIQUE_VIOLATION && typeof candidate.constraint === "string") {
      return CONFLICT_BY_CONSTRAINT[candidate.constraint] ?? null;
    }
    candidate = fields(candidate.cause);
  }
  return null;
}
