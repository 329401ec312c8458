import type { License } from "../types.js";

export type InvalidReason = "expired" | "inactive" | "canceled";

/**
 * Whether a license grants access at `now`. Derived on every read; a row can
 * pass its `expiresAt` between processor syncs without its status changing.
 */
export function isLicenseValid(license: Pick<License, "status" | "expiresAt">, now: Date = new Date()): boolean {
  const entitled = license.status === "active" || license.status === "trial";
  return entitled && (license.expiresAt === null || license.expiresAt.getTime() > now.getTime());
}

/**
 * Why a license does not grant access. Only meaningful when {@link isLicenseValid} is false.
 */
export function invalidReason(license: Pick<License, "status" | "expiresAt">): InvalidReason {
  switch (license.status) {
    case "active":
    case "trial":
    case "expired":
      return "expired";
    case "inactive":
      return "inactive";
    case "canceled":
      return "canceled";
  }
}
