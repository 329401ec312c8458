import * as crypto from "crypto";

export const LICENSE_KEY_LENGTH = 32;

const ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

// Largest multiple of the alphabet size below 256; bytes at or above it are
// discarded so every character is equally likely.
const UNBIASED_LIMIT = 256 - (256 % ALPHABET.length);

const LICENSE_KEY_REGEX = /^[A-Z0-9]{32}$/;

/**
 * Generate a license key: 32 upper-case alphanumerics from a CSPRNG,
 * about 165 bits of entropy.
 */
export function generateLicenseKey(randomBytes: (size: number) => Buffer = crypto.randomBytes): string {
  let key = "";
  while (key.length < LICENSE_KEY_LENGTH) {
    for (const byte of randomBytes(LICENSE_KEY_LENGTH)) {
      if (byte >= UNBIASED_LIMIT) continue;
      key += ALPHABET[byte % ALPHABET.length];
      if (key.length === LICENSE_KEY_LENGTH) break;
    }
  }
  return key;
}

export function isValidLicenseKeyFormat(licenseKey: string): boolean {
  return LICENSE_KEY_REGEX.test(licenseKey);
}
