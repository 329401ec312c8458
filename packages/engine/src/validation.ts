import { invalidReason, isLicenseValid, type InvalidReason } from "./lifecycle/validity.js";
import type { LicenseStatus, LicenseStore, PluginDirectory } from "./types.js";

export type ValidationResult =
  | { kind: "plugin_not_found" }
  | { kind: "license_not_found" }
  | {
      kind: "valid";
      status: LicenseStatus;
      email: string | null;
      expiresAt: Date | null;
      pluginName: string;
    }
  | { kind: "invalid"; status: LicenseStatus; reason: InvalidReason };

export interface ValidationServiceOptions {
  plugins: PluginDirectory;
  licenses: LicenseStore;
  /** Clock, replaceable in tests. */
  now?: () => Date;
}

/**
 * Answers whether a (plugin, key) pair is currently entitled. Read-only.
 */
export class ValidationService {
  private plugins: PluginDirectory;
  private licenses: LicenseStore;
  private now: () => Date;

  constructor(options: ValidationServiceOptions) {
    this.plugins = options.plugins;
    this.licenses = options.licenses;
    this.now = options.now ?? (() => new Date());
  }

  async validate(pluginSlug: string, licenseKey: string): Promise<ValidationResult> {
    const plugin = await this.plugins.findBySlug(pluginSlug);
    if (!plugin) return { kind: "plugin_not_found" };

    const license = await this.licenses.findByKey(plugin.id, licenseKey.trim());
    if (!license) return { kind: "license_not_found" };

    if (!isLicenseValid(license, this.now())) {
      return { kind: "invalid", status: license.status, reason: invalidReason(license) };
    }

    return {
      kind: "valid",
      status: license.status,
      email: license.email,
      expiresAt: license.expiresAt,
      pluginName: plugin.name,
    };
  }
}
