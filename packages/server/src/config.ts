import { ConfigError, type RateLimitRule } from "@keyturn/engine";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export type RateLimitScope = "validate" | "checkout";

export interface ServerConfig {
  /** Server port. Default: 8080 */
  port: number;
  /** Server host. Default: 0.0.0.0 */
  host: string;
  /** Log level. Default: info */
  logLevel: LogLevel;
  /** Honour X-Forwarded-For when deriving the client address. Default: false */
  trustProxy: boolean;
  databaseUrl: string;
  /** Redis URL for rate-limit counters and the mail queue. In-memory stand-ins without it. */
  redisUrl?: string;
  mailQueueKey: string;
  stripe: {
    secretKey: string;
    webhookSecret: string;
    /** Default: 300 */
    webhookToleranceSeconds: number;
  };
  checkout: {
    successUrl: string;
    cancelUrl: string;
  };
  rateLimits: Record<RateLimitScope, RateLimitRule>;
  /** Plugin lookup cache TTL. Default: 60000 */
  pluginCacheTtlMs: number;
}

type Env = Record<string, string | undefined>;

/**
 * Read the server configuration from environment variables:
 *
 *   PORT, HOST, LOG_LEVEL, TRUST_PROXY
 *   DATABASE_URL                    (required)
 *   REDIS_URL, MAIL_QUEUE_KEY
 *   STRIPE_SECRET_KEY               (required)
 *   STRIPE_WEBHOOK_SECRET           (required)
 *   WEBHOOK_TOLERANCE_SECONDS
 *   CHECKOUT_SUCCESS_URL            (required)
 *   CHECKOUT_CANCEL_URL             (required)
 *   VALIDATE_RATE_LIMIT, VALIDATE_RATE_WINDOW_SECONDS   (100 per 3600)
 *   CHECKOUT_RATE_LIMIT, CHECKOUT_RATE_WINDOW_SECONDS   (10 per 60)
 *   PLUGIN_CACHE_TTL_MS
 *
 * @throws ConfigError listing every missing or malformed variable
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  const problems: string[] = [];
  const reader = new EnvReader(env, problems);

  const config: ServerConfig = {
    port: reader.integer("PORT", 8080, 0),
    host: reader.optional("HOST") ?? "0.0.0.0",
    logLevel: reader.logLevel("LOG_LEVEL", "info"),
    trustProxy: reader.boolean("TRUST_PROXY", false),
    databaseUrl: reader.required("DATABASE_URL"),
    redisUrl: reader.optional("REDIS_URL"),
    mailQueueKey: reader.optional("MAIL_QUEUE_KEY") ?? "keyturn:mail:license-created",
    stripe: {
      secretKey: reader.required("STRIPE_SECRET_KEY"),
      webhookSecret: reader.required("STRIPE_WEBHOOK_SECRET"),
      webhookToleranceSeconds: reader.integer("WEBHOOK_TOLERANCE_SECONDS", 300, 1),
    },
    checkout: {
      successUrl: reader.url("CHECKOUT_SUCCESS_URL"),
      cancelUrl: reader.url("CHECKOUT_CANCEL_URL"),
    },
    rateLimits: {
      validate: {
        limit: reader.integer("VALIDATE_RATE_LIMIT", 100, 1),
        windowSeconds: reader.integer("VALIDATE_RATE_WINDOW_SECONDS", 3600, 1),
      },
      checkout: {
        limit: reader.integer("CHECKOUT_RATE_LIMIT", 10, 1),
        windowSeconds: reader.integer("CHECKOUT_RATE_WINDOW_SECONDS", 60, 1),
      },
    },
    pluginCacheTtlMs: reader.integer("PLUGIN_CACHE_TTL_MS", 60000, 1),
  };

  if (problems.length > 0) {
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }
  return config;
}

/**
 * Read one required variable, for commands that need only part of the
 * configuration.
 */
export function requireEnv(name: string, env: Env = process.env): string {
  const value = env[name]?.trim();
  if (!value) throw new ConfigError(`Invalid configuration: ${name} is required`);
  return value;
}

class EnvReader {
  constructor(
    private env: Env,
    private problems: string[]
  ) {}

  optional(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value ? value : undefined;
  }

  required(name: string): string {
    const value = this.optional(name);
    if (value === undefined) {
      this.problems.push(`${name} is required`);
      return "";
    }
    return value;
  }

  url(name: string): string {
    const value = this.required(name);
    if (value && !URL.canParse(value)) {
      this.problems.push(`${name} must be an absolute URL`);
    }
    return value;
  }

  integer(name: string, fallback: number, min: number): number {
    const raw = this.optional(name);
    if (raw === undefined) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      this.problems.push(`${name} must be an integer >= ${min}, got "${raw}"`);
      return fallback;
    }
    return value;
  }

  boolean(name: string, fallback: boolean): boolean {
    const raw = this.optional(name)?.toLowerCase();
    if (raw === undefined) return fallback;
    if (raw === "true" || raw === "1") return true;
    if (raw === "false" || raw === "0") return false;
    this.problems.push(`${name} must be true or false, got "${raw}"`);
    return fallback;
  }

  logLevel(name: string, fallback: LogLevel): LogLevel {
    const raw = this.optional(name);
    if (raw === undefined) return fallback;
    const level = LOG_LEVELS.find((l) => l === raw);
    if (!level) {
      this.problems.push(`${name} must be one of ${LOG_LEVELS.join(", ")}, got "${raw}"`);
      return fallback;
    }
    return level;
  }
}
