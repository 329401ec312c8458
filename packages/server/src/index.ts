export { createServer, VERSION } from "./app.js";
export type { ServerDependencies, ServerOptions } from "./app.js";
export { startServer } from "./server.js";
export { loadConfig, requireEnv } from "./config.js";
export type { ServerConfig, LogLevel, RateLimitScope } from "./config.js";
export { StripeGateway, toSnapshot, toSessionParams, toCheckoutRejection } from "./stripeGateway.js";
export type { StripeGatewayOptions } from "./stripeGateway.js";
export { KeyturnMetrics, MetricsRegistry } from "./metrics.js";
export { getHealth, getReadiness } from "./health.js";
export type { HealthDependencies, HealthStatus, ReadinessStatus } from "./health.js";
export { keyturnServices } from "./services.js";
export type { KeyturnServices } from "./services.js";
export { errorHandler } from "./errors.js";
