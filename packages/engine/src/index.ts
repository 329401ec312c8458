export * from "./types.js";
export * from "./errors.js";

export { verifyEvent, computeSignature, parseSignatureHeader } from "./webhooks/signature.js";
export type { VerifyOptions, ParsedSignature } from "./webhooks/signature.js";
export { parseEnvelope } from "./webhooks/envelope.js";
export type { EventEnvelope } from "./webhooks/envelope.js";

export { interpretEvent, toSubscriptionSnapshot } from "./events/interpret.js";
export type { LicensingEvent } from "./events/interpret.js";
export { decide, anchorFor, patchForSubscription } from "./lifecycle/stateMachine.js";
export type { Decision, IgnoreReason, LicenseAnchor, LicenseDraft } from "./lifecycle/stateMachine.js";
export { isLicenseValid, invalidReason } from "./lifecycle/validity.js";
export type { InvalidReason } from "./lifecycle/validity.js";

export { generateLicenseKey, isValidLicenseKeyFormat, LICENSE_KEY_LENGTH } from "./keys/generator.js";

export { EventProcessor } from "./processor.js";
export type { EventProcessorOptions, ProcessOutcome } from "./processor.js";
export { ValidationService } from "./validation.js";
export type { ValidationResult, ValidationServiceOptions } from "./validation.js";
export { CheckoutService } from "./checkout.js";
export type { CheckoutRequest, CheckoutResult, CheckoutServiceOptions } from "./checkout.js";
export { RateLimiter } from "./rateLimit/limiter.js";
export type { RateLimitRule, RateLimitDecision, RateLimiterOptions } from "./rateLimit/limiter.js";
export { pruneLedger, LEDGER_MIN_RETENTION_DAYS } from "./ledger.js";

export { MemoryLicenseStore } from "./stores/memoryLicenseStore.js";
export { MemoryEventLedger } from "./stores/memoryEventLedger.js";
export { MemoryUnitOfWork } from "./stores/memoryUnitOfWork.js";
export { MemoryPluginDirectory } from "./stores/memoryPluginDirectory.js";
export { MemoryRateLimitStore } from "./stores/memoryRateLimitStore.js";
export { MemoryMailQueue } from "./stores/memoryMailQueue.js";
export { CachedPluginDirectory } from "./stores/cachedPluginDirectory.js";
export type { CachedPluginDirectoryOptions } from "./stores/cachedPluginDirectory.js";
export { RedisRateLimitStore, RedisMailQueue } from "./stores/redisStores.js";
export type { RedisClient, RedisRateLimitStoreOptions, RedisMailQueueOptions } from "./stores/redisStores.js";
