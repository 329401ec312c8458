import { KeyGenerationError } from "./errors.js";
import { interpretEvent, type LicensingEvent } from "./events/interpret.js";
import { generateLicenseKey } from "./keys/generator.js";
import { anchorFor, decide, type IgnoreReason, type LicenseDraft } from "./lifecycle/stateMachine.js";
import type { EventEnvelope } from "./webhooks/envelope.js";
import type {
  License,
  LicenseStore,
  Logger,
  MailQueue,
  Plugin,
  PluginDirectory,
  ProcessorGateway,
  UnitOfWork,
} from "./types.js";

export type ProcessOutcome =
  | { outcome: "created"; license: License }
  | { outcome: "updated"; license: License }
  | { outcome: "ignored"; reason: IgnoreReason }
  | { outcome: "duplicate" };

export interface EventProcessorOptions {
  /** Ledger claim and license writes, committed together. */
  transactions: UnitOfWork;
  plugins: PluginDirectory;
  gateway: ProcessorGateway;
  mail: MailQueue;
  logger: Logger;
  /** Key source, replaceable in tests. Default: {@link generateLicenseKey} */
  generateKey?: () => string;
  /** Insert attempts before a key collision becomes fatal. Default: 5 */
  maxKeyAttempts?: number;
}

/**
 * Applies verified processor events to licenses, at most once per event id.
 *
 * @example
 * ```typescript
 * const envelope = verifyEvent(rawBody, signature, secret);
 * const result = await processor.process(envelope);
 * ```
 */
const DUPLICATE: ProcessOutcome = { outcome: "duplicate" };

export class EventProcessor {
  private transactions: UnitOfWork;
  private plugins: PluginDirectory;
  private gateway: ProcessorGateway;
  private mail: MailQueue;
  private log: Logger;
  private generateKey: () => string;
  private maxKeyAttempts: number;

  constructor(options: EventProcessorOptions) {
    this.transactions = options.transactions;
    this.plugins = options.plugins;
    this.gateway = options.gateway;
    this.mail = options.mail;
    this.log = options.logger;
    this.generateKey = options.generateKey ?? (() => generateLicenseKey());
    this.maxKeyAttempts = options.maxKeyAttempts ?? 5;
  }

  /**
   * Apply one event. Duplicates resolve as `duplicate`. On a storage failure
   * the ledger claim is rolled back with the writes and the call rejects, so
   * the processor's redelivery is applied.
   */
  async process(envelope: EventEnvelope): Promise<ProcessOutcome> {
    const outcome = await this.transactions.run(async ({ ledger, licenses }) => {
      const { firstTime } = await ledger.recordIfNew(envelope.id, envelope.type);
      if (!firstTime) return DUPLICATE;
      return this.apply(envelope, licenses);
    });

    this.logOutcome(envelope, outcome);
    if (outcome.outcome === "created") this.dispatchMail(outcome.license);
    return outcome;
  }

  private async apply(envelope: EventEnvelope, licenses: LicenseStore): Promise<ProcessOutcome> {
    let event = interpretEvent(envelope);

    if (event.kind === "checkout_completed" && event.pluginId) {
      const refusal = await this.checkPlugin(event.pluginId, envelope.account);
      if (refusal) return { outcome: "ignored", reason: refusal };
      event = await this.enrich(event, envelope);
    }

    const anchor = anchorFor(event);
    let existing: License | null = null;
    if (anchor?.by === "checkout_session") {
      existing = await licenses.findByCheckoutSessionId(anchor.id);
    } else if (anchor?.by === "subscription") {
      existing = await licenses.findBySubscriptionId(anchor.id);
    }

    const decision = decide(event, existing, new Date(envelope.created * 1000));

    switch (decision.action) {
      case "ignore":
        return { outcome: "ignored", reason: decision.reason };

      case "update": {
        const license = await licenses.update(decision.licenseId, decision.patch, decision.guard);
        // Another worker committed a newer or terminal state in between.
        if (!license) return { outcome: "ignored", reason: "stale_event" };
        return { outcome: "updated", license };
      }

      case "create":
        return this.create(decision.draft, licenses);
    }
  }

  /**
   * A checkout may only mint licenses for a plugin that exists and whose
   * prices live on the account the event came from.
   */
  private async checkPlugin(pluginId: string, account: string | undefined): Promise<IgnoreReason | null> {
    const plugin: Plugin | null = await this.plugins.findById(pluginId);
    if (!plugin) return "missing_plugin";
    if ((plugin.stripeAccountId ?? null) !== (account ?? null)) {
      this.log.warn({ pluginId, account: account ?? null }, "Checkout event from an account that does not own the plugin");
      return "account_mismatch";
    }
    return null;
  }

  /** Fetch the subscription a checkout session created when the event did not expand it. */
  private async enrich(event: LicensingEvent, envelope: EventEnvelope): Promise<LicensingEvent> {
    if (event.kind !== "checkout_completed" || event.mode !== "subscription") return event;
    if (event.subscription || !event.subscriptionId) return event;

    const subscription = await this.gateway.retrieveSubscription(event.subscriptionId, {
      account: envelope.account,
    });
    return { ...event, subscription };
  }

  private async create(draft: LicenseDraft, licenses: LicenseStore): Promise<ProcessOutcome> {
    for (let attempt = 1; attempt <= this.maxKeyAttempts; attempt++) {
      const result = await licenses.insert({ ...draft, licenseKey: this.generateKey() });

      if (result.inserted) {
        return { outcome: "created", license: result.license };
      }

      if (result.conflict !== "license_key") {
        // A concurrent delivery for the same purchase created it first.
        return { outcome: "ignored", reason: "already_created" };
      }

      this.log.warn({ attempt }, "License key collision, regenerating");
    }

    throw new KeyGenerationError(this.maxKeyAttempts);
  }

  private dispatchMail(license: License): void {
    void this.sendMail(license).catch((err: unknown) => {
      this.log.error({ err, licenseId: license.id }, "Failed to enqueue license email");
    });
  }

  private async sendMail(license: License): Promise<void> {
    const plugin = await this.plugins.findById(license.pluginId);
    await this.mail.enqueue({
      licenseKey: license.licenseKey,
      email: license.email,
      pluginId: license.pluginId,
      pluginSlug: plugin?.slug ?? null,
      pluginName: plugin?.name ?? null,
    });
  }

  private logOutcome(envelope: EventEnvelope, result: ProcessOutcome): void {
    const base = { eventId: envelope.id, eventType: envelope.type };
    switch (result.outcome) {
      case "created":
      case "updated":
        this.log.info(
          { ...base, licenseId: result.license.id, status: result.license.status },
          `License ${result.outcome}`
        );
        break;
      case "ignored":
        this.log.info({ ...base, reason: result.reason }, "Event ignored");
        break;
      case "duplicate":
        this.log.info(base, "Duplicate event acknowledged");
        break;
    }
  }
}
