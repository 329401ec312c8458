import { LedgerRetentionError } from "./errors.js";
import type { EventLedger } from "./types.js";

/**
 * Ledger entries must outlive the processor's redelivery window, which can
 * stretch to days after an outage.
 */
export const LEDGER_MIN_RETENTION_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Remove ledger entries older than `retentionDays`. Refuses retention shorter
 * than {@link LEDGER_MIN_RETENTION_DAYS}.
 */
export async function pruneLedger(
  ledger: EventLedger,
  retentionDays: number,
  now: Date = new Date()
): Promise<{ cutoff: Date; removed: number }> {
  if (!Number.isFinite(retentionDays) || retentionDays < LEDGER_MIN_RETENTION_DAYS) {
    throw new LedgerRetentionError(
      `Retention must be at least ${LEDGER_MIN_RETENTION_DAYS} days, got ${retentionDays}`
    );
  }

  const cutoff = new Date(now.getTime() - retentionDays * DAY_MS);
  const removed = await ledger.pruneOlderThan(cutoff);
  return { cutoff, removed };
}
