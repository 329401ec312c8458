import type { LicenseStore, TransactionStores, UnitOfWork } from "../types.js";
import type { MemoryEventLedger } from "./memoryEventLedger.js";

/**
 * Unit of work over the in-memory stores. A failed run forgets the ledger
 * claims it made; the license store applies at most one write per event, and
 * that write is the last step, so there is nothing else to undo.
 */
export class MemoryUnitOfWork implements UnitOfWork {
  constructor(
    private ledger: MemoryEventLedger,
    private licenses: LicenseStore
  ) {}

  async run<T>(work: (stores: TransactionStores) => Promise<T>): Promise<T> {
    const claimed: string[] = [];
    const ledger: TransactionStores["ledger"] = {
      recordIfNew: async (eventId, eventType) => {
        const result = await this.ledger.recordIfNew(eventId, eventType);
        if (result.firstTime) claimed.push(eventId);
        return result;
      },
    };

    try {
      return await work({ ledger, licenses: this.licenses });
    } catch (error) {
      for (const eventId of claimed) this.ledger.forget(eventId);
      throw error;
    }
  }
}
