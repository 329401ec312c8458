import type { TransactionStores, UnitOfWork } from "@keyturn/engine";
import type { KeyturnDatabase } from "./database.js";
import { PostgresEventLedger } from "./eventLedger.js";
import { PostgresLicenseStore } from "./licenseStore.js";

/**
 * One PostgreSQL transaction per unit of work. The `applied_events` row and
 * the license write commit together or not at all.
 */
export class PostgresUnitOfWork implements UnitOfWork {
  constructor(private db: Pick<KeyturnDatabase, "transaction">) {}

  run<T>(work: (stores: TransactionStores) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) =>
      work({
        ledger: new PostgresEventLedger(tx),
        licenses: new PostgresLicenseStore(tx),
      })
    );
  }
}
