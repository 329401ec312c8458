export { plugins, licenses, appliedEvents } from "./schema.js";
export type { PluginRow, LicenseRow, NewLicenseRow, AppliedEventRow } from "./schema.js";
export { createDatabase, applySchema, SCHEMA_SQL_URL } from "./database.js";
export type { DatabaseHandle, DatabaseOptions, KeyturnDatabase, KeyturnExecutor } from "./database.js";
export { PostgresLicenseStore, toLicense, updateValues } from "./licenseStore.js";
export { PostgresEventLedger } from "./eventLedger.js";
export { PostgresPluginDirectory, toPlugin } from "./pluginDirectory.js";
export { PostgresUnitOfWork } from "./unitOfWork.js";
export { licenseConflictFrom } from "./conflicts.js";
