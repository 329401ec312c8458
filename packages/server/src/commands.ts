import { Command, InvalidArgumentError } from "commander";
import type { Logger } from "pino";
import { generateLicenseKey, pruneLedger, LEDGER_MIN_RETENTION_DAYS } from "@keyturn/engine";
import { PostgresEventLedger, applySchema, createDatabase } from "@keyturn/store-postgres";
import { loadConfig, requireEnv } from "./config.js";
import { startServer } from "./server.js";
import { VERSION } from "./app.js";

export interface ProgramOptions {
  logger: Logger;
  /** Where `keys:generate` writes. Default: stdout */
  write?: (line: string) => void;
}

function positiveInteger(name: string) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new InvalidArgumentError(`${name} must be a positive integer, got "${value}"`);
    }
    return parsed;
  };
}

/**
 * The `keyturn` command line.
 */
export function buildProgram(options: ProgramOptions): Command {
  const { logger } = options;
  const write = options.write ?? ((line: string) => process.stdout.write(`${line}\n`));
  const program = new Command();

  program.name("keyturn").description("License lifecycle server for paid plugins").version(VERSION);

  program
    .command("serve")
    .description("Start the HTTP server")
    .action(async () => {
      const { close } = await startServer(loadConfig());
      for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.once(signal, () => {
          logger.info({ signal }, "Shutting down");
          close().catch((err: unknown) => {
            logger.error({ err }, "Error during shutdown");
            process.exitCode = 1;
          });
        });
      }
    });

  program
    .command("db:init")
    .description("Create the tables and indexes if they do not exist")
    .action(async () => {
      const database = createDatabase({ connectionString: requireEnv("DATABASE_URL") });
      try {
        await applySchema(database.pool);
        logger.info("Schema applied");
      } finally {
        await database.close();
      }
    });

  program
    .command("events:prune")
    .description("Delete applied-event records older than the retention period")
    .option(
      "--older-than-days <days>",
      `Retention in days, at least ${LEDGER_MIN_RETENTION_DAYS}`,
      positiveInteger("--older-than-days"),
      LEDGER_MIN_RETENTION_DAYS
    )
    .action(async (opts: { olderThanDays: number }) => {
      const database = createDatabase({ connectionString: requireEnv("DATABASE_URL") });
      try {
        const { cutoff, removed } = await pruneLedger(new PostgresEventLedger(database.db), opts.olderThanDays);
        logger.info({ cutoff: cutoff.toISOString(), removed }, "Applied events pruned");
      } finally {
        await database.close();
      }
    });

  program
    .command("keys:generate")
    .description("Print freshly generated license keys")
    .option("-n, --count <count>", "Number of keys", positiveInteger("--count"), 1)
    .action((opts: { count: number }) => {
      for (let i = 0; i < opts.count; i++) {
        write(generateLicenseKey());
      }
    });

  return program;
}

