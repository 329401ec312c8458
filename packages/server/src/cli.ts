#!/usr/bin/env node

import { pino } from "pino";
import { buildProgram } from "./commands.js";

const logger = pino({ name: "keyturn", level: process.env.LOG_LEVEL ?? "info" });

buildProgram({ logger })
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    logger.error({ err }, err instanceof Error ? err.message : "Command failed");
    process.exit(1);
  });
