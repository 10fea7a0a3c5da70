#!/usr/bin/env tsx
import "dotenv/config";
import { CommanderError } from "commander";
import { createProgram } from "./program";
import { cliLogger } from "./logger";

const program = createProgram({ logger: cliLogger });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof CommanderError) {
    // commander has already printed its own message
    process.exitCode = err.exitCode;
    return;
  }
  cliLogger.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
