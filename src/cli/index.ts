#!/usr/bin/env node

/**
 * burstgen CLI - synthetic change record generation
 */

import { Command } from "commander";
import { createGenerateCommand } from "./commands/generate.js";
import { createValidateCommand } from "./commands/validate.js";
import { isLogLevel, LOG_LEVELS, logger } from "../utils/logger.js";

const pkg = {
  name: "burstgen",
  version: "0.1.0",
  description:
    "Synthetic CDC record generator with burst windows, rate limiting and multi-collection fan-out",
};

/**
 * Main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option(
      "--log-level <level>",
      `Logging verbosity: ${LOG_LEVELS.join(", ")}`,
      "info",
    )
    .hook("preAction", (thisCommand) => {
      const { logLevel } = thisCommand.opts<{ logLevel?: string }>();
      if (logLevel !== undefined && isLogLevel(logLevel)) {
        logger.setLevel(logLevel);
      } else if (logLevel !== undefined) {
        logger.warn(`Unknown log level "${logLevel}", keeping "${logger.getLevel()}"`);
      }
    });

  program.addCommand(createGenerateCommand());
  program.addCommand(createValidateCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      { status: "error", error: { code: "UNEXPECTED_ERROR", message } },
      null,
      2,
    ),
  );
  process.exit(1);
});
