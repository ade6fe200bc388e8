import { Command } from "commander";
import { loadGeneratorConfig } from "../config/loader.js";
import type { ValidateCommandOptions } from "../config/types.js";
import { collect, reportFailure } from "./shared.js";

/**
 * Create validate command: check a configuration without generating
 */
export function createValidateCommand(): Command {
  return new Command("validate")
    .description("Validate generator configuration and print the result")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option(
      "--set <key=value>",
      "Override a setting (repeatable)",
      collect,
      [],
    )
    .action((opts: ValidateCommandOptions) => {
      try {
        const config = loadGeneratorConfig({
          configPath: opts.config,
          settings: opts.set,
        });
        console.log(
          JSON.stringify({ status: "success", phase: "validation", config }, null, 2),
        );
      } catch (error) {
        reportFailure("validation", error);
      }
    });
}
