import { Command } from "commander";
import { buildEngine } from "../../lib/engine/engine.js";
import { createRecordStream } from "../../lib/engine/stream.js";
import { emitRecords } from "../../lib/emitter/emit.js";
import { isOutputFormat, OUTPUT_FORMATS } from "../../lib/emitter/types.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { loadGeneratorConfig } from "../config/loader.js";
import type { GenerateCommandOptions } from "../config/types.js";
import { collect, reportFailure } from "./shared.js";

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Create generate command
 * @returns Commander Command
 */
export function createGenerateCommand(): Command {
  return new Command("generate")
    .description(
      "Generate synthetic change records until the record count is reached or the process is interrupted",
    )
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option(
      "--set <key=value>",
      "Override a setting, e.g. burst.sleepTime=1s (repeatable)",
      collect,
      [],
    )
    .option("--output-path <path>", 'Output path (or "stdout")', "stdout")
    .option(
      "--output-format <format>",
      `Output format: ${OUTPUT_FORMATS.join(", ")}`,
      "ndjson",
    )
    .action(async (opts: GenerateCommandOptions) => {
      const controller = new AbortController();
      const onSignal = (signal: NodeJS.Signals) => {
        logger.info("Shutdown requested", { signal });
        controller.abort();
      };

      try {
        const format = opts.outputFormat;
        if (!isOutputFormat(format)) {
          throw new ConfigError(`Unknown output format "${format}"`, {
            allowed: OUTPUT_FORMATS,
          });
        }

        const config = loadGeneratorConfig({
          configPath: opts.config,
          settings: opts.set,
        });
        const engine = await buildEngine(config);

        for (const signal of SHUTDOWN_SIGNALS) process.once(signal, onSignal);

        const startedAt = Date.now();
        const result = await emitRecords(
          createRecordStream(engine, controller.signal),
          { format, destination: opts.outputPath },
        );
        const durationMs = Date.now() - startedAt;

        const summary = {
          status: "success",
          phase: "generation",
          output: {
            totalRecords: result.written,
            format,
            path: result.destination,
          },
          metrics: {
            durationMs,
            recordsPerSec:
              durationMs > 0
                ? Math.round(result.written / (durationMs / 1000))
                : result.written,
          },
        };

        // stdout already carries the records
        if (result.destination === "stdout") {
          logger.info("Generation complete", summary);
        } else {
          console.log(JSON.stringify(summary, null, 2));
        }
      } catch (error) {
        reportFailure("generation", error);
      } finally {
        for (const signal of SHUTDOWN_SIGNALS) process.off(signal, onSignal);
      }
    });
}
