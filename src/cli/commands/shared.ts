import { BurstgenError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Commander accumulator for repeatable options
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Print a failure response and set a non-zero exit code.
 */
export function reportFailure(phase: string, error: unknown): void {
  const response =
    error instanceof BurstgenError
      ? error.toResponse(phase)
      : {
          status: "error",
          phase,
          error: {
            code: "UNEXPECTED_ERROR",
            message: error instanceof Error ? error.message : String(error),
          },
        };
  logger.error(`${phase} failed`, error);
  console.error(JSON.stringify(response, null, 2));
  process.exitCode = 1;
}
