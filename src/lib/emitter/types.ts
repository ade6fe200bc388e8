/**
 * Emitter module types
 */

export const OUTPUT_FORMATS = ["ndjson", "json"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface EmitterOptions {
  format: OutputFormat;
  /** File path or "stdout" */
  destination: string;
}

export interface EmitterResult {
  written: number;
  destination: string;
}
