/**
 * CLI command options (from commander)
 */

export interface GenerateCommandOptions {
  config?: string;
  set: string[];
  outputPath: string;
  outputFormat: string;
}

export interface ValidateCommandOptions {
  config?: string;
  set: string[];
}
