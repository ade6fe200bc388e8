/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Parse configuration file (JSON or YAML). The content is returned as is;
 * validation happens in `validateConfig`.
 */
export function parseConfigFile(filePath: string): unknown {
  logger.info("Parsing configuration file", { filePath });

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file: ${filePath}`,
      { filePath },
      { cause: error },
    );
  }

  try {
    const config: unknown = isYaml ? parseYaml(content) : JSON.parse(content);
    return config ?? {};
  } catch (error) {
    throw new ConfigError(
      `Failed to parse config file: ${filePath}`,
      { filePath },
      { cause: error },
    );
  }
}
