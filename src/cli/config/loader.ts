import type { GeneratorConfig } from "../../types/config.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import {
  isPlainObject,
  mergeConfig,
  parseSettingArgs,
  unflattenSettings,
} from "../../lib/config/settings.js";
import { validateConfig } from "../../lib/config/validate.js";
import { parseConfigFile } from "./parser.js";

export interface ConfigSources {
  /** JSON or YAML file */
  configPath?: string;
  /** `key=value` settings, applied over the file */
  settings?: readonly string[];
}

/**
 * Load, merge and validate configuration. Precedence: settings > file.
 */
export function loadGeneratorConfig(sources: ConfigSources): GeneratorConfig {
  let fileConfig: Record<string, unknown> = {};
  if (sources.configPath) {
    const parsed = parseConfigFile(sources.configPath);
    if (!isPlainObject(parsed)) {
      throw new ConfigError(
        `Config file must contain an object: ${sources.configPath}`,
      );
    }
    fileConfig = parsed;
  }

  const overrides = unflattenSettings(parseSettingArgs(sources.settings ?? []));
  const config = validateConfig(mergeConfig(fileConfig, overrides));

  logger.debug("Configuration loaded", {
    collections: config.collections.length,
    recordCount: config.recordCount,
    rate: config.rate,
  });
  return config;
}
