/**
 * Flat key/value settings, e.g. `collections.users.format.options.id=int`
 */

import { ConfigError } from "../../utils/errors.js";

export type ConfigObject = { [key: string]: unknown };

export function isPlainObject(value: unknown): value is ConfigObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Split `key=value` arguments. The first "=" separates key and value.
 */
export function parseSettingArgs(args: readonly string[]): Record<string, string> {
  const settings: Record<string, string> = {};
  for (const arg of args) {
    const separator = arg.indexOf("=");
    if (separator <= 0) {
      throw new ConfigError(`invalid setting "${arg}", expected key=value`);
    }
    settings[arg.slice(0, separator).trim()] = arg.slice(separator + 1).trim();
  }
  return settings;
}

/**
 * Turn dotted keys into nested objects. Everything after an "options"
 * segment is one field name, so field names may contain dots.
 */
export function unflattenSettings(settings: Record<string, string>): ConfigObject {
  const root: ConfigObject = {};

  for (const [key, value] of Object.entries(settings)) {
    const segments = key.split(".");
    const optionsAt = segments.indexOf("options");
    const path =
      optionsAt >= 0 && optionsAt < segments.length - 1
        ? [...segments.slice(0, optionsAt + 1), segments.slice(optionsAt + 1).join(".")]
        : segments;

    if (path.some((segment) => segment.trim() === "")) {
      throw new ConfigError(`invalid setting key "${key}"`);
    }

    let node = root;
    for (const segment of path.slice(0, -1)) {
      const child = node[segment];
      if (child === undefined) {
        const created: ConfigObject = {};
        node[segment] = created;
        node = created;
      } else if (isPlainObject(child)) {
        node = child;
      } else {
        throw new ConfigError(`setting "${key}" conflicts with a value set at "${segment}"`);
      }
    }

    const leaf = path[path.length - 1];
    if (leaf !== undefined) {
      node[leaf] = value;
    }
  }

  return root;
}

/**
 * Deep-merge plain objects; values from `override` win, arrays are replaced.
 */
export function mergeConfig(base: ConfigObject, override: ConfigObject): ConfigObject {
  const merged: ConfigObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] =
      isPlainObject(current) && isPlainObject(value)
        ? mergeConfig(current, value)
        : value;
  }
  return merged;
}
