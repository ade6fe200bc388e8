/**
 * Raw configuration -> validated GeneratorConfig
 *
 * Structure and types are checked with Ajv (numeric strings from flat
 * settings are coerced on the way), then ranges and cross-field rules are
 * checked here. All problems are reported together in one ConfigError.
 */

import AjvModule from "ajv";
import type { ErrorObject } from "ajv";
import type { FieldSpec, Operation } from "../../types/cdc.js";
import { isFieldType, isOperation } from "../../types/cdc.js";
import type {
  CollectionConfig,
  FormatConfig,
  GeneratorConfig,
  RawCollectionConfig,
  RawFormatConfig,
  RawGeneratorConfig,
} from "../../types/config.js";
import { ConfigError } from "../../utils/errors.js";
import { toMilliseconds } from "../../utils/duration.js";
import { logger } from "../../utils/logger.js";
import { RAW_CONFIG_SCHEMA } from "./schema.js";

const Ajv = AjvModule.default;

const ajv = new Ajv({ allErrors: true, coerceTypes: true, strict: false });
const validateRawConfig = ajv.compile<RawGeneratorConfig>(RAW_CONFIG_SCHEMA);

export const DEFAULT_OPERATIONS: readonly Operation[] = ["create"];
export const DEFAULT_GENERATE_TIME_MS = 1000;

function formatAjvError(error: ErrorObject): string {
  const path = error.instancePath || "/";
  if (error.keyword === "additionalProperties") {
    return `${path} has unknown key "${String(error.params.additionalProperty)}"`;
  }
  return `${path} ${error.message ?? error.keyword}`;
}

function parseDurationField(
  name: string,
  value: string | number | undefined,
  fallback: number,
  errors: string[],
): number {
  if (value === undefined || value === "") return fallback;
  try {
    return toMilliseconds(value);
  } catch (error) {
    errors.push(
      `"${name}" duration cannot be parsed: ${error instanceof Error ? error.message : String(error)}`,
    );
    return fallback;
  }
}

export function parseOperations(
  raw: string | string[] | undefined,
  errors: string[],
): Operation[] {
  if (raw === undefined) return [...DEFAULT_OPERATIONS];

  const items = typeof raw === "string" ? raw.split(",") : raw;
  if (items.length === 0 || (typeof raw === "string" && raw.trim() === "")) {
    errors.push("at least one operation is required");
    return [];
  }

  const operations: Operation[] = [];
  for (const item of items) {
    const name = item.trim().toLowerCase();
    if (isOperation(name)) {
      operations.push(name);
    } else {
      errors.push(`failed parsing operation: unknown operation "${item.trim()}"`);
    }
  }
  return operations;
}

export function parseFields(
  options: Record<string, string> | undefined,
  errors: string[],
): FieldSpec {
  const fields: FieldSpec = {};
  for (const [name, rawType] of Object.entries(options ?? {})) {
    const type = rawType.trim().toLowerCase();
    if (name.trim() === "") {
      errors.push(`got empty field name in "${name}"`);
    } else if (type === "") {
      errors.push(`got empty type in "${name}"`);
    } else if (!isFieldType(type)) {
      errors.push(`unknown data type in "${name}"`);
    } else {
      fields[name] = type;
    }
  }
  return fields;
}

function parseFormat(
  raw: RawFormatConfig | undefined,
  errors: string[],
): FormatConfig | undefined {
  const type = raw?.type?.trim().toLowerCase() ?? "";
  const subject = raw?.schemaSubject?.trim();

  if (subject && type !== "structured") {
    errors.push(`"schemaSubject" is only supported by the structured format`);
  }

  switch (type) {
    case "file": {
      const path = (raw?.path ?? raw?.options?.path ?? "").trim();
      if (path === "") {
        errors.push("file path not specified");
        return undefined;
      }
      return { type, path };
    }
    case "raw":
    case "structured": {
      const fieldErrors: string[] = [];
      const fields = parseFields(raw?.options, fieldErrors);
      for (const message of fieldErrors) {
        errors.push(`failed parsing fields: ${message}`);
      }
      if (type === "structured" && subject) {
        return { type, fields, schemaSubject: subject };
      }
      return { type, fields };
    }
    default:
      errors.push(`unknown format type "${raw?.type ?? ""}"`);
      return undefined;
  }
}

function validateCollection(
  name: string,
  raw: RawCollectionConfig,
  errors: string[],
): CollectionConfig | undefined {
  const prefix =
    name === ""
      ? "failed validating default collection"
      : `failed validating collection "${name}"`;

  const collectionErrors: string[] = [];
  const operations = parseOperations(raw.operations, collectionErrors);

  const formatErrors: string[] = [];
  const format = parseFormat(raw.format, formatErrors);
  for (const message of formatErrors) {
    collectionErrors.push(`failed validating format: ${message}`);
  }

  for (const message of collectionErrors) {
    errors.push(`${prefix}: ${message}`);
  }
  if (collectionErrors.length > 0 || !format) return undefined;
  return { name, operations, format };
}

/**
 * Validate raw settings and produce the typed configuration.
 *
 * @throws ConfigError listing every problem found
 */
export function validateConfig(input: unknown): GeneratorConfig {
  const raw: unknown = structuredClone(input ?? {});
  if (!validateRawConfig(raw)) {
    const errors = (validateRawConfig.errors ?? []).map(formatAjvError);
    throw new ConfigError(`invalid configuration: ${errors.join("; ")}`, {
      errors,
    });
  }

  const errors: string[] = [];

  const recordCount = raw.recordCount ?? 0;
  if (recordCount < 0) {
    errors.push(`"recordCount" should be greater or equal to 0`);
  }

  const rate = raw.rate ?? 0;
  if (rate < 0 || !Number.isFinite(rate)) {
    errors.push(`"rate" should be a finite number greater or equal to 0`);
  }

  const readTimeMs = parseDurationField("readTime", raw.readTime, 0, errors);
  if (readTimeMs < 0) {
    errors.push(`"readTime" should be greater or equal to 0`);
  }
  if (readTimeMs > 0 && rate > 0) {
    errors.push(
      `cannot specify both "readTime" and "rate", "readTime" is deprecated, please only specify "rate"`,
    );
  }

  const sleepTimeMs = parseDurationField(
    "burst.sleepTime",
    raw.burst?.sleepTime,
    0,
    errors,
  );
  const generateTimeMs = parseDurationField(
    "burst.generateTime",
    raw.burst?.generateTime,
    DEFAULT_GENERATE_TIME_MS,
    errors,
  );
  if (sleepTimeMs < 0) {
    errors.push(`"burst.sleepTime" should be greater or equal to 0`);
  }
  if (sleepTimeMs > 0 && generateTimeMs <= 0) {
    errors.push(`"burst.generateTime" should be greater than 0`);
  }

  const entries: [string, RawCollectionConfig][] = [];
  if (raw.format?.type) {
    entries.push(["", { operations: raw.operations, format: raw.format }]);
  }
  for (const [name, collection] of Object.entries(raw.collections ?? {})) {
    if (name.trim() === "") {
      errors.push("collection names must not be empty");
      continue;
    }
    entries.push([name, collection]);
  }
  if (entries.length === 0) {
    errors.push(
      "please configure at least one collection using `format.type` or `collections.*.format.type`",
    );
  }

  const collections: CollectionConfig[] = [];
  for (const [name, collection] of entries) {
    const validated = validateCollection(name, collection, errors);
    if (validated) collections.push(validated);
  }

  if (errors.length > 0) {
    throw new ConfigError(`invalid configuration: ${errors.join("; ")}`, {
      errors,
    });
  }

  if (readTimeMs > 0) {
    logger.warn(`"readTime" is deprecated, please use "rate"`, { readTimeMs });
  }

  return {
    recordCount,
    rate,
    readTimeMs,
    burst: { sleepTimeMs, generateTimeMs },
    collections,
    ...(raw.seed !== undefined ? { seed: raw.seed } : {}),
  };
}
