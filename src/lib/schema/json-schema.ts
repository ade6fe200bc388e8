import type { FieldSpec, FieldType } from "../../types/cdc.js";
import { MAX_DURATION_SECONDS } from "../synthesizer/field-values.js";
import type { JsonSchemaProperty, PayloadJsonSchema } from "./types.js";

export const JSON_SCHEMA_DRAFT_07 = "http://json-schema.org/draft-07/schema#";

const PROPERTY_BY_TYPE: Record<FieldType, JsonSchemaProperty> = {
  int: { type: "integer", minimum: 0 },
  string: { type: "string" },
  time: { type: "string", description: "ISO-8601 timestamp (UTC)" },
  bool: { type: "boolean" },
  duration: {
    type: "integer",
    minimum: 0,
    maximum: (MAX_DURATION_SECONDS - 1) * 1000,
    description: "milliseconds",
  },
};

/**
 * JSON Schema describing the payloads generated for a field spec, as they
 * look once serialized.
 */
export function deriveJsonSchema(
  fields: FieldSpec,
  title?: string,
): PayloadJsonSchema {
  const properties: Record<string, JsonSchemaProperty> = {};
  for (const [name, type] of Object.entries(fields)) {
    properties[name] = { ...PROPERTY_BY_TYPE[type] };
  }

  return {
    $schema: JSON_SCHEMA_DRAFT_07,
    ...(title ? { title } : {}),
    type: "object",
    properties,
    required: Object.keys(fields),
    additionalProperties: false,
  };
}
