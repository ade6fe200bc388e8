/**
 * JSON Schema for raw generator configuration (files and flat settings)
 */

const duration = { type: ["string", "number"] };

const operations = {
  type: ["array", "string"],
  items: { type: "string" },
};

const format = {
  type: "object",
  properties: {
    type: { type: "string" },
    options: {
      type: "object",
      additionalProperties: { type: "string" },
    },
    path: { type: "string" },
    schemaSubject: { type: "string" },
  },
  additionalProperties: false,
};

const collection = {
  type: "object",
  properties: {
    operations,
    format,
  },
  additionalProperties: false,
};

export const RAW_CONFIG_SCHEMA = {
  $schema: "http://json-schema.org/draft-07/schema#",
  type: "object",
  properties: {
    recordCount: { type: "integer" },
    rate: { type: "number" },
    readTime: duration,
    seed: { type: ["string", "number"] },
    burst: {
      type: "object",
      properties: {
        sleepTime: duration,
        generateTime: duration,
      },
      additionalProperties: false,
    },
    operations,
    format,
    collections: {
      type: "object",
      additionalProperties: collection,
    },
  },
  additionalProperties: false,
};
