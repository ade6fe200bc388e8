/**
 * Schema module types
 */

export type JsonSchemaProperty = {
  type: "integer" | "string" | "boolean";
  minimum?: number;
  maximum?: number;
  description?: string;
};

export type PayloadJsonSchema = {
  $schema: string;
  title?: string;
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
  additionalProperties: false;
};

export interface SchemaRef {
  subject: string;
  version: number;
}

/**
 * Stores payload schemas by subject. Registering a schema identical to an
 * existing version of the subject returns that version.
 */
export interface SchemaRegistry {
  register(subject: string, schema: PayloadJsonSchema): Promise<SchemaRef>;
}
