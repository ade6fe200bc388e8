/**
 * Change records produced by the generator
 */

export const OPERATIONS = ["create", "update", "delete", "snapshot"] as const;

export type Operation = (typeof OPERATIONS)[number];

export function isOperation(value: string): value is Operation {
  return OPERATIONS.some((operation) => operation === value);
}

export const KNOWN_FIELD_TYPES = [
  "int",
  "string",
  "time",
  "bool",
  "duration",
] as const;

export type FieldType = (typeof KNOWN_FIELD_TYPES)[number];

export function isFieldType(value: string): value is FieldType {
  return KNOWN_FIELD_TYPES.some((type) => type === value);
}

/**
 * Field name to field type. Insertion order is the payload's key order.
 */
export type FieldSpec = Record<string, FieldType>;

export type FieldValue = number | string | boolean | Date;

export interface RawData {
  kind: "raw";
  bytes: Buffer;
}

export interface StructuredData {
  kind: "structured";
  fields: Record<string, FieldValue>;
}

export type RecordData = RawData | StructuredData;

export function rawData(bytes: Buffer | string): RawData {
  return {
    kind: "raw",
    bytes: typeof bytes === "string" ? Buffer.from(bytes, "utf8") : bytes,
  };
}

export function structuredData(fields: Record<string, FieldValue>): StructuredData {
  return { kind: "structured", fields };
}

export const MetadataKey = {
  CreatedAt: "createdAt",
  Collection: "collection",
  SchemaSubject: "payload.schema.subject",
  SchemaVersion: "payload.schema.version",
} as const;

export type Metadata = Record<string, string>;

export interface Payload {
  before?: RecordData;
  after?: RecordData;
}

export interface GeneratedRecord {
  /** Unique per generator; prefixed with the collection index once combined. */
  position: string;
  operation: Operation;
  metadata: Metadata;
  key: RawData;
  payload: Payload;
}
