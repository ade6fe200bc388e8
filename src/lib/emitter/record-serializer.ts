import type {
  FieldValue,
  GeneratedRecord,
  Metadata,
  Operation,
  RawData,
  RecordData,
} from "../../types/cdc.js";

export type SerializedFieldValue = string | number | boolean;

/** Raw bytes become base64, structured data stays an object. */
export type SerializedData = string | Record<string, SerializedFieldValue>;

export interface SerializedRecord {
  position: string;
  operation: Operation;
  metadata: Metadata;
  key: string;
  payload: {
    before: SerializedData | null;
    after: SerializedData | null;
  };
}

function serializeValue(value: FieldValue): SerializedFieldValue {
  return value instanceof Date ? value.toISOString() : value;
}

export function serializeRaw(data: RawData): string {
  return data.bytes.toString("base64");
}

export function serializeData(data: RecordData): SerializedData {
  if (data.kind === "raw") {
    return serializeRaw(data);
  }
  const fields: Record<string, SerializedFieldValue> = {};
  for (const [name, value] of Object.entries(data.fields)) {
    fields[name] = serializeValue(value);
  }
  return fields;
}

/**
 * JSON-ready form of a record.
 */
export function serializeRecord(record: GeneratedRecord): SerializedRecord {
  return {
    position: record.position,
    operation: record.operation,
    metadata: { ...record.metadata },
    key: serializeRaw(record.key),
    payload: {
      before: record.payload.before ? serializeData(record.payload.before) : null,
      after: record.payload.after ? serializeData(record.payload.after) : null,
    },
  };
}
