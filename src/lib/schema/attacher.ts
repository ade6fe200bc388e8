import type { FieldSpec, GeneratedRecord } from "../../types/cdc.js";
import { MetadataKey } from "../../types/cdc.js";
import type { RecordPostProcessor } from "../generator/record-generator.js";
import { deriveJsonSchema } from "./json-schema.js";
import type { SchemaRef, SchemaRegistry } from "./types.js";

export interface SchemaAttacherOptions {
  subject: string;
  /** Named collections prefix the subject, e.g. "users.payload". */
  collection: string;
  fields: FieldSpec;
}

export class SchemaAttacher implements RecordPostProcessor {
  constructor(readonly ref: SchemaRef) {}

  process(record: GeneratedRecord): GeneratedRecord {
    record.metadata[MetadataKey.SchemaSubject] = this.ref.subject;
    record.metadata[MetadataKey.SchemaVersion] = String(this.ref.version);
    return record;
  }
}

/**
 * Register the payload schema for a collection and return a post-processor
 * that tags each record with it.
 */
export async function createSchemaAttacher(
  registry: SchemaRegistry,
  options: SchemaAttacherOptions,
): Promise<SchemaAttacher> {
  const subject =
    options.collection !== ""
      ? `${options.collection}.${options.subject}`
      : options.subject;

  const ref = await registry.register(
    subject,
    deriveJsonSchema(options.fields, subject),
  );
  return new SchemaAttacher(ref);
}
