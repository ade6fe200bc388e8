/**
 * Per-collection record generation
 */

import type {
  GeneratedRecord,
  Operation,
  Payload,
} from "../../types/cdc.js";
import { MetadataKey, rawData } from "../../types/cdc.js";
import type { CollectionConfig } from "../../types/config.js";
import { ConfigError } from "../../utils/errors.js";
import { createFaker, FieldValueSynthesizer } from "../synthesizer/field-values.js";
import {
  createPayloadSynthesizer,
  type PayloadSynthesizer,
} from "../synthesizer/payload.js";

export interface RecordGenerator {
  /** Generate the next record. */
  next(): GeneratedRecord;
}

/**
 * Extension point applied to every finished record, e.g. to attach a schema.
 */
export interface RecordPostProcessor {
  process(record: GeneratedRecord): GeneratedRecord;
}

export interface CollectionRecordGeneratorOptions {
  collection: string;
  operations: readonly Operation[];
  payload: PayloadSynthesizer;
  values: FieldValueSynthesizer;
  postProcessor?: RecordPostProcessor;
}

export class CollectionRecordGenerator implements RecordGenerator {
  readonly collection: string;
  private readonly operations: readonly Operation[];
  private readonly payload: PayloadSynthesizer;
  private readonly values: FieldValueSynthesizer;
  private readonly postProcessor?: RecordPostProcessor;
  private count = 0;

  constructor(options: CollectionRecordGeneratorOptions) {
    if (options.operations.length === 0) {
      throw new ConfigError(
        `collection "${options.collection}" needs at least one operation`,
      );
    }
    this.collection = options.collection;
    this.operations = [...options.operations];
    this.payload = options.payload;
    this.values = options.values;
    this.postProcessor = options.postProcessor;
  }

  /** Number of records generated so far. */
  get generated(): number {
    return this.count;
  }

  next(): GeneratedRecord {
    this.count++;

    const metadata: Record<string, string> = {
      [MetadataKey.CreatedAt]: new Date().toISOString(),
    };
    if (this.collection !== "") {
      metadata[MetadataKey.Collection] = this.collection;
    }

    const operation = this.values.pick(this.operations);
    const record: GeneratedRecord = {
      position: String(this.count),
      operation,
      metadata,
      key: rawData(this.values.randomWord()),
      payload: this.payloadFor(operation),
    };

    return this.postProcessor ? this.postProcessor.process(record) : record;
  }

  private payloadFor(operation: Operation): Payload {
    switch (operation) {
      case "create":
      case "snapshot":
        return { after: this.payload.next() };
      case "update":
        return { before: this.payload.next(), after: this.payload.next() };
      case "delete":
        return { before: this.payload.next() };
    }
  }
}

/**
 * Build the generator for one configured collection. Fails before any record
 * is produced if the payload cannot be prepared (e.g. missing file).
 */
export async function createCollectionGenerator(
  config: CollectionConfig,
  options: { seed?: number; postProcessor?: RecordPostProcessor } = {},
): Promise<CollectionRecordGenerator> {
  const values = new FieldValueSynthesizer(createFaker(options.seed));
  const payload = await createPayloadSynthesizer(config.format, values);

  return new CollectionRecordGenerator({
    collection: config.name,
    operations: config.operations,
    payload,
    values,
    postProcessor: options.postProcessor,
  });
}
