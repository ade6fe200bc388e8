/**
 * NDJSON Writer - Transform stream that converts records to NDJSON
 */

import { Transform, TransformCallback } from "stream";
import type { GeneratedRecord } from "../../types/cdc.js";
import { serializeRecord } from "./record-serializer.js";

/**
 * Transform stream that converts object-mode records to NDJSON lines
 */
export class NDJSONWriter extends Transform {
  constructor() {
    super({
      writableObjectMode: true, // Input is records
      readableObjectMode: false, // Output is strings
    });
  }

  _transform(
    chunk: GeneratedRecord,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    try {
      this.push(JSON.stringify(serializeRecord(chunk)) + "\n");
      callback();
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
    }
  }
}

/**
 * Create NDJSON writer transform stream
 */
export function createNDJSONWriter(): Transform {
  return new NDJSONWriter();
}
