/**
 * JSON array writer - Transform stream that converts records to a JSON array
 */

import { Transform, TransformCallback } from "stream";
import type { GeneratedRecord } from "../../types/cdc.js";
import { serializeRecord } from "./record-serializer.js";

/**
 * Writes "[" at start, comma-separated records, and "]" at end
 */
export class JSONWriter extends Transform {
  private isFirstItem = true;

  constructor() {
    super({
      writableObjectMode: true,
      readableObjectMode: false,
    });
  }

  _construct(callback: (error?: Error | null) => void): void {
    this.push("[\n");
    callback();
  }

  _transform(
    chunk: GeneratedRecord,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    try {
      const json = JSON.stringify(serializeRecord(chunk));
      this.push(this.isFirstItem ? "  " + json : ",\n  " + json);
      this.isFirstItem = false;
      callback();
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
    }
  }

  _flush(callback: TransformCallback): void {
    this.push(this.isFirstItem ? "]\n" : "\n]\n");
    callback();
  }
}

/**
 * Create a JSON array writer transform stream
 */
export function createJSONWriter(): Transform {
  return new JSONWriter();
}
