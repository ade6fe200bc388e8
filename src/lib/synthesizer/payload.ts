/**
 * Payload synthesis: field-driven (raw or structured) or a cached file
 */

import fs from "fs/promises";
import type { FieldSpec, RecordData } from "../../types/cdc.js";
import { rawData, structuredData } from "../../types/cdc.js";
import type { FormatConfig, FormatType } from "../../types/config.js";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { FieldValueSynthesizer } from "./field-values.js";

export interface PayloadSynthesizer {
  readonly type: FormatType;
  next(): RecordData;
}

/**
 * Builds a fresh mapping per call and emits it either as a structured value
 * or as its JSON encoding.
 */
export class FieldPayloadSynthesizer implements PayloadSynthesizer {
  constructor(
    readonly type: "raw" | "structured",
    private readonly fields: FieldSpec,
    private readonly values: FieldValueSynthesizer,
  ) {}

  next(): RecordData {
    const mapping = this.values.synthesizeFields(this.fields);
    if (this.type === "structured") {
      return structuredData(mapping);
    }
    return rawData(JSON.stringify(mapping));
  }
}

/**
 * Returns the same bytes on every call, each time in a fresh buffer so that a
 * record mutated downstream cannot change later ones. The file is read once,
 * before the synthesizer exists, so reading never counts against generation
 * time.
 */
export class FilePayloadSynthesizer implements PayloadSynthesizer {
  readonly type = "file";

  constructor(private readonly bytes: Buffer) {}

  static async load(path: string): Promise<FilePayloadSynthesizer> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(path);
    } catch (error) {
      throw new FileIOError(
        `failed to read payload file: ${path}`,
        { path },
        { cause: error },
      );
    }
    logger.debug("Cached payload file", { path, bytes: bytes.length });
    return new FilePayloadSynthesizer(bytes);
  }

  next(): RecordData {
    return rawData(Buffer.from(this.bytes));
  }
}

/**
 * Pick the payload strategy for a collection once, at construction.
 */
export async function createPayloadSynthesizer(
  format: FormatConfig,
  values: FieldValueSynthesizer,
): Promise<PayloadSynthesizer> {
  switch (format.type) {
    case "file":
      return FilePayloadSynthesizer.load(format.path);
    case "raw":
    case "structured":
      return new FieldPayloadSynthesizer(format.type, format.fields, values);
  }
}
