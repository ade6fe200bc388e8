import { createWriteStream } from "fs";
import { Readable, Transform, TransformCallback, Writable, pipeline } from "stream";
import { promisify } from "util";
import { FileIOError } from "../../utils/errors.js";
import { createJSONWriter } from "./json-writer.js";
import { createNDJSONWriter } from "./ndjson-writer.js";
import type { EmitterOptions, EmitterResult } from "./types.js";

const pipelineAsync = promisify(pipeline);

/**
 * Object-mode pass-through that counts what flows by
 */
class CountingStream extends Transform {
  count = 0;

  constructor() {
    super({ objectMode: true });
  }

  _transform(chunk: unknown, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.count++;
    callback(null, chunk);
  }
}

/**
 * Write a record stream to a file or stdout in the requested format.
 */
export async function emitRecords(
  records: Readable,
  options: EmitterOptions,
  stdout: Writable = process.stdout,
): Promise<EmitterResult> {
  const counter = new CountingStream();
  const writer =
    options.format === "json" ? createJSONWriter() : createNDJSONWriter();
  const output =
    options.destination === "stdout"
      ? stdout
      : createWriteStream(options.destination);

  try {
    await pipelineAsync(records, counter, writer, output);
  } catch (error) {
    if (options.destination !== "stdout" && isSystemError(error)) {
      throw new FileIOError(
        `failed to write output: ${options.destination}`,
        { destination: options.destination },
        { cause: error },
      );
    }
    throw error;
  }

  return { written: counter.count, destination: options.destination };
}

function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && "syscall" in error;
}
