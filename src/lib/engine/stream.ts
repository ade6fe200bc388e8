/**
 * Streaming record generation
 */

import { Readable } from "stream";
import type { GeneratedRecord } from "../../types/cdc.js";
import { isCancelled } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { GeneratorEngine } from "./engine.js";

/**
 * Object-mode readable that pulls records from an engine.
 *
 * The stream ends once the engine's record count is reached or the given
 * signal aborts; destroying the stream cancels a pull in progress.
 */
export class RecordStream extends Readable {
  private readonly engine: GeneratorEngine;
  private readonly controller = new AbortController();
  private readonly hostSignal?: AbortSignal;
  private readonly onAbort = () => this.controller.abort(this.hostSignal?.reason);

  constructor(engine: GeneratorEngine, signal?: AbortSignal) {
    super({ objectMode: true, highWaterMark: 1 });
    this.engine = engine;
    this.hostSignal = signal;

    if (signal?.aborted) {
      this.controller.abort(signal.reason);
    } else {
      signal?.addEventListener("abort", this.onAbort, { once: true });
    }
  }

  async _read(): Promise<void> {
    if (this.engine.exhausted) {
      this.push(null);
      return;
    }

    let record: GeneratedRecord;
    try {
      record = await this.engine.pull(this.controller.signal);
    } catch (error) {
      if (isCancelled(error)) {
        logger.debug("Record stream cancelled", {
          produced: this.engine.produced,
        });
        this.push(null);
        return;
      }
      this.destroy(error instanceof Error ? error : new Error(String(error)));
      return;
    }
    this.push(record);
  }

  _destroy(
    error: Error | null,
    callback: (error?: Error | null) => void,
  ): void {
    this.hostSignal?.removeEventListener("abort", this.onAbort);
    this.controller.abort();
    callback(error);
  }
}

export function createRecordStream(
  engine: GeneratorEngine,
  signal?: AbortSignal,
): RecordStream {
  return new RecordStream(engine, signal);
}

/**
 * Pull records as an async iterable until the engine is exhausted or the
 * signal aborts.
 */
export async function* pullRecords(
  engine: GeneratorEngine,
  signal: AbortSignal,
): AsyncGenerator<GeneratedRecord> {
  while (!engine.exhausted) {
    try {
      yield await engine.pull(signal);
    } catch (error) {
      if (isCancelled(error)) return;
      throw error;
    }
  }
}
