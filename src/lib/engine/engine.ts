/**
 * Pull orchestration: record ceiling, synthesis, burst wait, rate limit
 */

import type { GeneratedRecord } from "../../types/cdc.js";
import type { CollectionConfig, GeneratorConfig } from "../../types/config.js";
import { formatDuration } from "../../utils/duration.js";
import { logger } from "../../utils/logger.js";
import { deriveSeed } from "../../utils/seed-manager.js";
import { combine } from "../generator/combined.js";
import {
  createCollectionGenerator,
  type RecordGenerator,
  type RecordPostProcessor,
} from "../generator/record-generator.js";
import { createSchemaAttacher } from "../schema/attacher.js";
import { InMemorySchemaRegistry } from "../schema/registry.js";
import type { SchemaRegistry } from "../schema/types.js";
import { BurstScheduler } from "../scheduler/burst-scheduler.js";
import { throwIfCancelled, waitForAbort } from "../utils/abort.js";
import { RateLimiter, resolveRateLimit } from "../utils/rate-limiter.js";
import { createFaker } from "../synthesizer/field-values.js";

export interface EngineOptions {
  /** Receives payload schemas of collections with a schema subject. */
  schemaRegistry?: SchemaRegistry;
}

export class GeneratorEngine {
  private readonly generator: RecordGenerator;
  private readonly burst: BurstScheduler;
  private readonly limiter: RateLimiter;
  private readonly recordCount: number;
  private producedCount = 0;
  private exhaustionLogged = false;
  /** One shared wait per signal once the ceiling is reached. */
  private exhaustion?: { signal: AbortSignal; done: Promise<never> };

  constructor(
    generator: RecordGenerator,
    burst: BurstScheduler,
    limiter: RateLimiter,
    recordCount = 0,
  ) {
    this.generator = generator;
    this.burst = burst;
    this.limiter = limiter;
    this.recordCount = recordCount;
  }

  /** Records returned so far. */
  get produced(): number {
    return this.producedCount;
  }

  /** True once a non-zero record ceiling has been reached. */
  get exhausted(): boolean {
    return this.recordCount > 0 && this.producedCount >= this.recordCount;
  }

  /**
   * Produce the next record.
   *
   * Once the record ceiling is reached this never resolves: it blocks until
   * `signal` aborts, like a source that has nothing more to offer.
   *
   * @throws CancelledError when `signal` aborts, before or during a wait
   */
  async pull(signal: AbortSignal): Promise<GeneratedRecord> {
    throwIfCancelled(signal);

    if (this.exhausted) {
      if (!this.exhaustionLogged) {
        logger.info("Record count reached, waiting for shutdown", {
          recordCount: this.recordCount,
        });
        this.exhaustionLogged = true;
      }
      let exhaustion = this.exhaustion;
      if (exhaustion?.signal !== signal) {
        exhaustion = { signal, done: waitForAbort(signal) };
        this.exhaustion = exhaustion;
      }
      return exhaustion.done;
    }

    // Synthesize before waiting so generation cost is not added to the delay.
    const record = this.generator.next();

    await this.burst.wait(signal);
    await this.limiter.wait(signal);

    this.producedCount++;
    if (this.producedCount % 1000 === 0) {
      logger.debug("Generated records", { count: this.producedCount });
    }
    return record;
  }
}

function byCollectionName(a: CollectionConfig, b: CollectionConfig): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

async function postProcessorFor(
  collection: CollectionConfig,
  registry: SchemaRegistry,
): Promise<RecordPostProcessor | undefined> {
  const { format } = collection;
  if (format.type !== "structured" || !format.schemaSubject) {
    return undefined;
  }
  return createSchemaAttacher(registry, {
    subject: format.schemaSubject,
    collection: collection.name,
    fields: format.fields,
  });
}

/**
 * Wire collections, burst schedule and rate limiter from a validated config.
 * Collections are ordered by name (the default collection first), which fixes
 * the index each one contributes to combined positions.
 *
 * @throws FileIOError, SchemaError or ConfigError; no engine is returned then
 */
export async function buildEngine(
  config: GeneratorConfig,
  options: EngineOptions = {},
): Promise<GeneratorEngine> {
  const collections = [...config.collections].sort(byCollectionName);
  const registry = options.schemaRegistry ?? new InMemorySchemaRegistry();

  const generators: RecordGenerator[] = [];
  for (const collection of collections) {
    try {
      const postProcessor = await postProcessorFor(collection, registry);
      generators.push(
        await createCollectionGenerator(collection, {
          seed: deriveSeed(config.seed, `collection:${collection.name}`),
          postProcessor,
        }),
      );
    } catch (error) {
      logger.error("Failed to create record generator", {
        collection: collection.name,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  const generator = combine(
    generators,
    createFaker(deriveSeed(config.seed, "combinator")),
  );
  const burst = new BurstScheduler(config.burst);
  const rate = resolveRateLimit(config.rate, config.readTimeMs);
  const limiter = new RateLimiter(rate);

  logger.info("Generator engine ready", {
    collections: collections.map((c) => c.name || "<default>"),
    recordCount: config.recordCount || "unlimited",
    rate: rate || "unlimited",
    burst: burst.enabled
      ? {
          sleepTime: formatDuration(config.burst.sleepTimeMs),
          generateTime: formatDuration(config.burst.generateTimeMs),
        }
      : "disabled",
  });

  return new GeneratorEngine(generator, burst, limiter, config.recordCount);
}
