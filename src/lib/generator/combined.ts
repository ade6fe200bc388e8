import type { Faker } from "@faker-js/faker";
import type { GeneratedRecord } from "../../types/cdc.js";
import { ConfigError } from "../../utils/errors.js";
import { createFaker } from "../synthesizer/field-values.js";
import type { RecordGenerator } from "./record-generator.js";

/**
 * Combine several record generators into one that picks a generator at
 * random for every record.
 *
 * Positions are prefixed with the generator's index, zero-padded to a fixed
 * width so that index/counter pairs cannot run into each other (with twelve
 * generators, index 1 becomes "01", never plain "1").
 */
export function combine(
  generators: readonly RecordGenerator[],
  random: Faker = createFaker(),
): RecordGenerator {
  const [first, ...rest] = generators;
  if (first === undefined) {
    throw new ConfigError("at least one record generator is required");
  }
  if (rest.length === 0) {
    return first;
  }
  return new CombinedRecordGenerator(generators, random);
}

export class CombinedRecordGenerator implements RecordGenerator {
  private readonly generators: readonly RecordGenerator[];
  private readonly random: Faker;
  private readonly prefixWidth: number;

  constructor(generators: readonly RecordGenerator[], random: Faker) {
    this.generators = [...generators];
    this.random = random;
    this.prefixWidth = String(generators.length - 1).length;
  }

  next(): GeneratedRecord {
    const index = this.random.number.int({
      min: 0,
      max: this.generators.length - 1,
    });
    const generator = this.generators[index];
    if (generator === undefined) {
      throw new RangeError(`generator index ${index} out of range`);
    }

    const record = generator.next();
    record.position = this.prefix(index) + record.position;
    return record;
  }

  private prefix(index: number): string {
    return String(index).padStart(this.prefixWidth, "0");
  }
}
