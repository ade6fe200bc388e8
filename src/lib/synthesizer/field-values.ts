/**
 * Random field values backed by a per-instance @faker-js/faker generator
 */

import { Faker, base, en } from "@faker-js/faker";
import type { FieldSpec, FieldType, FieldValue } from "../../types/cdc.js";
import { ContractViolationError } from "../../utils/errors.js";

/** Exclusive upper bound of generated durations, in seconds. */
export const MAX_DURATION_SECONDS = 1000;

/**
 * Create an isolated faker instance. Seeded instances repeat their sequence.
 */
export function createFaker(seed?: number): Faker {
  const faker = new Faker({ locale: [en, base] });
  if (seed !== undefined) {
    faker.seed(seed);
  }
  return faker;
}

export class FieldValueSynthesizer {
  readonly faker: Faker;

  constructor(faker: Faker = createFaker()) {
    this.faker = faker;
  }

  /**
   * Produce one value for the given type.
   *
   * @throws ContractViolationError for a type that escaped config validation
   */
  synthesize(type: FieldType, field = "<unnamed>"): FieldValue {
    switch (type) {
      case "int":
        return this.faker.number.int();
      case "string":
        return this.randomWord();
      case "time":
        return new Date();
      case "bool":
        return this.faker.datatype.boolean();
      case "duration":
        // whole seconds, reported in milliseconds
        return (
          this.faker.number.int({ min: 0, max: MAX_DURATION_SECONDS - 1 }) *
          1000
        );
      default: {
        const unknownType: never = type;
        throw new ContractViolationError(
          `field "${field}" contains invalid type: ${String(unknownType)}`,
          { field, type: unknownType },
        );
      }
    }
  }

  synthesizeFields(spec: FieldSpec): Record<string, FieldValue> {
    const values: Record<string, FieldValue> = {};
    for (const [field, type] of Object.entries(spec)) {
      values[field] = this.synthesize(type, field);
    }
    return values;
  }

  randomWord(): string {
    return this.faker.word.sample();
  }

  pick<T>(items: readonly T[]): T {
    return this.faker.helpers.arrayElement(items);
  }
}
