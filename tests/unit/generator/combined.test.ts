import { describe, it, expect } from 'vitest';
import { CombinedRecordGenerator, combine } from '../../../src/lib/generator/combined.js';
import type { RecordGenerator } from '../../../src/lib/generator/record-generator.js';
import { createFaker } from '../../../src/lib/synthesizer/field-values.js';
import { MetadataKey, rawData, type GeneratedRecord } from '../../../src/types/cdc.js';
import { ConfigError } from '../../../src/utils/errors.js';

/** Numbers its records from one and tags them with its own name. */
class StubGenerator implements RecordGenerator {
  count = 0;

  constructor(readonly name: string) {}

  next(): GeneratedRecord {
    this.count++;
    return {
      position: String(this.count),
      operation: 'create',
      metadata: { [MetadataKey.Collection]: this.name },
      key: rawData('k'),
      payload: { after: rawData('v') },
    };
  }
}

function stubs(n: number): StubGenerator[] {
  return Array.from({ length: n }, (_, i) => new StubGenerator(String(i)));
}

describe('combine', () => {
  it('should reject an empty list', () => {
    expect(() => combine([])).toThrow(ConfigError);
  });

  it('should return a single generator unchanged', () => {
    const [only] = stubs(1);
    expect(only).toBeDefined();
    if (!only) return;

    const combined = combine([only]);
    expect(combined).toBe(only);
    expect(combined.next().position).toBe('1');
  });

  it('should combine several generators', () => {
    expect(combine(stubs(2))).toBeInstanceOf(CombinedRecordGenerator);
  });
});

describe('CombinedRecordGenerator', () => {
  it('should prefix positions with the index of the source generator', () => {
    const generators = stubs(3);
    const combined = combine(generators, createFaker(17));

    for (let i = 0; i < 50; i++) {
      const record = combined.next();
      const index = Number(record.metadata[MetadataKey.Collection]);
      const source = generators[index];
      expect(source).toBeDefined();
      expect(record.position).toBe(`${index}${source?.count}`);
    }
  });

  it('should zero-pad indexes when there are more than ten generators', () => {
    const generators = stubs(12);
    const combined = combine(generators, createFaker(23));

    for (let i = 0; i < 200; i++) {
      const record = combined.next();
      const index = Number(record.metadata[MetadataKey.Collection]);
      const own = generators[index]?.count;
      expect(record.position).toBe(`${String(index).padStart(2, '0')}${own}`);
    }
  });

  it('should never repeat a position', () => {
    const combined = combine(stubs(12), createFaker(31));
    const seen = new Set<string>();

    for (let i = 0; i < 3000; i++) {
      seen.add(combined.next().position);
    }
    expect(seen.size).toBe(3000);
  });

  it('should draw from every generator', () => {
    const generators = stubs(4);
    const combined = combine(generators, createFaker(41));

    for (let i = 0; i < 400; i++) {
      combined.next();
    }
    for (const generator of generators) {
      expect(generator.count).toBeGreaterThan(0);
    }
    expect(generators.reduce((sum, g) => sum + g.count, 0)).toBe(400);
  });
});
