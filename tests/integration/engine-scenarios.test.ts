/**
 * End-to-end pull scenarios through buildEngine with a virtual clock
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { buildEngine, type GeneratorEngine } from '../../src/lib/engine/engine.js';
import { InMemorySchemaRegistry } from '../../src/lib/schema/registry.js';
import { MetadataKey, type GeneratedRecord } from '../../src/types/cdc.js';
import type { GeneratorConfig } from '../../src/types/config.js';
import { CancelledError, FileIOError } from '../../src/utils/errors.js';

function configWith(overrides: Partial<GeneratorConfig>): GeneratorConfig {
  return {
    recordCount: 0,
    rate: 0,
    readTimeMs: 0,
    burst: { sleepTimeMs: 0, generateTimeMs: 1000 },
    collections: [{ name: '', operations: ['create'], format: { type: 'raw', fields: { id: 'int' } } }],
    ...overrides,
  };
}

async function pullAt(
  engine: GeneratorEngine,
  at: number,
  signal: AbortSignal,
): Promise<{ record: GeneratedRecord; waited: number }> {
  vi.setSystemTime(at);
  const pending = engine.pull(signal);
  await vi.runAllTimersAsync();
  const record = await pending;
  return { record, waited: Date.now() - at };
}

function summary(record: GeneratedRecord) {
  return {
    position: record.position,
    operation: record.operation,
    key: record.key.bytes.toString('utf8'),
    after: record.payload.after?.kind === 'raw' ? record.payload.after.bytes.toString('utf8') : undefined,
    before: record.payload.before?.kind === 'raw' ? record.payload.before.bytes.toString('utf8') : undefined,
  };
}

describe('engine scenarios', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should alternate generating and sleeping windows', async () => {
    const engine = await buildEngine(
      configWith({ burst: { sleepTimeMs: 100, generateTimeMs: 150 } }),
    );
    const { signal } = new AbortController();

    for (const at of [0, 50, 100, 125]) {
      expect((await pullAt(engine, at, signal)).waited).toBe(0);
    }
    // the window closed at 150, the next one opens at 250
    expect((await pullAt(engine, 150, signal)).waited).toBe(100);
    expect((await pullAt(engine, 300, signal)).waited).toBe(0);
    expect((await pullAt(engine, 420, signal)).waited).toBe(80);
    expect(engine.produced).toBe(7);
  });

  it('should space pulls by the configured rate', async () => {
    const engine = await buildEngine(configWith({ rate: 20 }));
    const { signal } = new AbortController();

    const waits: number[] = [];
    for (let i = 0; i < 4; i++) {
      waits.push((await pullAt(engine, Date.now(), signal)).waited);
    }

    expect(waits).toEqual([0, 50, 50, 50]);
  });

  it('should turn the deprecated read time into a rate', async () => {
    const engine = await buildEngine(configWith({ readTimeMs: 200 }));
    const { signal } = new AbortController();

    await pullAt(engine, 0, signal);
    expect((await pullAt(engine, 0, signal)).waited).toBe(200);
  });

  it('should block after the record count until cancelled', async () => {
    const engine = await buildEngine(configWith({ recordCount: 3 }));
    const controller = new AbortController();

    for (let i = 0; i < 3; i++) {
      await pullAt(engine, 0, controller.signal);
    }

    let settled = false;
    const pending = engine.pull(controller.signal);
    pending.then(
      () => {
        settled = true;
      },
      () => {
        settled = true;
      },
    );
    await vi.advanceTimersByTimeAsync(10_000);
    expect(settled).toBe(false);

    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(engine.produced).toBe(3);
  });

  it('should combine collections with unique positions and attach schemas', async () => {
    const registry = new InMemorySchemaRegistry();
    const engine = await buildEngine(
      configWith({
        seed: 'test-seed',
        collections: [
          {
            name: 'users',
            operations: ['create', 'update', 'delete'],
            format: { type: 'structured', fields: { id: 'int', name: 'string' }, schemaSubject: 'payload' },
          },
          { name: '', operations: ['snapshot'], format: { type: 'raw', fields: { id: 'int' } } },
        ],
      }),
      { schemaRegistry: registry },
    );
    const { signal } = new AbortController();

    const positions = new Set<string>();
    const seen = new Set<string>();
    for (let i = 0; i < 300; i++) {
      const record = await engine.pull(signal);
      positions.add(record.position);

      const collection = record.metadata[MetadataKey.Collection] ?? '';
      seen.add(collection);
      if (collection === 'users') {
        // the default collection sorts first, so users is index 1
        expect(record.position.startsWith('1')).toBe(true);
        expect(record.metadata[MetadataKey.SchemaSubject]).toBe('users.payload');
        expect(record.metadata[MetadataKey.SchemaVersion]).toBe('1');
        const data = record.payload.after ?? record.payload.before;
        expect(data?.kind).toBe('structured');
        if (data?.kind === 'structured') {
          expect(registry.validate({ subject: 'users.payload', version: 1 }, data.fields)).toEqual([]);
        }
      } else {
        expect(record.position.startsWith('0')).toBe(true);
        expect(record.operation).toBe('snapshot');
        expect(record.metadata[MetadataKey.SchemaSubject]).toBeUndefined();
      }
    }

    expect(positions.size).toBe(300);
    expect([...seen].sort()).toEqual(['', 'users']);
    expect(registry.get({ subject: 'users.payload', version: 1 })).toBeDefined();
  });

  it('should repeat the record sequence for the same seed', async () => {
    const config = configWith({
      seed: 42,
      collections: [
        { name: 'a', operations: ['create', 'update'], format: { type: 'raw', fields: { id: 'int', n: 'string' } } },
        { name: 'b', operations: ['delete'], format: { type: 'raw', fields: { ok: 'bool' } } },
      ],
    });
    const first = await buildEngine(config);
    const second = await buildEngine(config);
    const { signal } = new AbortController();

    for (let i = 0; i < 50; i++) {
      expect(summary(await first.pull(signal))).toEqual(summary(await second.pull(signal)));
    }
  });

  it('should fail before producing anything when a payload file is missing', async () => {
    await expect(
      buildEngine(
        configWith({
          collections: [
            { name: 'files', operations: ['create'], format: { type: 'file', path: '/nonexistent/burstgen/payload.bin' } },
          ],
        }),
      ),
    ).rejects.toBeInstanceOf(FileIOError);
  });
});
