import { rawData, structuredData, type GeneratedRecord } from '../../../src/types/cdc.js';

export function createRecord(position: string, key: string, id: number): GeneratedRecord {
  return {
    position,
    operation: 'create',
    metadata: { createdAt: '2025-01-01T00:00:00.000Z' },
    key: rawData(key),
    payload: { after: rawData(JSON.stringify({ id })) },
  };
}

export function createStructuredUpdate(): GeneratedRecord {
  return {
    position: '7',
    operation: 'update',
    metadata: { collection: 'users' },
    key: rawData('gamma'),
    payload: {
      before: structuredData({ id: 1, seen: new Date('2025-01-01T00:00:00Z'), active: false }),
      after: structuredData({ id: 1, seen: new Date('2025-01-02T00:00:00Z'), active: true }),
    },
  };
}
