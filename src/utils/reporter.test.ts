import { describe, expect, it } from 'vitest';
import { createSnapshot } from '../core/snapshot.js';
import { renderDifferenceTable, summarizeDifferences, summarizeRetrieval } from './reporter.js';

describe('reporter', () => {
  it('lists each difference with its readable label', () => {
    const table = renderDifferenceTable([
      { type: 'TYPE_MISMATCH', table: 'orders', column: 'status', expected: 'VARCHAR(10)', actual: 'VARCHAR(20)' },
    ]);

    const row = table.split('\n').find(line => line.includes('orders'));
    expect(row?.split('│').map(cell => cell.trim()).filter(cell => cell.length > 0)).toEqual([
      'orders',
      'status',
      'Type Mismatch',
      'VARCHAR(10)',
      'VARCHAR(20)',
    ]);
  });

  it('announces identical schemas', () => {
    expect(summarizeDifferences([])).toBe('\n✅ No differences found. Schemas are identical.');
  });

  it('summarizes retrieval outcomes', () => {
    const snapshot = createSnapshot('DB_1', []);
    expect(summarizeRetrieval({ snapshot, ok: true, tableCount: 3 })).toBe('DB_1: retrieved 3 tables');
    expect(summarizeRetrieval({ snapshot, ok: false, tableCount: 0, error: 'Error connecting to DB_1: timeout' })).toBe(
      'DB_1: retrieval failed (Error connecting to DB_1: timeout)'
    );
  });
});
