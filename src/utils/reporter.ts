import Table from 'cli-table3';
import type { SchemaDiff } from '../types/comparison.js';
import type { SnapshotResult } from '../types/index.js';
import { toDiffRow } from './exporter.js';

export function renderDifferenceTable(diffs: readonly SchemaDiff[]): string {
  const table = new Table({
    head: ['Table', 'Column', 'Difference Type', 'DB1 Value', 'DB2 Value'],
    style: { head: [], border: [] },
    wordWrap: true,
  });

  for (const diff of diffs) {
    const row = toDiffRow(diff);
    table.push([row.table, row.column, row.type, row.expected, row.actual]);
  }

  return table.toString();
}

export function summarizeDifferences(diffs: readonly SchemaDiff[]): string {
  if (diffs.length === 0) return '\n✅ No differences found. Schemas are identical.';
  return `\n❌ Found ${diffs.length} differences:\n\n${renderDifferenceTable(diffs)}`;
}

export function summarizeRetrieval(result: SnapshotResult): string {
  if (result.ok) return `${result.snapshot.source}: retrieved ${result.tableCount} tables`;
  return `${result.snapshot.source}: retrieval failed (${result.error ?? 'unknown error'})`;
}
