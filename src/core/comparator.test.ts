import { describe, expect, it } from 'vitest';
import { column } from '../testing/fakes.js';
import type { InspectedColumn } from '../types/index.js';
import { compareSnapshots, SchemaComparator } from './comparator.js';
import { createSnapshot } from './snapshot.js';

function snapshot(source: string, tables: Record<string, InspectedColumn[]>) {
  return createSnapshot(source, Object.entries(tables).map(([table, columns]) => ({ table, columns })));
}

const users = {
  users: [column('id', 'INT4', false), column('name', 'VARCHAR', true)],
};

describe('compareSnapshots', () => {
  it('returns nothing when the master is empty', () => {
    expect(compareSnapshots(snapshot('DB_1', {}), snapshot('DB_2', users))).toEqual([]);
    expect(compareSnapshots(snapshot('DB_1', {}), snapshot('DB_2', {}))).toEqual([]);
  });

  it('reports every master table as missing against an empty target', () => {
    const master = snapshot('DB_1', { ...users, orders: [column('id', 'INT4', false)] });

    expect(compareSnapshots(master, snapshot('DB_2', {}))).toEqual([
      { type: 'MISSING_TABLE', table: 'users', column: 'ALL', expected: 'Exists', actual: 'Missing' },
      { type: 'MISSING_TABLE', table: 'orders', column: 'ALL', expected: 'Exists', actual: 'Missing' },
    ]);
  });

  it('finds no differences between a schema and itself', () => {
    const master = snapshot('DB_1', {
      ...users,
      orders: [column('id', 'INT4', false), column('status', 'VARCHAR(10)', true, "'new'")],
    });
    const same = snapshot('DB_2', {
      ...users,
      orders: [column('id', 'INT4', false), column('status', 'VARCHAR(10)', true, "'new'")],
    });

    expect(compareSnapshots(master, same)).toEqual([]);
  });

  it('reports a missing table with the ALL sentinel (scenario: users dropped)', () => {
    expect(compareSnapshots(snapshot('DB_1', users), snapshot('DB_2', {}))).toEqual([
      { type: 'MISSING_TABLE', table: 'users', column: 'ALL', expected: 'Exists', actual: 'Missing' },
    ]);
  });

  it('reports a type mismatch with both literal types', () => {
    const master = snapshot('DB_1', { orders: [column('status', 'VARCHAR(10)', true)] });
    const target = snapshot('DB_2', { orders: [column('status', 'VARCHAR(20)', true)] });

    expect(compareSnapshots(master, target)).toEqual([
      { type: 'TYPE_MISMATCH', table: 'orders', column: 'status', expected: 'VARCHAR(10)', actual: 'VARCHAR(20)' },
    ]);
  });

  it('reports an extra column on the target', () => {
    const master = snapshot('DB_1', { orders: [column('id', 'INT4', false)] });
    const target = snapshot('DB_2', { orders: [column('id', 'INT4', false), column('legacy_flag', 'INT4', true)] });

    expect(compareSnapshots(master, target)).toEqual([
      { type: 'EXTRA_COLUMN', table: 'orders', column: 'legacy_flag', expected: 'Missing', actual: 'Exists' },
    ]);
  });

  it('reports a missing table alongside an unrelated extra table', () => {
    const master = snapshot('DB_1', {
      ...users,
      audit: [column('id', 'INT4', false), column('payload', 'TEXT', true)],
    });
    const target = snapshot('DB_2', { ...users, temp: [column('id', 'INT4', false)] });

    expect(compareSnapshots(master, target)).toEqual([
      { type: 'MISSING_TABLE', table: 'audit', column: 'ALL', expected: 'Exists', actual: 'Missing' },
      { type: 'EXTRA_TABLE', table: 'temp', column: 'ALL', expected: 'Missing', actual: 'Exists' },
    ]);
  });

  it('renders nullability mismatches as boolean strings', () => {
    const master = snapshot('DB_1', { users: [column('name', 'VARCHAR', false)] });
    const target = snapshot('DB_2', { users: [column('name', 'VARCHAR', true)] });

    expect(compareSnapshots(master, target)).toEqual([
      { type: 'NULLABILITY_MISMATCH', table: 'users', column: 'name', expected: 'false', actual: 'true' },
    ]);
  });

  it('emits one record per column difference in a fixed order', () => {
    const master = snapshot('DB_1', {
      accounts: [
        column('id', 'INT4', false),
        column('email', 'VARCHAR(100)', false),
        column('plan', 'VARCHAR(10)', true),
        column('created_at', 'TIMESTAMP', false),
      ],
    });
    const target = snapshot('DB_2', {
      accounts: [
        column('legacy_code', 'INT4', true),
        column('id', 'INT4', false),
        column('email', 'VARCHAR(50)', true),
        column('plan', 'VARCHAR(10)', true),
        column('notes', 'TEXT', true),
      ],
    });

    expect(compareSnapshots(master, target)).toEqual([
      { type: 'MISSING_COLUMN', table: 'accounts', column: 'created_at', expected: 'Exists', actual: 'Missing' },
      { type: 'EXTRA_COLUMN', table: 'accounts', column: 'legacy_code', expected: 'Missing', actual: 'Exists' },
      { type: 'EXTRA_COLUMN', table: 'accounts', column: 'notes', expected: 'Missing', actual: 'Exists' },
      { type: 'TYPE_MISMATCH', table: 'accounts', column: 'email', expected: 'VARCHAR(100)', actual: 'VARCHAR(50)' },
      { type: 'NULLABILITY_MISMATCH', table: 'accounts', column: 'email', expected: 'false', actual: 'true' },
    ]);
  });

  it('treats names that differ only by case as different objects', () => {
    const master = snapshot('DB_1', { Users: [column('ID', 'INT4', false)] });
    const target = snapshot('DB_2', { users: [column('id', 'INT4', false)] });

    expect(compareSnapshots(master, target).map(d => [d.type, d.table])).toEqual([
      ['MISSING_TABLE', 'Users'],
      ['EXTRA_TABLE', 'users'],
    ]);
  });

  it('ignores default values', () => {
    const master = snapshot('DB_1', { users: [column('name', 'VARCHAR', true, "'anon'")] });
    const target = snapshot('DB_2', { users: [column('name', 'VARCHAR', true)] });

    expect(compareSnapshots(master, target)).toEqual([]);
  });

  it('returns frozen records', () => {
    const [diff] = compareSnapshots(snapshot('DB_1', users), snapshot('DB_2', {}));
    expect(Object.isFrozen(diff)).toBe(true);
  });
});

describe('SchemaComparator', () => {
  it('labels the result with both snapshot sources', () => {
    const result = new SchemaComparator().compare(snapshot('DB_1', users), snapshot('DB_2', users));

    expect(result).toEqual({ sourceDb: 'DB_1', targetDb: 'DB_2', diffs: [] });
  });
});
