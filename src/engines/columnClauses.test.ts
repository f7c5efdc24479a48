import { describe, expect, it } from 'vitest';
import { definition } from '../testing/fakes.js';
import { defaultClause, joinClauses, nullClause } from './columnClauses.js';

describe('column clauses', () => {
  it('maps the null flag', () => {
    expect(nullClause(definition('a', 'INT4', 'NO'))).toBe('NOT NULL');
    expect(nullClause(definition('a', 'INT4', 'YES'))).toBe('NULL');
  });

  it('uses the literal default when there is one', () => {
    expect(defaultClause(definition('a', 'INT4', 'NO', '0'))).toBe('DEFAULT 0');
    expect(defaultClause(definition('a', 'INT4', 'YES', "'x'"))).toBe("DEFAULT 'x'");
  });

  it('falls back to DEFAULT NULL only for nullable columns', () => {
    expect(defaultClause(definition('a', 'INT4', 'YES'))).toBe('DEFAULT NULL');
    expect(defaultClause(definition('a', 'INT4', 'NO'))).toBe('');
  });

  it('keeps an empty-string default', () => {
    expect(defaultClause(definition('a', 'TEXT', 'NO', "''"))).toBe("DEFAULT ''");
  });

  it('drops empty parts when joining', () => {
    expect(joinClauses(['"a"', 'INT4', '', 'NOT NULL', ''])).toBe('"a" INT4 NOT NULL');
  });
});
