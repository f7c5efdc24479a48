import { afterEach, describe, expect, it } from 'vitest';
import { buildProgram } from './index.js';

describe('schema-mirror CLI', () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it('registers the compare command with its options', () => {
    const compare = buildProgram().commands.find(c => c.name() === 'compare');

    expect(compare?.options.map(o => o.long)).toEqual([
      '--master',
      '--target',
      '--env-file',
      '--output-dir',
      '--report',
      '--sql-file',
      '--no-sync',
    ]);
  });

  it('sets a failing exit code on invalid configuration', async () => {
    await buildProgram().parseAsync([
      'node',
      'schema-mirror',
      'compare',
      '--master',
      'mysql://app@db1.local/main',
      '--env-file',
      'does-not-exist.env',
    ]);

    expect(process.exitCode).toBe(1);
  });
});
