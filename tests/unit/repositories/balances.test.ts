import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, describe, it, expect } from 'vitest';
import { createBalanceRepository, parseBalanceRecords } from '../../../src/repositories/balances.js';

const seedFile = fileURLToPath(new URL('../../../data/balances.json', import.meta.url));

describe('parseBalanceRecords', () => {
  it('accepts unsigned 32-bit ids and balances', () => {
    expect(parseBalanceRecords([{ id: 0, balance: 4294967295 }])).toEqual([{ id: 0, balance: 4294967295 }]);
  });

  it('accepts an empty list', () => {
    expect(parseBalanceRecords([])).toEqual([]);
  });

  it('rejects negative balances with the offending path', () => {
    expect(() => parseBalanceRecords([{ id: 1, balance: -5 }])).toThrow(/^Invalid balance records: \[0\.balance\]/);
  });

  it('rejects fractional and out-of-range ids', () => {
    expect(() => parseBalanceRecords([{ id: 1.5, balance: 1 }])).toThrow('Invalid balance records');
    expect(() => parseBalanceRecords([{ id: 4294967296, balance: 1 }])).toThrow('Invalid balance records');
  });

  it('rejects anything that is not a list', () => {
    expect(() => parseBalanceRecords({ id: 1, balance: 1 })).toThrow('Invalid balance records');
  });
});

describe('createBalanceRepository', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  it('loads the seed snapshot', () => {
    const records = createBalanceRepository(seedFile).getAll();

    expect(records).toHaveLength(8);
    expect(records[0]).toEqual({ id: 1, balance: 1111 });
    expect(records[7]).toEqual({ id: 8, balance: 8888 });
  });

  it('reads the file once and returns a frozen list', () => {
    dir = mkdtempSync(join(tmpdir(), 'balances-'));
    const file = join(dir, 'balances.json');
    writeFileSync(file, JSON.stringify([{ id: 1, balance: 10 }]));

    const repository = createBalanceRepository(file);
    const first = repository.getAll();
    writeFileSync(file, JSON.stringify([{ id: 2, balance: 20 }]));

    expect(repository.getAll()).toBe(first);
    expect(first).toEqual([{ id: 1, balance: 10 }]);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('reports unreadable files', () => {
    dir = mkdtempSync(join(tmpdir(), 'balances-'));
    const file = join(dir, 'missing.json');

    expect(() => createBalanceRepository(file).getAll()).toThrow(`Could not read balances file ${file}`);
  });

  it('reports malformed JSON', () => {
    dir = mkdtempSync(join(tmpdir(), 'balances-'));
    const file = join(dir, 'broken.json');
    writeFileSync(file, '[{ "id": 1,');

    expect(() => createBalanceRepository(file).getAll()).toThrow(`Could not read balances file ${file}`);
  });
});
