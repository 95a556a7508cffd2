/**
 * Benchmark: eager vs lazy secondary lookups, and put cost per index
 */

import { bench, describe } from 'vitest';
import { polydex, primary, produce, secondary } from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 10000;

interface Row {
  id: number;
  email: string;
  group: number;
}

function createRows(size: number): Row[] {
  return Array.from({ length: size }, (_, i) => ({ id: i, email: `user${i}@example.test`, group: i % 100 }));
}

const rows = createRows(SIZE);
const byId = (row: Row): number => row.id;
const emailOf = (row: Row): string => row.email;

// ===== Lookup benchmarks =====
describe('Secondary lookup (10000 rows)', () => {
  const nativeByEmail = new Map(rows.map(row => [row.email, row]));
  const eager = polydex(rows, byId).createIndex('email', emailOf);
  const lazy = polydex(rows, byId).createIndex('email', emailOf, { lazy: true });
  const target = rows[SIZE / 2].email;

  bench('Native Map', () => {
    return nativeByEmail.get(target);
  });

  bench('Eager index', () => {
    return eager.get(secondary('email', target));
  });

  bench('Lazy index', () => {
    return lazy.get(secondary('email', target));
  });
});

// ===== Write benchmarks =====
describe('Put one row (10000 rows)', () => {
  const plain = polydex(rows, byId);
  const oneIndex = plain.createIndex('email', emailOf);
  const twoIndices = oneIndex.createIndex('group', row => `${row.group}:${row.id}`);
  const row = { id: SIZE, email: 'new@example.test', group: 1 };

  bench('No index', () => {
    return plain.put(row);
  });

  bench('One eager index', () => {
    return oneIndex.put(row);
  });

  bench('Two eager indices', () => {
    return twoIndices.put(row);
  });
});

describe('Batch of 1000 puts', () => {
  const base = polydex(rows, byId).createIndex('email', emailOf);
  const extra = createRows(1000).map(row => ({ ...row, id: row.id + SIZE, email: `extra${row.id}@example.test` }));

  bench('Persistent put', () => {
    let result = base;
    for (const row of extra) result = result.put(row);
    return result;
  });

  bench('produce()', () => {
    return produce(base, draft => {
      for (const row of extra) draft.put(row);
    });
  });

  bench('Pop by primary key', () => {
    return base.pop(primary(42));
  });
});
