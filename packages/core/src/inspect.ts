/**
 * Debug rendering. Not a stable or parseable format.
 */

import { inspect } from 'node:util';
import { hamtValues } from './internal';
import { indexNames } from './registry';
import type { CollectionState } from './state';

export function renderCollection<K, V>(state: CollectionState<K, V>): string {
  const values = inspect([...hamtValues(state.primary)], { depth: 4, breakLength: Infinity });
  const { eager, lazy } = indexNames(state);
  const primary = state.primaryFn.name || 'anonymous';
  return `Collection<${values}, indices: { primary: ${primary}, eager: [${eager.join(', ')}], lazy: [${lazy.join(', ')}] }>`;
}
