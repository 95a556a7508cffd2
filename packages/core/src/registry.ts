/**
 * Secondary index registry: eager and lazy indices share one namespace
 */

import { hamtDelete, hamtEmpty, hamtHas, hamtIter, hamtLookup, hamtSet, keyEquals, type Owner } from './internal';
import { DuplicateSecondaryKeyError, IndexAlreadyExistsError, UnknownIndexError } from './errors';
import { secondaryKeyOf, type CollectionState, type EagerIndex, type IndexFn } from './state';

export interface IndexNames {
  eager: string[];
  lazy: string[];
}

export function hasIndex<K, V>(state: CollectionState<K, V>, name: string): boolean {
  return hamtHas(state.eager, name) || hamtHas(state.lazy, name);
}

/**
 * Eager indices are materialized in one pass over the current values; lazy
 * ones only keep their function.
 */
export function addIndex<K, V>(
  state: CollectionState<K, V>,
  name: string,
  fn: IndexFn<V>,
  lazy: boolean
): CollectionState<K, V> {
  if (hasIndex(state, name)) {
    throw new IndexAlreadyExistsError(name);
  }

  const { logger, duplicateKeys } = state.options;

  if (lazy) {
    logger.debug('index.create', { index: name, details: { lazy: true } });
    return { ...state, lazy: hamtSet(state.lazy, undefined, name, { kind: 'lazy', name, fn }) };
  }

  let entries = hamtEmpty<unknown, K>();
  const owner: Owner = {};
  for (const [key, value] of hamtIter(state.primary)) {
    const secondaryKey = secondaryKeyOf({ name, fn }, value);
    if (duplicateKeys === 'reject') {
      const current = hamtLookup(entries, secondaryKey);
      if (current.found && !keyEquals(current.value, key)) {
        throw new DuplicateSecondaryKeyError(name, secondaryKey);
      }
    }
    entries = hamtSet(entries, owner, secondaryKey, key);
  }

  const index: EagerIndex<K, V> = { kind: 'eager', name, fn, entries };
  logger.debug('index.create', {
    index: name,
    details: { lazy: false, values: state.primary.size, keys: entries.size },
  });
  return { ...state, eager: hamtSet(state.eager, undefined, name, index) };
}

export function removeIndex<K, V>(state: CollectionState<K, V>, name: string): CollectionState<K, V> {
  if (hamtHas(state.eager, name)) {
    state.options.logger.debug('index.drop', { index: name, details: { lazy: false } });
    return { ...state, eager: hamtDelete(state.eager, undefined, name) };
  }
  if (hamtHas(state.lazy, name)) {
    state.options.logger.debug('index.drop', { index: name, details: { lazy: true } });
    return { ...state, lazy: hamtDelete(state.lazy, undefined, name) };
  }
  throw new UnknownIndexError(name);
}

export function indexNames<K, V>(state: CollectionState<K, V>): IndexNames {
  return {
    eager: [...hamtIter(state.eager)].map(([name]) => name),
    lazy: [...hamtIter(state.lazy)].map(([name]) => name),
  };
}
