/**
 * Mutations over the primary store that keep every eager index in sync.
 *
 * Invariants:
 * - Every index function runs and every conflict check passes before the
 *   first write, so a throwing mutation never leaves a transient draft
 *   half-edited
 * - An eager entry is only unlinked while it still points at the removed
 *   value's primary key
 */

import { inspect } from 'node:util';
import {
  hamtDelete,
  hamtIter,
  hamtLookup,
  hamtSet,
  keyEquals,
  type HLookup,
  type Owner,
} from './internal';
import { DuplicateSecondaryKeyError } from './errors';
import { secondaryKeyOf, type CollectionState, type EagerIndex } from './state';

interface Removal<K, V> {
  key: K;
  value: V;
  // secondary key per eager index name
  secondaryKeys: Map<string, unknown>;
}

function secondaryKeysOf<K, V>(state: CollectionState<K, V>, value: V): Map<string, unknown> {
  const keys = new Map<string, unknown>();
  for (const [name, index] of hamtIter(state.eager)) {
    keys.set(name, secondaryKeyOf(index, value));
  }
  return keys;
}

function planRemoval<K, V>(state: CollectionState<K, V>, key: K, value: V): Removal<K, V> {
  return { key, value, secondaryKeys: secondaryKeysOf(state, value) };
}

// Snapshot first: under a transient owner the registry is edited in place
function eagerIndices<K, V>(state: CollectionState<K, V>): [string, EagerIndex<K, V>][] {
  return [...hamtIter(state.eager)];
}

function unlink<K, V>(
  state: CollectionState<K, V>,
  owner: Owner,
  removal: Removal<K, V>
): CollectionState<K, V> {
  let eager = state.eager;
  for (const [name, index] of eagerIndices(state)) {
    const secondaryKey = removal.secondaryKeys.get(name);
    const current = hamtLookup(index.entries, secondaryKey);
    if (current.found && keyEquals(current.value, removal.key)) {
      eager = hamtSet(eager, owner, name, {
        ...index,
        entries: hamtDelete(index.entries, owner, secondaryKey),
      });
    }
  }
  return { ...state, primary: hamtDelete(state.primary, owner, removal.key), eager };
}

function assertUnique<K, V>(
  index: EagerIndex<K, V>,
  secondaryKey: unknown,
  key: K,
  removals: Removal<K, V>[]
): void {
  const current = hamtLookup(index.entries, secondaryKey);
  if (!current.found || keyEquals(current.value, key)) return;
  if (removals.some(removal => keyEquals(removal.key, current.value))) return;
  throw new DuplicateSecondaryKeyError(index.name, secondaryKey);
}

/**
 * Upsert `value`. When `displaced` is given, the value stored under its
 * primary key is removed first (the old half of an update).
 */
export function insertValue<K, V>(
  state: CollectionState<K, V>,
  owner: Owner,
  value: V,
  displaced?: { key: K }
): CollectionState<K, V> {
  const key = state.primaryFn(value);
  const secondaryKeys = secondaryKeysOf(state, value);

  const removals: Removal<K, V>[] = [];
  if (displaced && !keyEquals(displaced.key, key)) {
    const old = hamtLookup(state.primary, displaced.key);
    if (old.found) removals.push(planRemoval(state, displaced.key, old.value));
  }
  const existing = hamtLookup(state.primary, key);
  if (existing.found) removals.push(planRemoval(state, key, existing.value));

  if (state.options.duplicateKeys === 'reject') {
    for (const [name, index] of hamtIter(state.eager)) {
      assertUnique(index, secondaryKeys.get(name), key, removals);
    }
  }

  let next = state;
  for (const removal of removals) {
    next = unlink(next, owner, removal);
  }

  let eager = next.eager;
  for (const [name, index] of eagerIndices(next)) {
    const secondaryKey = secondaryKeys.get(name);
    const previous = hamtLookup(index.entries, secondaryKey);
    if (previous.found && !keyEquals(previous.value, key)) {
      state.options.logger.debug('index.overwrite', {
        index: name,
        message: `${inspect(secondaryKey)} moved from ${inspect(previous.value)} to ${inspect(key)}`,
      });
    }
    eager = hamtSet(eager, owner, name, {
      ...index,
      entries: hamtSet(index.entries, owner, secondaryKey, key),
    });
  }

  return { ...next, primary: hamtSet(next.primary, owner, key, value), eager };
}

/**
 * Remove the value stored under a primary key together with its eager entries.
 */
export function removeKey<K, V>(
  state: CollectionState<K, V>,
  owner: Owner,
  key: K
): { removed: HLookup<V>; state: CollectionState<K, V> } {
  const removed = hamtLookup(state.primary, key);
  if (!removed.found) return { removed, state };
  return { removed, state: unlink(state, owner, planRemoval(state, key, removed.value)) };
}

/**
 * Store `value` under `key` without touching any index. The caller
 * guarantees it yields the same indexed keys as the value it replaces.
 */
export function replaceInPlace<K, V>(
  state: CollectionState<K, V>,
  owner: Owner,
  key: K,
  value: V
): CollectionState<K, V> {
  state.options.logger.debug('collection.fast_update', { message: inspect(key) });
  return { ...state, primary: hamtSet(state.primary, owner, key, value) };
}
