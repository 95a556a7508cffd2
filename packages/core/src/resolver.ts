/**
 * Key resolution: turns any FullKey into a primary key.
 *
 * Primary keys pass through untouched; existence is checked by the store
 * lookup. Eager indices answer from their materialized map, lazy ones by a
 * scan of the primary store in storage order.
 */

import { hamtIter, hamtLookup, keyEquals } from './internal';
import {
  DuplicateSecondaryKeyError,
  KeyNotFoundError,
  LazyIndexLookupError,
  UnknownIndexError,
} from './errors';
import type { FullKey, SecondaryKeyRef } from './key';
import { secondaryKeyOf, type CollectionState, type LazyIndex } from './state';

export type Resolution<K> =
  | { kind: 'resolved'; primaryKey: K }
  | { kind: 'not-found' }
  | { kind: 'unknown-index'; index: string };

export type MissReason = 'not-found' | 'unknown-index';

export type Lookup<K, V> =
  | { found: true; key: K; value: V }
  | { found: false; reason: MissReason };

export type FetchResult<V> = { found: true; value: V } | { found: false; reason: MissReason };

const NOT_FOUND = { kind: 'not-found' } as const;

function scanLazy<K, V>(
  state: CollectionState<K, V>,
  index: LazyIndex<V>,
  target: unknown
): Resolution<K> {
  const reject = state.options.duplicateKeys === 'reject';
  let match: Resolution<K> = NOT_FOUND;

  for (const [key, value] of hamtIter(state.primary)) {
    if (!keyEquals(secondaryKeyOf(index, value), target)) continue;
    if (!reject) return { kind: 'resolved', primaryKey: key };
    if (match.kind === 'resolved') {
      throw new DuplicateSecondaryKeyError(index.name, target);
    }
    match = { kind: 'resolved', primaryKey: key };
  }

  return match;
}

function resolveSecondary<K, V>(state: CollectionState<K, V>, ref: SecondaryKeyRef): Resolution<K> {
  const eager = hamtLookup(state.eager, ref.index);
  if (eager.found) {
    const hit = hamtLookup(eager.value.entries, ref.key);
    return hit.found ? { kind: 'resolved', primaryKey: hit.value } : NOT_FOUND;
  }

  const lazy = hamtLookup(state.lazy, ref.index);
  if (lazy.found) {
    return scanLazy(state, lazy.value, ref.key);
  }

  return { kind: 'unknown-index', index: ref.index };
}

export function resolveKey<K, V>(state: CollectionState<K, V>, ref: FullKey<K>): Resolution<K> {
  switch (ref.kind) {
    case 'primary':
      return { kind: 'resolved', primaryKey: ref.key };
    case 'secondary':
      return resolveSecondary(state, ref);
  }
}

/**
 * Resolve and read. Unknown indices and missing keys both come back as a miss.
 */
export function lookup<K, V>(state: CollectionState<K, V>, ref: FullKey<K>): Lookup<K, V> {
  const resolution = resolveKey(state, ref);
  if (resolution.kind !== 'resolved') {
    return { found: false, reason: resolution.kind };
  }
  const stored = hamtLookup(state.primary, resolution.primaryKey);
  if (!stored.found) {
    return { found: false, reason: 'not-found' };
  }
  return { found: true, key: resolution.primaryKey, value: stored.value };
}

/**
 * Strict counterpart of {@link lookup}.
 *
 * @throws UnknownIndexError when a secondary key names no index
 * @throws KeyNotFoundError when nothing is stored under the key
 */
export function lookupOrThrow<K, V>(
  state: CollectionState<K, V>,
  ref: FullKey<K>
): { key: K; value: V } {
  const result = lookup(state, ref);
  if (result.found) {
    return { key: result.key, value: result.value };
  }
  if (result.reason === 'unknown-index' && ref.kind === 'secondary') {
    throw new UnknownIndexError(ref.index);
  }
  throw new KeyNotFoundError(ref);
}

/**
 * Translate a secondary key into a primary key without reading the value.
 * Only eager indices keep a mapping to translate through.
 */
export function primaryKeyOf<K, V>(
  state: CollectionState<K, V>,
  index: string,
  secondaryKey: unknown
): K | undefined {
  const eager = hamtLookup(state.eager, index);
  if (eager.found) {
    const hit = hamtLookup(eager.value.entries, secondaryKey);
    return hit.found ? hit.value : undefined;
  }
  if (hamtLookup(state.lazy, index).found) {
    throw new LazyIndexLookupError(index);
  }
  throw new UnknownIndexError(index);
}
