/**
 * Collection state record: primary store plus both index registries
 */

import { hamtEmpty, hamtSet, type HMap, type Owner } from './internal';
import type { ResolvedOptions } from './config';
import { InvalidSecondaryKeyError } from './errors';

export type PrimaryFn<K, V> = (value: V) => K;
export type IndexFn<V, S = unknown> = (value: V) => S;

export interface EagerIndex<K, V> {
  readonly kind: 'eager';
  readonly name: string;
  readonly fn: IndexFn<V>;
  // secondary key -> primary key
  readonly entries: HMap<unknown, K>;
}

export interface LazyIndex<V> {
  readonly kind: 'lazy';
  readonly name: string;
  readonly fn: IndexFn<V>;
}

export interface CollectionState<K, V> {
  readonly primaryFn: PrimaryFn<K, V>;
  readonly primary: HMap<K, V>;
  readonly eager: HMap<string, EagerIndex<K, V>>;
  readonly lazy: HMap<string, LazyIndex<V>>;
  readonly options: ResolvedOptions;
}

/**
 * Run an index function. Keys compare by SameValueZero, so an object or
 * array key would never match the one computed on removal or lookup.
 */
export function secondaryKeyOf<V>(index: { readonly name: string; readonly fn: IndexFn<V> }, value: V): unknown {
  const key = index.fn(value);
  if ((typeof key === 'object' && key !== null) || typeof key === 'function') {
    throw new InvalidSecondaryKeyError(index.name, key);
  }
  return key;
}

/**
 * Later values overwrite earlier ones with the same primary key.
 */
export function createState<K, V>(
  values: Iterable<V>,
  primaryFn: PrimaryFn<K, V>,
  options: ResolvedOptions
): CollectionState<K, V> {
  let primary = hamtEmpty<K, V>();
  const owner: Owner = {};
  for (const value of values) {
    primary = hamtSet(primary, owner, primaryFn(value), value);
  }
  return { primaryFn, primary, eager: hamtEmpty(), lazy: hamtEmpty(), options };
}
