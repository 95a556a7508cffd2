/**
 * Collection - persistent values keyed by a primary function, with any
 * number of named secondary indices over the same values.
 *
 * Every mutating method returns a new Collection; the receiver is never
 * changed. Tries are shared between the two, so a put or pop costs
 * O(log32 n) per index rather than a full copy.
 */

import { hamtIter, hamtLookup, hamtValues, INSPECT, POP, structuralEquals } from './internal';
import { resolveOptions, type CollectionOptions } from './config';
import { Collector, CollectionDraft } from './draft';
import { renderCollection } from './inspect';
import type { FullKey } from './key';
import { addIndex, hasIndex, indexNames, removeIndex, type IndexNames } from './registry';
import { lookup, lookupOrThrow, primaryKeyOf, type FetchResult } from './resolver';
import { createState, type CollectionState, type IndexFn, type PrimaryFn } from './state';
import { insertValue, removeKey, replaceInPlace } from './store';

/**
 * Either `[result, replacement]` or {@link POP} to remove the value.
 */
export type GetAndUpdateOutcome<R, V> = readonly [R, V] | typeof POP;

export interface CreateIndexOptions {
  // Keep only the function and scan on lookup instead of materializing keys
  lazy?: boolean;
}

export class Collection<K, V> implements Iterable<V> {
  readonly #state: CollectionState<K, V>;

  /** @internal */
  constructor(state: CollectionState<K, V>) {
    this.#state = state;
  }

  static from<K, V>(
    values: Iterable<V>,
    primaryFn: PrimaryFn<K, V>,
    options?: CollectionOptions
  ): Collection<K, V> {
    return new Collection(createState(values, primaryFn, resolveOptions(options)));
  }

  #derive(state: CollectionState<K, V>): Collection<K, V> {
    return state === this.#state ? this : new Collection(state);
  }

  get size(): number {
    return this.#state.primary.size;
  }

  // ===== Indices =====

  createIndex<S>(name: string, fn: IndexFn<V, S>, options: CreateIndexOptions = {}): Collection<K, V> {
    return this.#derive(addIndex(this.#state, name, fn, options.lazy ?? false));
  }

  dropIndex(name: string): Collection<K, V> {
    return this.#derive(removeIndex(this.#state, name));
  }

  hasIndex(name: string): boolean {
    return hasIndex(this.#state, name);
  }

  indexNames(): IndexNames {
    return indexNames(this.#state);
  }

  primaryKey(index: string, secondaryKey: unknown): K | undefined {
    return primaryKeyOf(this.#state, index, secondaryKey);
  }

  // ===== Reads =====

  /**
   * An unknown index name reads as a miss here, not an error; it is reported
   * only through `reason: 'unknown-index'`. Use {@link fetchOrThrow} to fail on it.
   */
  fetch(key: FullKey<K>): FetchResult<V> {
    const result = lookup(this.#state, key);
    return result.found ? { found: true, value: result.value } : result;
  }

  fetchOrThrow(key: FullKey<K>): V {
    return lookupOrThrow(this.#state, key).value;
  }

  /**
   * Missing keys and unknown index names both yield the fallback; only
   * {@link fetch} tells them apart, through its `reason`.
   */
  get(key: FullKey<K>): V | undefined;
  get<D>(key: FullKey<K>, fallback: D): V | D;
  get<D>(key: FullKey<K>, fallback?: D): V | D | undefined {
    const result = lookup(this.#state, key);
    return result.found ? result.value : fallback;
  }

  has(key: FullKey<K>): boolean {
    return lookup(this.#state, key).found;
  }

  /**
   * True when the value's own primary key holds a structurally equal value.
   */
  includes(value: V): boolean {
    const stored = hamtLookup(this.#state.primary, this.#state.primaryFn(value));
    return stored.found && structuralEquals(stored.value, value);
  }

  // ===== Writes =====

  put(value: V): Collection<K, V> {
    return this.#derive(insertValue(this.#state, undefined, value));
  }

  putAll(values: Iterable<V>): Collection<K, V> {
    return into(this, values);
  }

  pop(key: FullKey<K>): [V | undefined, Collection<K, V>];
  pop<D>(key: FullKey<K>, fallback: D): [V | D, Collection<K, V>];
  pop<D>(key: FullKey<K>, fallback?: D): [V | D | undefined, Collection<K, V>] {
    const result = lookup(this.#state, key);
    if (!result.found) return [fallback, this];
    return [result.value, this.#derive(removeKey(this.#state, undefined, result.key).state)];
  }

  popOrThrow(key: FullKey<K>): [V, Collection<K, V>] {
    const current = lookupOrThrow(this.#state, key);
    return [current.value, this.#derive(removeKey(this.#state, undefined, current.key).state)];
  }

  /**
   * Pop followed by put, so the transform may change any key, primary included.
   */
  update(key: FullKey<K>, transform: (value: V) => V): Collection<K, V> {
    const current = lookupOrThrow(this.#state, key);
    return this.#derive(insertValue(this.#state, undefined, transform(current.value), { key: current.key }));
  }

  /**
   * Replace the value without touching any index.
   *
   * The transform must leave every indexed key (primary and secondary)
   * unchanged; nothing checks this, and breaking it leaves the indices stale.
   */
  fastUpdate(key: FullKey<K>, transform: (value: V) => V): Collection<K, V> {
    const current = lookupOrThrow(this.#state, key);
    return this.#derive(replaceInPlace(this.#state, undefined, current.key, transform(current.value)));
  }

  getAndUpdateOrThrow<R>(
    key: FullKey<K>,
    fn: (value: V) => GetAndUpdateOutcome<R, V>
  ): [R | V, Collection<K, V>] {
    const current = lookupOrThrow(this.#state, key);
    const outcome = fn(current.value);
    if (outcome === POP) {
      return [current.value, this.#derive(removeKey(this.#state, undefined, current.key).state)];
    }
    const [result, replacement] = outcome;
    return [result, this.#derive(insertValue(this.#state, undefined, replacement, { key: current.key }))];
  }

  /**
   * Like {@link getAndUpdateOrThrow}, but a missing key calls `fn` with
   * `undefined`; a returned replacement is then inserted with `put`.
   */
  getAndUpdate<R>(
    key: FullKey<K>,
    fn: (value: V | undefined) => GetAndUpdateOutcome<R, V>
  ): [R | V | undefined, Collection<K, V>] {
    const current = lookup(this.#state, key);
    const outcome = fn(current.found ? current.value : undefined);

    if (outcome === POP) {
      if (!current.found) return [undefined, this];
      return [current.value, this.#derive(removeKey(this.#state, undefined, current.key).state)];
    }

    const [result, replacement] = outcome;
    const displaced = current.found ? { key: current.key } : undefined;
    return [result, this.#derive(insertValue(this.#state, undefined, replacement, displaced))];
  }

  // ===== Batches =====

  /**
   * Apply several edits through one transient draft.
   */
  mutate(recipe: (draft: CollectionDraft<K, V>) => void): Collection<K, V> {
    const draft = new CollectionDraft(this.#state);
    try {
      recipe(draft);
    } catch (error) {
      draft.discard();
      throw error;
    }
    return this.#derive(draft.finalize());
  }

  collector(): Collector<K, V, Collection<K, V>> {
    return new Collector(this.#state, state => this.#derive(state));
  }

  // ===== Traversal =====

  toList(): V[] {
    return [...hamtValues(this.#state.primary)];
  }

  toMap(): Map<K, V> {
    return new Map(hamtIter(this.#state.primary));
  }

  values(): IterableIterator<V> {
    return hamtValues(this.#state.primary);
  }

  [Symbol.iterator](): IterableIterator<V> {
    return this.values();
  }

  toString(): string {
    return renderCollection(this.#state);
  }

  [INSPECT](): string {
    return renderCollection(this.#state);
  }
}

/**
 * Build a collection keyed by `primaryFn`.
 */
export function polydex<K, V>(
  values: Iterable<V>,
  primaryFn: PrimaryFn<K, V>,
  options?: CollectionOptions
): Collection<K, V> {
  return Collection.from(values, primaryFn, options);
}

/**
 * Produce a new collection from a recipe that edits a draft.
 */
export function produce<K, V>(
  base: Collection<K, V>,
  recipe: (draft: CollectionDraft<K, V>) => void
): Collection<K, V> {
  return base.mutate(recipe);
}

/**
 * Fold `values` into `collection` through `put`. If iteration throws, the
 * accumulation is discarded and the error rethrown.
 */
export function into<K, V>(collection: Collection<K, V>, values: Iterable<V>): Collection<K, V> {
  const collector = collection.collector();
  try {
    for (const value of values) {
      collector.add(value);
    }
  } catch (error) {
    collector.abort();
    throw error;
  }
  return collector.done();
}
