/**
 * Transient drafts: batch edits under one owner, sealed when finished.
 *
 * Nodes created under the draft's owner are edited in place; nodes shared
 * with the base collection are copied on first write, so the base never
 * changes.
 */

import { hamtValues, type Owner } from './internal';
import { DraftFinalizedError } from './errors';
import type { FullKey } from './key';
import { lookup, lookupOrThrow, type FetchResult } from './resolver';
import type { CollectionState } from './state';
import { insertValue, removeKey, replaceInPlace } from './store';

export class CollectionDraft<K, V> {
  #state: CollectionState<K, V>;
  #owner: Owner = {};
  #finalized = false;

  constructor(state: CollectionState<K, V>) {
    this.#state = state;
  }

  #live(): CollectionState<K, V> {
    if (this.#finalized) throw new DraftFinalizedError();
    return this.#state;
  }

  get size(): number {
    return this.#live().primary.size;
  }

  fetch(key: FullKey<K>): FetchResult<V> {
    const result = lookup(this.#live(), key);
    return result.found ? { found: true, value: result.value } : result;
  }

  get(key: FullKey<K>): V | undefined {
    const result = lookup(this.#live(), key);
    return result.found ? result.value : undefined;
  }

  put(value: V): this {
    this.#state = insertValue(this.#live(), this.#owner, value);
    return this;
  }

  /**
   * Remove and return the value under `key`, or `undefined` when absent.
   */
  pop(key: FullKey<K>): V | undefined {
    const result = lookup(this.#live(), key);
    if (!result.found) return undefined;
    this.#state = removeKey(this.#state, this.#owner, result.key).state;
    return result.value;
  }

  update(key: FullKey<K>, transform: (value: V) => V): this {
    const current = lookupOrThrow(this.#live(), key);
    this.#state = insertValue(this.#state, this.#owner, transform(current.value), { key: current.key });
    return this;
  }

  fastUpdate(key: FullKey<K>, transform: (value: V) => V): this {
    const current = lookupOrThrow(this.#live(), key);
    this.#state = replaceInPlace(this.#state, this.#owner, current.key, transform(current.value));
    return this;
  }

  values(): IterableIterator<V> {
    return hamtValues(this.#live().primary);
  }

  /**
   * Seal the draft and hand back its state. Later calls throw.
   */
  finalize(): CollectionState<K, V> {
    const state = this.#live();
    this.#finalized = true;
    return state;
  }

  discard(): void {
    this.#finalized = true;
  }
}

/**
 * Folds incoming values through `put`; `done` yields the result, `abort`
 * throws the accumulation away.
 */
export class Collector<K, V, C> {
  readonly #draft: CollectionDraft<K, V>;
  readonly #finish: (state: CollectionState<K, V>) => C;

  constructor(state: CollectionState<K, V>, finish: (state: CollectionState<K, V>) => C) {
    this.#draft = new CollectionDraft(state);
    this.#finish = finish;
  }

  add(value: V): this {
    this.#draft.put(value);
    return this;
  }

  done(): C {
    return this.#finish(this.#draft.finalize());
  }

  abort(): void {
    this.#draft.discard();
  }
}
