/**
 * Full keys: one addressing scheme for primary and secondary lookups
 */

import { inspect } from 'node:util';

export interface PrimaryKeyRef<K> {
  readonly kind: 'primary';
  readonly key: K;
}

export interface SecondaryKeyRef<S = unknown> {
  readonly kind: 'secondary';
  readonly index: string;
  readonly key: S;
}

export type FullKey<K> = PrimaryKeyRef<K> | SecondaryKeyRef;

export function primary<K>(key: K): PrimaryKeyRef<K> {
  return { kind: 'primary', key };
}

export function secondary<S>(index: string, key: S): SecondaryKeyRef<S> {
  return { kind: 'secondary', index, key };
}

export function describeKey(ref: FullKey<unknown>): string {
  switch (ref.kind) {
    case 'primary':
      return inspect(ref.key);
    case 'secondary':
      return `${inspect(ref.key)} in index "${ref.index}"`;
  }
}
