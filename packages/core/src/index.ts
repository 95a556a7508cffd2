/**
 * Polydex – persistent collections with many lookup paths
 *
 * - polydex(values, primaryFn)   → Collection keyed by primaryFn
 * - createIndex(name, fn)        → eager secondary index, kept in sync on every write
 * - createIndex(name, fn, {lazy}) → lazy secondary index, resolved by scan
 * - primary(k) / secondary(name, k) → one addressing scheme for every lookup
 * - produce(collection, draft => …) → batch edits under one transient owner
 */

export { Collection, polydex, produce, into } from './collection';
export type { GetAndUpdateOutcome, CreateIndexOptions } from './collection';
export { CollectionDraft, Collector } from './draft';
export { primary, secondary } from './key';
export type { FullKey, PrimaryKeyRef, SecondaryKeyRef } from './key';
export { POP } from './internal';
export type { PrimaryFn, IndexFn } from './state';
export type { IndexNames } from './registry';
export type { FetchResult, Lookup, MissReason } from './resolver';
export { resolveOptions } from './config';
export type { CollectionOptions, DuplicateKeyPolicy, ResolvedOptions } from './config';
export { ConsoleLogger, logger, formatEntry } from './logger';
export type { Logger, LogEntry, LogLevel } from './logger';
export {
  PolydexError,
  IndexAlreadyExistsError,
  UnknownIndexError,
  KeyNotFoundError,
  LazyIndexLookupError,
  DuplicateSecondaryKeyError,
  InvalidSecondaryKeyError,
  DraftFinalizedError,
} from './errors';
