/**
 * Error types for collection operations
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 */

import { inspect } from 'node:util';
import { describeKey, type FullKey } from './key';

/**
 * Base class for all Polydex errors
 */
export abstract class PolydexError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an index name is already used by an eager or lazy index
 */
export class IndexAlreadyExistsError extends PolydexError {
  readonly code = 'INDEX_EXISTS';

  constructor(public readonly index: string, options?: ErrorOptions) {
    super(`Index "${index}" already present`, options);
  }
}

/**
 * Thrown when an index name is not registered
 */
export class UnknownIndexError extends PolydexError {
  readonly code = 'UNKNOWN_INDEX';

  constructor(public readonly index: string, options?: ErrorOptions) {
    super(`Unknown index "${index}"`, options);
  }
}

/**
 * Thrown by strict accessors when no value sits under the key
 */
export class KeyNotFoundError extends PolydexError {
  readonly code = 'KEY_NOT_FOUND';

  constructor(public readonly key: FullKey<unknown>, options?: ErrorOptions) {
    super(`Key not found: ${describeKey(key)}`, options);
  }
}

/**
 * Thrown when a primary key is requested from a lazy index
 */
export class LazyIndexLookupError extends PolydexError {
  readonly code = 'LAZY_INDEX';

  constructor(public readonly index: string, options?: ErrorOptions) {
    super(`Index "${index}" is lazy and keeps no key mapping`, options);
  }
}

/**
 * Thrown under the "reject" policy when two values share a secondary key
 */
export class DuplicateSecondaryKeyError extends PolydexError {
  readonly code = 'DUPLICATE_KEY';

  constructor(
    public readonly index: string,
    public readonly key: unknown,
    options?: ErrorOptions
  ) {
    super(`Duplicate key ${inspect(key)} in index "${index}"`, options);
  }
}

/**
 * Thrown when an index function returns an object, array or function
 */
export class InvalidSecondaryKeyError extends PolydexError {
  readonly code = 'INVALID_KEY';

  constructor(
    public readonly index: string,
    public readonly key: unknown,
    options?: ErrorOptions
  ) {
    super(`Index "${index}" produced a non-primitive key ${inspect(key)}`, options);
  }
}

export class DraftFinalizedError extends PolydexError {
  readonly code = 'DRAFT_FINALIZED';

  constructor(options?: ErrorOptions) {
    super('Draft has already been finalized', options);
  }
}
