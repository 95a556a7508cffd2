/**
 * Tests for error types
 */

import { describe, it, expect } from 'vitest';
import {
  DuplicateSecondaryKeyError,
  IndexAlreadyExistsError,
  InvalidSecondaryKeyError,
  KeyNotFoundError,
  PolydexError,
  UnknownIndexError,
} from './errors';
import { primary, secondary } from './key';

describe('errors', () => {
  it('should carry stable names and codes', () => {
    const error = new UnknownIndexError('initial');

    expect(error).toBeInstanceOf(PolydexError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('UnknownIndexError');
    expect(error.code).toBe('UNKNOWN_INDEX');
    expect(error.index).toBe('initial');
  });

  it('should describe primary and secondary keys', () => {
    expect(new KeyNotFoundError(primary(42)).message).toBe('Key not found: 42');
    expect(new KeyNotFoundError(secondary('initial', 'J')).message).toBe(`Key not found: 'J' in index "initial"`);
  });

  it('should keep the cause', () => {
    const cause = new Error('index function failed');
    const error = new IndexAlreadyExistsError('age', { cause });

    expect(error.cause).toBe(cause);
    expect(error.code).toBe('INDEX_EXISTS');
  });

  it('should expose the conflicting key', () => {
    const error = new DuplicateSecondaryKeyError('initial', 'B');

    expect(error.key).toBe('B');
    expect(error.message).toBe(`Duplicate key 'B' in index "initial"`);
  });

  it('should render the rejected key', () => {
    const error = new InvalidSecondaryKeyError('pair', ['a', 3]);

    expect(error.code).toBe('INVALID_KEY');
    expect(error.index).toBe('pair');
    expect(error.message).toBe(`Index "pair" produced a non-primitive key [ 'a', 3 ]`);
  });
});
