/**
 * Tests for HAMT operations
 */

import { describe, it, expect } from 'vitest';
import {
  hamtDelete,
  hamtEmpty,
  hamtFromEntries,
  hamtGet,
  hamtHas,
  hamtLookup,
  hamtSet,
  hamtToEntries,
  hashKey,
  keyEquals,
  type HMap,
  type Owner,
} from './index';

describe('HAMT', () => {
  describe('persistent updates', () => {
    it('should leave the original map untouched on set', () => {
      const m1 = hamtSet(hamtEmpty<string, number>(), undefined, 'a', 1);
      const m2 = hamtSet(m1, undefined, 'b', 2);

      expect(hamtHas(m1, 'b')).toBe(false);
      expect(hamtGet(m2, 'a')).toBe(1);
      expect(hamtGet(m2, 'b')).toBe(2);
      expect(m1.size).toBe(1);
      expect(m2.size).toBe(2);
    });

    it('should leave the original map untouched on delete', () => {
      const m1 = hamtFromEntries([['a', 1], ['b', 2]]);
      const m2 = hamtDelete(m1, undefined, 'a');

      expect(hamtGet(m1, 'a')).toBe(1);
      expect(hamtHas(m2, 'a')).toBe(false);
      expect(m2.size).toBe(1);
    });

    it('should return the same map when nothing changes', () => {
      const m1 = hamtFromEntries([['a', 1]]);

      expect(hamtSet(m1, undefined, 'a', 1)).toBe(m1);
      expect(hamtDelete(m1, undefined, 'missing')).toBe(m1);
    });

    it('should overwrite without growing', () => {
      const m1 = hamtFromEntries([['a', 1]]);
      const m2 = hamtSet(m1, undefined, 'a', 5);

      expect(m2.size).toBe(1);
      expect(hamtGet(m2, 'a')).toBe(5);
    });
  });

  describe('lookups', () => {
    it('should tell a stored undefined apart from a missing key', () => {
      const map = hamtSet(hamtEmpty<string, undefined>(), undefined, 'a', undefined);

      expect(hamtLookup(map, 'a')).toEqual({ found: true, value: undefined });
      expect(hamtLookup(map, 'b')).toEqual({ found: false });
    });

    it('should treat +0 and -0 as the same key', () => {
      const map = hamtFromEntries([[0, 'zero']]);

      expect(hamtGet(map, -0)).toBe('zero');
      expect(keyEquals(NaN, NaN)).toBe(true);
    });

    it('should key objects by identity', () => {
      const key = { id: 1 };
      const map = hamtFromEntries([[key, 'found']]);

      expect(hamtGet(map, key)).toBe('found');
      expect(hamtHas(map, { id: 1 })).toBe(false);
    });
  });

  describe('hash collisions', () => {
    // Integers 2^32 apart share a hash
    const low = 1;
    const high = 4294967297;

    it('should share a hash for integers 2^32 apart', () => {
      expect(hashKey(low)).toBe(hashKey(high));
    });

    it('should keep colliding keys apart', () => {
      const map = hamtFromEntries([[low, 'low'], [high, 'high']]);

      expect(map.size).toBe(2);
      expect(hamtGet(map, low)).toBe('low');
      expect(hamtGet(map, high)).toBe('high');
    });

    it('should split a collision node when a different hash arrives', () => {
      const map = hamtFromEntries([[low, 'low'], [high, 'high'], [2, 'two']]);

      expect(map.size).toBe(3);
      expect(hamtGet(map, low)).toBe('low');
      expect(hamtGet(map, high)).toBe('high');
      expect(hamtGet(map, 2)).toBe('two');
    });

    it('should collapse a collision after a delete', () => {
      const map = hamtDelete(hamtFromEntries([[low, 'low'], [high, 'high']]), undefined, low);

      expect(map.size).toBe(1);
      expect(hamtHas(map, low)).toBe(false);
      expect(hamtGet(map, high)).toBe('high');
    });
  });

  describe('large maps', () => {
    it('should hold and release many keys', () => {
      let map: HMap<string, number> = hamtEmpty();
      const owner: Owner = {};
      for (let i = 0; i < 2000; i++) {
        map = hamtSet(map, owner, `key-${i}`, i);
      }
      expect(map.size).toBe(2000);

      for (let i = 0; i < 2000; i += 2) {
        map = hamtDelete(map, undefined, `key-${i}`);
      }
      expect(map.size).toBe(1000);

      for (let i = 0; i < 2000; i++) {
        expect(hamtGet(map, `key-${i}`)).toBe(i % 2 === 0 ? undefined : i);
      }
      expect(hamtToEntries(map)).toHaveLength(1000);
    });

    it('should not let a transient owner edit a persistent map', () => {
      const base = hamtFromEntries(Array.from({ length: 100 }, (_, i) => [i, i] as const));
      const owner: Owner = {};
      let edited = base;
      for (let i = 0; i < 100; i++) {
        edited = hamtSet(edited, owner, i, i * 10);
      }

      expect(hamtGet(edited, 7)).toBe(70);
      expect(hamtGet(base, 7)).toBe(7);
    });
  });
});
