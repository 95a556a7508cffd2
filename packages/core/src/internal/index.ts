/**
 * Internal modules barrel export
 */

// Constants
export { BITS, BRANCH_FACTOR, MASK, POP, INSPECT } from './constants';

// Utils
export { popcount } from './utils';
export { structuralEquals } from './equal';

// HAMT
export {
  hamtEmpty,
  hamtLookup,
  hamtGet,
  hamtHas,
  hamtSet,
  hamtDelete,
  hamtFromEntries,
  hamtIter,
  hamtValues,
  hamtToEntries,
  hashKey,
  keyEquals,
  type HLeaf,
  type HCollision,
  type HNode,
  type HChild,
  type HMap,
  type HLookup,
} from './hamt';

// Types
export type { Owner } from './types';
