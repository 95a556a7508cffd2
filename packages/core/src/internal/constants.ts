/**
 * Core constants for Polydex data structures
 */

// Bit-trie parameters (32-way branching)
export const BITS = 5;
export const BRANCH_FACTOR = 1 << BITS; // 32
export const MASK = BRANCH_FACTOR - 1;  // 31

// Returned from a getAndUpdate callback to remove the value instead of replacing it
export const POP: unique symbol = Symbol('POLYDEX_POP');

// Node's custom inspect hook
export const INSPECT: unique symbol = Symbol.for('nodejs.util.inspect.custom');
