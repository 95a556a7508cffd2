/**
 * Core type definitions
 */

// Transient owner for structural sharing
export type Owner = object | undefined;
