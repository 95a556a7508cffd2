/**
 * Collection options and their resolution
 */

import { logger as defaultLogger, type Logger } from './logger';

/**
 * What happens when two values produce the same secondary key.
 * - `overwrite`: eager indices keep the most recently inserted value,
 *   lazy indices the first one in storage order
 * - `reject`: the conflicting write or lookup throws
 */
export type DuplicateKeyPolicy = 'overwrite' | 'reject';

export interface CollectionOptions {
  duplicateKeys?: DuplicateKeyPolicy;
  logger?: Logger;
}

export interface ResolvedOptions {
  readonly duplicateKeys: DuplicateKeyPolicy;
  readonly logger: Logger;
}

function isPolicy(value: string | undefined): value is DuplicateKeyPolicy {
  return value === 'overwrite' || value === 'reject';
}

/**
 * Priority: explicit option > POLYDEX_DUPLICATE_KEYS env var > "overwrite"
 */
export function resolveOptions(options: CollectionOptions = {}): ResolvedOptions {
  const fromEnv = process.env.POLYDEX_DUPLICATE_KEYS;
  return Object.freeze({
    duplicateKeys: options.duplicateKeys ?? (isPolicy(fromEnv) ? fromEnv : 'overwrite'),
    logger: options.logger ?? defaultLogger,
  });
}
