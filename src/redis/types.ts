/**
 * Redis Structures - Shared Types
 */

import type { RedisStructureError } from './errors.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Lookups
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Outcome of a read that may find nothing.
 * Distinguishes a stored value from an absent key without a null sentinel.
 */
export type Lookup<T> = { readonly exists: true; readonly value: T } | { readonly exists: false };

export const found = <T>(value: T): Lookup<T> => ({ exists: true, value });

export const notFound = <T>(): Lookup<T> => ({ exists: false });

// ─────────────────────────────────────────────────────────────────────────────
// Expiration
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Time-to-live of an entry.
 * - `number`: relative duration in seconds (fractions are truncated)
 * - `Date`: absolute deadline, converted to seconds remaining at call time
 */
export type Expiration = number | Date;

// ─────────────────────────────────────────────────────────────────────────────
// Call Options
// ─────────────────────────────────────────────────────────────────────────────

export interface CommandOptions {
  /** Abandons the call. Nothing is sent if the signal is already aborted. */
  signal?: AbortSignal;
}

/**
 * Category label attached to every traced command.
 */
export type CommandCategory = 'RedisString' | 'RedisSet';

/**
 * Async result of any structure operation.
 */
export type StructureResult<T> = Promise<Result<T, RedisStructureError>>;
