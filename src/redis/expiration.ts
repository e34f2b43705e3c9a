/**
 * Expiration conversion.
 */

import type { Expiration } from './types.js';

/**
 * Converts an expiration into whole seconds for EXPIRE / SET EX.
 *
 * Deadlines are measured against `now` and truncated toward zero.
 * A deadline in the past yields a negative number; it is passed to the store
 * unchanged, which either rejects it or expires the key immediately.
 */
export const toExpirySeconds = (expiration: Expiration, now: number = Date.now()): number => {
  if (expiration instanceof Date) {
    return Math.trunc((expiration.getTime() - now) / 1000);
  }
  return Math.trunc(expiration);
};
