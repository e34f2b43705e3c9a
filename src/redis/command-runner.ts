/**
 * Runs one remote round trip for a structure operation.
 *
 * Wraps the call in a command span, honours the caller's AbortSignal and logs
 * failures. Errors are returned, never thrown, and never retried here.
 */

import { err, type Result } from 'neverthrow';

import {
  createCancellationError,
  describeCause,
  type CancellationError,
  type RedisStructureError,
} from './errors.js';

import type { CacheKey } from './key-space.js';
import type { CommandCategory, CommandOptions } from './types.js';

export interface CommandContext {
  key: CacheKey;
  category: CommandCategory;
  command: string;
  options?: CommandOptions | undefined;
}

/**
 * Returns a CancellationError if the signal has already fired.
 */
export const checkAborted = (signal: AbortSignal | undefined): CancellationError | undefined =>
  signal?.aborted === true ? createCancellationError(signal.reason) : undefined;

/**
 * Settles with CancellationError as soon as the signal fires, without waiting
 * for the pending call. The call itself is left to finish on the connection.
 */
export const raceAbort = <T, E>(
  pending: Promise<Result<T, E>>,
  signal: AbortSignal | undefined
): Promise<Result<T, E | CancellationError>> => {
  if (signal === undefined) {
    return pending;
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      resolve(err(createCancellationError(signal.reason)));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    pending.then(
      (result) => {
        signal.removeEventListener('abort', onAbort);
        resolve(result);
      },
      (cause: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(cause);
      }
    );
  });
};

/**
 * Execute an operation against the key's partition.
 *
 * Flow:
 * 1. Refuse to send anything if the signal is already aborted
 * 2. Open a span identified by (category, key, command)
 * 3. Await the operation, racing it against the signal
 * 4. Close the span, recording the error if any
 */
export const runCommand = async <T>(
  context: CommandContext,
  operation: () => Promise<Result<T, RedisStructureError>>
): Promise<Result<T, RedisStructureError>> => {
  const { key, category, command } = context;
  const { partition } = key;
  const signal = context.options?.signal;

  const cancelled = checkAborted(signal);
  if (cancelled !== undefined) {
    return err(cancelled);
  }

  const span = partition.tracer.start({
    category,
    key: key.name,
    command,
    partition: partition.name,
    db: partition.db,
  });

  let result: Result<T, RedisStructureError>;
  try {
    result = await raceAbort(operation(), signal);
  } catch (cause) {
    span.end({ type: 'UnexpectedError', message: describeCause(cause) });
    throw cause;
  }

  if (result.isErr()) {
    span.end(result.error);
    partition.logger.debug(
      { err: result.error, key: key.name, command, category },
      `[Redis] ${command} failed: ${result.error.message}`
    );
  } else {
    span.end();
  }

  return result;
};
