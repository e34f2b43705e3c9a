/**
 * Get-or-compute-and-store.
 *
 * Reads a value; on a miss runs the caller's producer once, writes the produced
 * value with its expiration and returns it. There is no cross-call
 * deduplication: concurrent callers that all miss each run their own producer.
 */

import { AsyncResource } from 'node:async_hooks';

import { err, ok } from 'neverthrow';

import { checkAborted } from './command-runner.js';

import type { CommandOptions, Expiration, Lookup, StructureResult } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type Producer<T> = () => T | Promise<T>;

/**
 * Async context the producer runs in.
 * - `caller`: the caller's context; AsyncLocalStorage stores stay visible
 * - `detached`: the context this module was first loaded in, isolated from the
 *   caller's stores. Import the library at startup: loaded lazily inside an
 *   `AsyncLocalStorage.run`, every detached producer sees that run's store.
 */
export type ProducerContext = 'caller' | 'detached';

export interface GetOrComputeOptions extends CommandOptions {
  /** Default: 'caller' */
  producerContext?: ProducerContext;
}

/**
 * Primitive read and write the orchestrator composes.
 */
export interface CacheAsideStore<T> {
  tryGet(options?: CommandOptions): StructureResult<Lookup<T>>;
  set(value: T, expiration?: Expiration, options?: CommandOptions): StructureResult<void>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Producer Scheduling
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Captured when this module loads; see ProducerContext.
 */
const detachedScope = new AsyncResource('redis-structures.producer');

const invokeProducer = <T>(producer: Producer<T>, context: ProducerContext): T | Promise<T> =>
  context === 'detached' ? detachedScope.runInAsyncScope(producer) : producer();

// ─────────────────────────────────────────────────────────────────────────────
// Orchestration
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Returns the stored value, or computes, stores and returns a new one.
 *
 * Flow:
 * 1. Read; a failed read is returned and the producer does not run
 * 2. Hit: return the stored value
 * 3. Miss: run the producer exactly once
 * 4. Write the produced value with the expiration, unless the signal fired
 * 5. Return the produced value
 *
 * A producer that throws or rejects propagates its error as-is through the
 * returned promise, and nothing is written.
 */
export const getOrCompute = async <T>(
  store: CacheAsideStore<T>,
  producer: Producer<T>,
  expiration?: Expiration,
  options: GetOrComputeOptions = {}
): StructureResult<T> => {
  const { producerContext = 'caller', ...commandOptions } = options;

  const cached = await store.tryGet(commandOptions);
  if (cached.isErr()) {
    return err(cached.error);
  }
  if (cached.value.exists) {
    return ok(cached.value.value);
  }

  const beforeProduce = checkAborted(commandOptions.signal);
  if (beforeProduce !== undefined) {
    return err(beforeProduce);
  }

  const value = await invokeProducer(producer, producerContext);

  const written = await store.set(value, expiration, commandOptions);
  if (written.isErr()) {
    return err(written.error);
  }

  return ok(value);
};
