/**
 * Redis Structures - Ports
 *
 * Interfaces for the collaborators the structures depend on: value codecs,
 * the remote executor and the command tracer. Adapters live in ./adapters and
 * ./codecs; tests substitute in-process fakes.
 */

import type { ExecutorError, SerializationError } from './errors.js';
import type { CommandCategory } from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Value Codec
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Bidirectional transform between a typed value and its stored text.
 *
 * Codecs must be pure and deterministic: equal values produce equal text, and
 * `deserialize(serialize(v))` gives back a value equal to `v`.
 */
export interface ValueCodec<T> {
  /** Name reported in SerializationError */
  readonly name: string;

  serialize(value: T): Result<string, SerializationError>;

  deserialize(text: string): Result<T, SerializationError>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Remote Executor
// ─────────────────────────────────────────────────────────────────────────────

export type ExecutorResult<T> = Promise<Result<T, ExecutorError>>;

/**
 * A fixed server-side script, identified by the SHA1 of its body.
 */
export interface AtomicScript {
  readonly name: string;
  readonly lua: string;
  readonly sha1: string;
}

/**
 * Commands queued for one MULTI/EXEC unit.
 * Nothing is sent until `exec()`; the queued commands commit together.
 */
export interface RedisTransaction {
  getSet(key: string, value: string): RedisTransaction;

  expire(key: string, seconds: number): RedisTransaction;

  /**
   * Sends the transaction.
   * @returns One raw reply per queued command, in queue order
   */
  exec(): ExecutorResult<unknown[]>;
}

/**
 * One connection bound to one database index.
 * Every method is a single round trip; replies are returned untouched.
 */
export interface RedisExecutor {
  readonly db: number;

  // Strings
  get(key: string): ExecutorResult<string | null>;
  set(key: string, value: string, expirySeconds?: number): ExecutorResult<void>;
  getSet(key: string, value: string): ExecutorResult<string | null>;
  incrBy(key: string, delta: number): ExecutorResult<number>;
  decrBy(key: string, delta: number): ExecutorResult<number>;
  /** @returns The reply text, which carries the full precision of the stored value */
  incrByFloat(key: string, delta: number): ExecutorResult<string>;

  // Keys
  del(key: string): ExecutorResult<number>;
  exists(key: string): ExecutorResult<boolean>;
  /** @returns false when the key does not exist */
  expire(key: string, seconds: number): ExecutorResult<boolean>;

  // Sets
  sAdd(key: string, members: readonly string[]): ExecutorResult<number>;
  sRem(key: string, members: readonly string[]): ExecutorResult<number>;
  sIsMember(key: string, member: string): ExecutorResult<boolean>;
  sMembers(key: string): ExecutorResult<string[]>;
  sCard(key: string): ExecutorResult<number>;
  sRandMember(key: string): ExecutorResult<string | null>;
  sRandMemberCount(key: string, count: number): ExecutorResult<string[]>;
  sPop(key: string): ExecutorResult<string | null>;
  sPopCount(key: string, count: number): ExecutorResult<string[]>;

  // Atomic units
  multi(): RedisTransaction;
  evalScript(
    script: AtomicScript,
    keys: readonly string[],
    args: readonly string[]
  ): ExecutorResult<unknown>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Command Tracer
// ─────────────────────────────────────────────────────────────────────────────

export interface CommandTrace {
  category: CommandCategory;
  key: string;
  command: string;
  partition: string;
  db: number;
}

export interface CommandSpan {
  /** Closes the span, marking it failed when an error is given */
  end(error?: { type: string; message: string }): void;
}

/**
 * Observability hook called around every remote call.
 */
export interface CommandTracer {
  start(trace: CommandTrace): CommandSpan;
}
