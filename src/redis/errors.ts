/**
 * Redis Structures - Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 * They travel as values inside neverthrow Results; nothing here is thrown.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Codec Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A value could not be encoded, or stored text could not be decoded.
 */
export interface SerializationError {
  readonly type: 'SerializationError';
  readonly message: string;
  readonly codec: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Remote Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The store could not be reached (connection refused, closed, or command timeout).
 * Retrying is left to the connection layer.
 */
export interface RemoteUnavailableError {
  readonly type: 'RemoteUnavailableError';
  readonly message: string;
  readonly reason: 'connection' | 'timeout';
  readonly retryable: boolean;
  readonly cause?: unknown;
}

/**
 * The store answered a plain command with an error reply (WRONGTYPE, invalid
 * expire time, an aborted transaction).
 */
export interface CommandError {
  readonly type: 'CommandError';
  readonly message: string;
  readonly command: string;
  readonly cause?: unknown;
}

/**
 * A server-side atomic script failed or replied with an unexpected shape.
 */
export interface ScriptExecutionError {
  readonly type: 'ScriptExecutionError';
  readonly message: string;
  readonly script: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Caller Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The caller abandoned the operation through its AbortSignal.
 */
export interface CancellationError {
  readonly type: 'CancellationError';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * An argument was rejected before any command was sent.
 */
export interface ValidationError {
  readonly type: 'ValidationError';
  readonly message: string;
  readonly field: string;
  readonly value?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Unions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors an executor can report for a single round trip.
 */
export type ExecutorError = RemoteUnavailableError | CommandError;

/**
 * All possible errors of string and set structure operations.
 */
export type RedisStructureError =
  | SerializationError
  | RemoteUnavailableError
  | CommandError
  | ScriptExecutionError
  | CancellationError
  | ValidationError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createSerializationError = (
  codec: string,
  message: string,
  cause?: unknown
): SerializationError => ({
  type: 'SerializationError',
  message,
  codec,
  ...(cause !== undefined && { cause }),
});

export const createRemoteUnavailableError = (
  message: string,
  reason: RemoteUnavailableError['reason'],
  cause?: unknown
): RemoteUnavailableError => ({
  type: 'RemoteUnavailableError',
  message,
  reason,
  retryable: true,
  ...(cause !== undefined && { cause }),
});

export const createCommandError = (
  command: string,
  message: string,
  cause?: unknown
): CommandError => ({
  type: 'CommandError',
  message,
  command,
  ...(cause !== undefined && { cause }),
});

export const createScriptExecutionError = (
  script: string,
  message: string,
  cause?: unknown
): ScriptExecutionError => ({
  type: 'ScriptExecutionError',
  message,
  script,
  ...(cause !== undefined && { cause }),
});

export const createCancellationError = (cause?: unknown): CancellationError => ({
  type: 'CancellationError',
  message: 'Operation was cancelled by the caller',
  ...(cause !== undefined && { cause }),
});

export const createValidationError = (
  field: string,
  message: string,
  value?: unknown
): ValidationError => ({
  type: 'ValidationError',
  message,
  field,
  ...(value !== undefined && { value }),
});

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Extracts a readable message from an unknown thrown value.
 */
export const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) {
    return cause.message;
  }
  return typeof cause === 'string' ? cause : 'Unknown error';
};
