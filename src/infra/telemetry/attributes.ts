/**
 * Span Attribute Helpers
 *
 * Attribute names and setters for Redis command spans.
 *
 * Usage:
 * ```typescript
 * import { ATTR, setCommandError } from '@/infra/telemetry/attributes.js';
 *
 * span.setAttribute(ATTR.STRUCTURE_KEY, 'session:42');
 * setCommandError(span, { type: 'CommandError', message: 'WRONGTYPE' });
 * ```
 */

import { SpanStatusCode, type Attributes, type Span } from '@opentelemetry/api';

import type { CommandTrace } from '../../redis/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Attribute Constants
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Standard database attributes plus a namespaced set for structure context.
 */
export const ATTR = {
  // OpenTelemetry database conventions
  DB_SYSTEM: 'db.system',
  DB_OPERATION: 'db.operation',
  DB_REDIS_DATABASE_INDEX: 'db.redis.database_index',

  // Structure attributes
  STRUCTURE_CATEGORY: 'redis_structures.category',
  STRUCTURE_KEY: 'redis_structures.key',
  STRUCTURE_PARTITION: 'redis_structures.partition',

  // Error classification
  ERROR_TYPE: 'error.type',
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Builders
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Builds the attributes recorded when a command span starts.
 */
export const commandAttributes = (trace: CommandTrace): Attributes => ({
  [ATTR.DB_SYSTEM]: 'redis',
  [ATTR.DB_OPERATION]: trace.command,
  [ATTR.DB_REDIS_DATABASE_INDEX]: trace.db,
  [ATTR.STRUCTURE_CATEGORY]: trace.category,
  [ATTR.STRUCTURE_KEY]: trace.key,
  [ATTR.STRUCTURE_PARTITION]: trace.partition,
});

// ─────────────────────────────────────────────────────────────────────────────
// Error Recording
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Marks a span as failed with a structure error.
 *
 * @param error - Any value with a `type` discriminator and a message
 */
export const setCommandError = (span: Span, error: { type: string; message: string }): void => {
  span.recordException({ name: error.type, message: error.message });
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: error.message,
  });
  span.setAttribute(ATTR.ERROR_TYPE, error.type);
};
