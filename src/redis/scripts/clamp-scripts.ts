/**
 * Clamped Increment Scripts
 *
 * Four server-side atomic units (integer/float x max/min) rendered from one
 * template. Each unit increments with the store's native primitive, compares
 * against the bound, overwrites the key with the bound when it is crossed, and
 * replies with the final stored value. Redis runs a script without
 * interleaving other clients' commands, so concurrent clamped increments
 * cannot lose updates.
 *
 * KEYS[1] = counter key
 * ARGV[1] = delta, ARGV[2] = bound (both as decimal text)
 */

import { createHash } from 'node:crypto';

import { err, ok, type Result } from 'neverthrow';

import { createScriptExecutionError, type ScriptExecutionError } from '../errors.js';

import type { AtomicScript } from '../ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Descriptors
// ─────────────────────────────────────────────────────────────────────────────

export type ClampNumeric = 'integer' | 'float';
export type ClampBound = 'max' | 'min';

export interface ClampScript extends AtomicScript {
  readonly numeric: ClampNumeric;
  readonly bound: ClampBound;
}

/**
 * Per numeric variant: increment command, and what the script replies when it
 * clamps. Float replies are text: INCRBYFLOAT's own reply when not clamped and
 * the caller's bound text when clamped, so no digits are lost on the way.
 */
const NUMERIC_VARIANTS = {
  integer: { command: 'incrby', clampedReply: 'bound' },
  float: { command: 'incrbyfloat', clampedReply: 'ARGV[2]' },
} as const satisfies Record<ClampNumeric, { command: string; clampedReply: string }>;

const BOUND_VARIANTS = {
  max: { comparator: '>' },
  min: { comparator: '<' },
} as const satisfies Record<ClampBound, { comparator: string }>;

// ─────────────────────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Hash a script body the way the store identifies it for EVALSHA.
 */
export const scriptSha1 = (lua: string): string => createHash('sha1').update(lua).digest('hex');

export const renderClampScript = (numeric: ClampNumeric, bound: ClampBound): string => {
  const { command, clampedReply } = NUMERIC_VARIANTS[numeric];
  const { comparator } = BOUND_VARIANTS[bound];

  return [
    `local bound = tonumber(ARGV[2])`,
    `local value = redis.call('${command}', KEYS[1], ARGV[1])`,
    `if tonumber(value) ${comparator} bound then`,
    `  redis.call('set', KEYS[1], ARGV[2])`,
    `  return ${clampedReply}`,
    `end`,
    `return value`,
  ].join('\n');
};

const defineClampScript = (numeric: ClampNumeric, bound: ClampBound): ClampScript => {
  const lua = renderClampScript(numeric, bound);
  return Object.freeze({
    name: `${numeric === 'integer' ? 'incrby' : 'incrbyfloat'}-clamp-${bound}`,
    lua,
    sha1: scriptSha1(lua),
    numeric,
    bound,
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

export const CLAMP_SCRIPTS = {
  integerMax: defineClampScript('integer', 'max'),
  integerMin: defineClampScript('integer', 'min'),
  floatMax: defineClampScript('float', 'max'),
  floatMin: defineClampScript('float', 'min'),
} as const;

export const clampScriptFor = (numeric: ClampNumeric, bound: ClampBound): ClampScript => {
  if (numeric === 'integer') {
    return bound === 'max' ? CLAMP_SCRIPTS.integerMax : CLAMP_SCRIPTS.integerMin;
  }
  return bound === 'max' ? CLAMP_SCRIPTS.floatMax : CLAMP_SCRIPTS.floatMin;
};

// ─────────────────────────────────────────────────────────────────────────────
// Arguments & Replies
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Formats a number as script argument text.
 * String() yields the shortest text that parses back to the same double.
 */
export const formatScriptNumber = (value: number): string => String(value);

/**
 * Validates a script reply against the variant's reply shape.
 */
export const parseClampReply = (
  script: ClampScript,
  reply: unknown
): Result<number, ScriptExecutionError> => {
  if (script.numeric === 'integer') {
    if (typeof reply === 'number' && Number.isInteger(reply)) {
      return ok(reply);
    }
    return err(
      createScriptExecutionError(script.name, `Expected an integer reply, got ${typeof reply}`)
    );
  }

  if (typeof reply !== 'string') {
    return err(
      createScriptExecutionError(script.name, `Expected a text reply, got ${typeof reply}`)
    );
  }
  const parsed = Number(reply);
  if (reply.trim() === '' || !Number.isFinite(parsed)) {
    return err(createScriptExecutionError(script.name, `Reply is not a number: '${reply}'`));
  }
  return ok(parsed);
};
