/**
 * Codecs for values stored as plain text.
 *
 * Numbers and decimals are written in the form INCRBY / INCRBYFLOAT read and
 * write, so counters set through a codec can be incremented atomically.
 */

import { Decimal } from 'decimal.js';
import { err, ok } from 'neverthrow';

import { createSerializationError, describeCause } from '../errors.js';

import type { ValueCodec } from '../ports.js';

/**
 * Stores strings as-is.
 */
export const stringCodec: ValueCodec<string> = {
  name: 'string',
  serialize: (value) => ok(value),
  deserialize: (text) => ok(text),
};

/**
 * Stores finite numbers as their shortest round-trip decimal text.
 */
export const numberCodec: ValueCodec<number> = {
  name: 'number',

  serialize(value) {
    if (!Number.isFinite(value)) {
      return err(
        createSerializationError('number', `Cannot encode non-finite number ${String(value)}`)
      );
    }
    return ok(String(value));
  },

  deserialize(text) {
    const parsed = text.trim() === '' ? Number.NaN : Number(text);
    if (!Number.isFinite(parsed)) {
      return err(createSerializationError('number', `Stored value is not a number: '${text}'`));
    }
    return ok(parsed);
  },
};

/**
 * Stores Decimal.js values in plain (non-exponential) notation.
 */
export const decimalCodec: ValueCodec<Decimal> = {
  name: 'decimal',

  serialize(value) {
    if (!value.isFinite()) {
      return err(createSerializationError('decimal', `Cannot encode ${value.toString()}`));
    }
    return ok(value.toFixed());
  },

  deserialize(text) {
    let parsed: Decimal;
    try {
      parsed = new Decimal(text);
    } catch (cause) {
      return err(
        createSerializationError(
          'decimal',
          `Stored value is not a decimal: ${describeCause(cause)}`,
          cause
        )
      );
    }
    if (!parsed.isFinite()) {
      return err(createSerializationError('decimal', `Stored value is not finite: '${text}'`));
    }
    return ok(parsed);
  },
};
