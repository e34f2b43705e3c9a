/**
 * JSON codec with Decimal.js, Date and bigint awareness.
 * Preserves precision and rich types across the serialization boundary.
 */

import { Value } from '@sinclair/typebox/value';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { createSerializationError, describeCause, type SerializationError } from '../errors.js';

import type { ValueCodec } from '../ports.js';
import type { Static, TSchema } from '@sinclair/typebox';

const DECIMAL_MARKER = '__decimal__';
const DATE_MARKER = '__date__';
const BIGINT_MARKER = '__bigint__';
const OBJECT_MARKER = '__object__';

const MARKERS: ReadonlySet<string> = new Set([
  DECIMAL_MARKER,
  DATE_MARKER,
  BIGINT_MARKER,
  OBJECT_MARKER,
]);

const CODEC_NAME = 'json';

/**
 * Check if a value is a Decimal instance.
 */
const isDecimal = (val: unknown): val is Decimal => {
  return val !== null && typeof val === 'object' && val instanceof Decimal;
};

/**
 * Recursively transform a value into plain JSON data.
 * Rich types become marked objects, object keys are sorted so equal values
 * always yield equal text. Must run before JSON.stringify because
 * Decimal.toJSON() and Date.toJSON() would otherwise be called first.
 *
 * A plain object owning a marker key is wrapped in an `__object__` marker, so
 * it can never be read back as a rich type.
 */
const toJsonData = (value: unknown, ancestors: Set<object>): unknown => {
  if (isDecimal(value)) {
    return { [DECIMAL_MARKER]: value.toString() };
  }

  if (value instanceof Date) {
    return { [DATE_MARKER]: value.toISOString() };
  }

  if (typeof value === 'bigint') {
    return { [BIGINT_MARKER]: value.toString() };
  }

  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new TypeError(`Cannot encode non-finite number ${String(value)}`);
  }

  if (typeof value === 'function' || typeof value === 'symbol') {
    throw new TypeError(`Cannot encode value of type ${typeof value}`);
  }

  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (ancestors.has(value)) {
    throw new TypeError('Cannot encode circular structure');
  }
  ancestors.add(value);

  let result: unknown;
  if (Array.isArray(value)) {
    result = value.map((item: unknown) => toJsonData(item, ancestors));
  } else {
    const record: Record<string, unknown> = {};
    const keys = Object.keys(value).sort();
    for (const key of keys) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) {
        record[key] = toJsonData(entry, ancestors);
      }
    }
    result = keys.some((key) => MARKERS.has(key)) ? { [OBJECT_MARKER]: record } : record;
  }

  ancestors.delete(value);
  return result;
};

const isRecord = (val: unknown): val is Record<string, unknown> =>
  val !== null && typeof val === 'object' && !Array.isArray(val);

const fromRecord = (record: Record<string, unknown>): Record<string, unknown> => {
  const restored: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(record)) {
    restored[key] = fromJsonData(entry);
  }
  return restored;
};

/**
 * Restores marked objects produced by toJsonData.
 * Walks top-down: only an object whose single key is a marker is a marker, and
 * the contents of an `__object__` marker are taken as plain fields.
 */
const fromJsonData = (val: unknown): unknown => {
  if (Array.isArray(val)) {
    return val.map((item: unknown) => fromJsonData(item));
  }
  if (!isRecord(val)) {
    return val;
  }

  const keys = Object.keys(val);
  const [marker] = keys;
  if (keys.length !== 1 || marker === undefined || !MARKERS.has(marker)) {
    return fromRecord(val);
  }

  const payload = val[marker];
  if (marker === OBJECT_MARKER) {
    if (!isRecord(payload)) {
      throw new TypeError('Malformed object marker');
    }
    return fromRecord(payload);
  }
  if (typeof payload !== 'string') {
    throw new TypeError(`Malformed ${marker} marker`);
  }
  if (marker === DECIMAL_MARKER) {
    return new Decimal(payload);
  }
  if (marker === DATE_MARKER) {
    return new Date(payload);
  }
  return BigInt(payload);
};

/**
 * Serialize a value to JSON text, preserving Decimal, Date and bigint values.
 */
export const serializeJson = (value: unknown): Result<string, SerializationError> => {
  if (value === undefined) {
    return err(createSerializationError(CODEC_NAME, 'Cannot encode undefined'));
  }
  try {
    return ok(JSON.stringify(toJsonData(value, new Set())));
  } catch (cause) {
    return err(
      createSerializationError(
        CODEC_NAME,
        `Failed to serialize value: ${describeCause(cause)}`,
        cause
      )
    );
  }
};

/**
 * Deserialize JSON text, restoring Decimal, Date and bigint values.
 */
export const deserializeJson = (text: string): Result<unknown, SerializationError> => {
  try {
    const value = fromJsonData(JSON.parse(text));
    return ok(value);
  } catch (cause) {
    return err(
      createSerializationError(
        CODEC_NAME,
        `Failed to deserialize stored value: ${describeCause(cause)}`,
        cause
      )
    );
  }
};

/**
 * Create a JSON codec.
 *
 * With a TypeBox schema, decoded values are checked against it; stored text of
 * another shape (e.g. written by an older encoding) fails with SerializationError.
 * Without a schema, the decoded value is trusted to be a `T`.
 *
 * @example
 * ```typescript
 * const Session = Type.Object({ userId: Type.String(), issuedAt: Type.Date() });
 * const session = client.string('session:42', createJsonCodec(Session));
 * ```
 */
export function createJsonCodec<S extends TSchema>(schema: S): ValueCodec<Static<S>>;
export function createJsonCodec<T>(): ValueCodec<T>;
export function createJsonCodec(schema?: TSchema): ValueCodec<unknown> {
  return {
    name: CODEC_NAME,

    serialize(value: unknown) {
      if (schema !== undefined && !Value.Check(schema, value)) {
        return err(
          createSerializationError(CODEC_NAME, 'Value does not match the codec schema', [
            ...Value.Errors(schema, value),
          ])
        );
      }
      return serializeJson(value);
    },

    deserialize(text: string) {
      const decoded = deserializeJson(text);
      if (decoded.isErr() || schema === undefined) {
        return decoded;
      }
      if (!Value.Check(schema, decoded.value)) {
        const errors = [...Value.Errors(schema, decoded.value)];
        const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
        return err(
          createSerializationError(
            CODEC_NAME,
            `Stored value does not match the codec schema: ${errorMessages}`,
            errors
          )
        );
      }
      return ok(decoded.value);
    },
  };
}
