/**
 * Unit tests for telemetry span helpers
 *
 * These tests verify that the helpers correctly interact with OpenTelemetry
 * spans. We use in-memory fake spans (not mocking libraries) following the
 * project's testing conventions.
 */

import { SpanKind, SpanStatusCode, type Span, type SpanContext, type SpanOptions } from '@opentelemetry/api';
import { describe, expect, it } from 'vitest';

import { ATTR, commandAttributes, setCommandError } from '@/infra/telemetry/attributes.js';
import { createOtelCommandTracer, noopCommandTracer } from '@/infra/telemetry/command-tracer.js';

// ─────────────────────────────────────────────────────────────────────────────
// Fake Span Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a fake span for testing.
 * Records attribute, status, exception and end calls for verification.
 */
const createFakeSpan = () => {
  const attributes: Record<string, unknown> = {};
  const exceptions: unknown[] = [];
  let status: { code: SpanStatusCode; message?: string } | undefined;
  let endCount = 0;

  const fakeSpanContext: SpanContext = {
    traceId: '0af7651916cd43dd8448eb211c80319c',
    spanId: 'b7ad6b7169203331',
    traceFlags: 1,
  };

  const fakeSpan: Span = {
    setAttribute: (key: string, value: unknown) => {
      attributes[key] = value;
      return fakeSpan;
    },
    setAttributes: (attrs: Record<string, unknown>) => {
      Object.assign(attributes, attrs);
      return fakeSpan;
    },
    setStatus: (newStatus: { code: SpanStatusCode; message?: string }) => {
      status = newStatus;
      return fakeSpan;
    },
    recordException: (exception: unknown) => {
      exceptions.push(exception);
    },
    spanContext: () => fakeSpanContext,
    addEvent: () => fakeSpan,
    addLink: () => fakeSpan,
    addLinks: () => fakeSpan,
    updateName: () => fakeSpan,
    end: () => {
      endCount += 1;
    },
    isRecording: () => true,
  };

  return {
    span: fakeSpan,
    getAttributes: () => attributes,
    getExceptions: () => exceptions,
    getStatus: () => status,
    getEndCount: () => endCount,
  };
};

const trace = {
  category: 'RedisString',
  key: 'app:session:42',
  command: 'GET',
  partition: 'localhost:6379/2',
  db: 2,
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────────────────

describe('ATTR constants', () => {
  it('exports database attribute names', () => {
    expect(ATTR.DB_SYSTEM).toBe('db.system');
    expect(ATTR.DB_OPERATION).toBe('db.operation');
    expect(ATTR.DB_REDIS_DATABASE_INDEX).toBe('db.redis.database_index');
  });

  it('exports structure attribute names', () => {
    expect(ATTR.STRUCTURE_CATEGORY).toBe('redis_structures.category');
    expect(ATTR.STRUCTURE_KEY).toBe('redis_structures.key');
    expect(ATTR.STRUCTURE_PARTITION).toBe('redis_structures.partition');
  });
});

describe('commandAttributes', () => {
  it('describes the command, key and partition', () => {
    expect(commandAttributes(trace)).toEqual({
      'db.system': 'redis',
      'db.operation': 'GET',
      'db.redis.database_index': 2,
      'redis_structures.category': 'RedisString',
      'redis_structures.key': 'app:session:42',
      'redis_structures.partition': 'localhost:6379/2',
    });
  });
});

describe('setCommandError', () => {
  it('records the exception, error status and error type', () => {
    const fake = createFakeSpan();

    setCommandError(fake.span, { type: 'CommandError', message: 'WRONGTYPE' });

    expect(fake.getExceptions()).toEqual([{ name: 'CommandError', message: 'WRONGTYPE' }]);
    expect(fake.getStatus()).toEqual({ code: SpanStatusCode.ERROR, message: 'WRONGTYPE' });
    expect(fake.getAttributes()[ATTR.ERROR_TYPE]).toBe('CommandError');
  });
});

describe('createOtelCommandTracer', () => {
  const createFakeTracer = () => {
    const started: { name: string; options: SpanOptions | undefined }[] = [];
    const fake = createFakeSpan();
    return {
      tracer: {
        startSpan: (name: string, options?: SpanOptions) => {
          started.push({ name, options });
          return fake.span;
        },
      },
      started,
      fake,
    };
  };

  it('opens a client span named after category and command', () => {
    const { tracer, started, fake } = createFakeTracer();

    createOtelCommandTracer({ tracer }).start(trace).end();

    expect(started).toEqual([
      { name: 'RedisString GET', options: { kind: SpanKind.CLIENT, attributes: commandAttributes(trace) } },
    ]);
    expect(fake.getEndCount()).toBe(1);
    expect(fake.getStatus()).toBeUndefined();
  });

  it('marks the span failed when ended with an error', () => {
    const { tracer, fake } = createFakeTracer();

    createOtelCommandTracer({ tracer })
      .start(trace)
      .end({ type: 'RemoteUnavailableError', message: 'Redis GET failed: Command timed out' });

    expect(fake.getStatus()?.code).toBe(SpanStatusCode.ERROR);
    expect(fake.getAttributes()[ATTR.ERROR_TYPE]).toBe('RemoteUnavailableError');
    expect(fake.getEndCount()).toBe(1);
  });

  it('falls back to the global API tracer', () => {
    expect(() => {
      createOtelCommandTracer().start(trace).end();
    }).not.toThrow();
  });
});

describe('noopCommandTracer', () => {
  it('returns spans that can be ended with or without an error', () => {
    const span = noopCommandTracer.start(trace);
    expect(() => {
      span.end();
      span.end({ type: 'CommandError', message: 'x' });
    }).not.toThrow();
  });
});
