/**
 * Command Tracers
 *
 * Implementations of the CommandTracer hook: one backed by the OpenTelemetry
 * API and one that records nothing. Registering an SDK and exporters is the
 * host application's concern; without one, the API hands out no-op spans.
 */

import { SpanKind, trace, type Tracer } from '@opentelemetry/api';

import { commandAttributes, setCommandError } from './attributes.js';

import type { CommandSpan, CommandTracer } from '../../redis/ports.js';

export const DEFAULT_TRACER_NAME = 'redis-structures';

export interface OtelCommandTracerOptions {
  /** Tracer to use. Defaults to `trace.getTracer(tracerName)`. */
  tracer?: Pick<Tracer, 'startSpan'>;
  /** Instrumentation scope name. Default: 'redis-structures' */
  tracerName?: string;
}

/**
 * Create a tracer that opens one CLIENT span per command.
 * Span name format: `{category} {command}` (e.g. `RedisString GET`).
 */
export const createOtelCommandTracer = (options: OtelCommandTracerOptions = {}): CommandTracer => {
  const tracer = options.tracer ?? trace.getTracer(options.tracerName ?? DEFAULT_TRACER_NAME);

  return {
    start(commandTrace): CommandSpan {
      const span = tracer.startSpan(`${commandTrace.category} ${commandTrace.command}`, {
        kind: SpanKind.CLIENT,
        attributes: commandAttributes(commandTrace),
      });

      return {
        end(error) {
          if (error !== undefined) {
            setCommandError(span, error);
          }
          span.end();
        },
      };
    },
  };
};

const noopSpan: CommandSpan = {
  end() {
    // nothing recorded
  },
};

export const noopCommandTracer: CommandTracer = {
  start: () => noopSpan,
};
