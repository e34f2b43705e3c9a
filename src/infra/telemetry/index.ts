/**
 * Telemetry Module - Public API
 *
 * Span helpers for Redis commands. Structures call the CommandTracer hook
 * around every round trip; pick the OpenTelemetry tracer to export spans
 * through whatever SDK the host application registers.
 *
 * ```typescript
 * import { createOtelCommandTracer } from '@/infra/telemetry/index.js';
 *
 * const partition = createPartition({ executor, tracer: createOtelCommandTracer() });
 * ```
 */

export { ATTR, commandAttributes, setCommandError } from './attributes.js';

export {
  createOtelCommandTracer,
  noopCommandTracer,
  DEFAULT_TRACER_NAME,
  type OtelCommandTracerOptions,
} from './command-tracer.js';
