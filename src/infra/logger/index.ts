/**
 * Logger factory using Pino
 * Provides structured JSON logging with configurable levels
 */

import { pino, stdSerializers, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'redis-structures',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Serializes the `err` field of a log entry.
 * Thrown errors go through pino's standard serializer. Error values
 * (`{ type, message, ...fields, cause? }`) keep their fields, with an Error
 * cause serialized the same way.
 */
export const serializeLogError = (value: unknown): unknown => {
  if (value instanceof Error) {
    return stdSerializers.err(value);
  }
  if (value === null || typeof value !== 'object' || !('type' in value)) {
    return value;
  }

  const fields: Record<string, unknown> = { ...value };
  const cause = fields['cause'];
  if (cause instanceof Error) {
    fields['cause'] = stdSerializers.err(cause);
  }
  return fields;
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
    serializers: { err: serializeLogError },
  };

  // Use pino-pretty in development for readable logs
  if (finalConfig.pretty === true && finalConfig.level !== 'silent') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return pino(options);
};

export interface PartitionLogContext {
  /** Partition name, `host:port/db` for configured endpoints */
  partition: string;
  db: number;
}

/**
 * Creates the logger of one Redis partition. Every entry it writes carries
 * the partition name and database index.
 */
export const createPartitionLogger = (parent: Logger, context: PartitionLogContext): Logger =>
  parent.child({ component: 'redis', partition: context.partition, db: context.db });

export { type Logger } from 'pino';
