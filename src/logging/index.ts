/**
 * Logging Module
 *
 * Console-backed Logger factory. Two output formats:
 * - text: `[INFO] [gateway] message {"meta":"..."}`
 * - json: one object per line with timestamp, level, module, message and metadata
 */

import type { Logger, Metrics } from '../types/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'text';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Destination for formatted lines, one call per record
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  sink?: LogSink;
  /** Fields merged into every record */
  bindings?: Record<string, unknown>;
  now?: () => Date;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

export function formatRecord(
  format: LogFormat,
  level: LogLevel,
  module: string,
  message: string,
  meta: Record<string, unknown> | undefined,
  timestamp: Date
): string {
  if (format === 'json') {
    return JSON.stringify({
      timestamp: timestamp.toISOString(),
      level,
      module,
      message,
      ...meta,
    });
  }

  const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `[${level.toUpperCase()}] [${module}] ${message}${suffix}`;
}

/**
 * Create a logger for one module
 */
export function createLogger(module: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const format = options.format ?? 'text';
  const sink = options.sink ?? consoleSink;
  const bindings = options.bindings ?? {};
  const now = options.now ?? (() => new Date());

  const emit = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const merged = { ...bindings, ...meta };
    sink(level, formatRecord(format, level, module, message, merged, now()));
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
  };
}

/**
 * Wrap a logger so every record carries `trace_id`
 */
export function withTrace(logger: Logger, traceId: string): Logger {
  const bind = (meta?: Record<string, unknown>): Record<string, unknown> => ({ ...meta, trace_id: traceId });
  return {
    debug: (message, meta) => logger.debug(message, bind(meta)),
    info: (message, meta) => logger.info(message, bind(meta)),
    warn: (message, meta) => logger.warn(message, bind(meta)),
    error: (message, meta) => logger.error(message, bind(meta)),
  };
}

export const noopMetrics: Metrics = {
  increment: () => {},
  gauge: () => {},
  timing: () => {},
};
