import { trace, context } from '@opentelemetry/api';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const SERVICE_NAME = 'leadsmith-backend';

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

// Read per call so tests and operators can change LOG_LEVEL without a restart.
function minLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  return isLogLevel(configured) ? configured : 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel()];
}

function getTraceContext(): { trace_id?: string; span_id?: string } {
  const span = trace.getSpan(context.active());
  if (!span) return {};
  const ctx = span.spanContext();
  // All-zero trace ids come from the no-op tracer
  if (ctx.traceId === '00000000000000000000000000000000') return {};
  return { trace_id: ctx.traceId, span_id: ctx.spanId };
}

function formatEntry(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message,
    service: SERVICE_NAME,
    ...getTraceContext(),
    ...meta,
  });
}

/**
 * Structured JSON logger. debug/info go to stdout, warn/error to stderr.
 */
export const logger = {
  debug(message: string, meta?: Record<string, unknown>): void {
    if (shouldLog('debug')) process.stdout.write(formatEntry('debug', message, meta) + '\n');
  },

  info(message: string, meta?: Record<string, unknown>): void {
    if (shouldLog('info')) process.stdout.write(formatEntry('info', message, meta) + '\n');
  },

  warn(message: string, meta?: Record<string, unknown>): void {
    if (shouldLog('warn')) process.stderr.write(formatEntry('warn', message, meta) + '\n');
  },

  error(message: string, meta?: Record<string, unknown>): void {
    if (shouldLog('error')) process.stderr.write(formatEntry('error', message, meta) + '\n');
  },
};

export interface RequestLogEntry {
  requestId: string;
  method: string;
  path: string;
  statusCode: number;
  responseTime: number;
}

/**
 * Writes one access-log line for a completed HTTP request.
 */
export function logRequest(entry: RequestLogEntry): void {
  logger.info('http_request', { ...entry });
}

/** Flattens an unknown thrown value into something safe to put in log metadata. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
