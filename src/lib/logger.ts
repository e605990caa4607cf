/**
 * Structured logging
 *
 * One JSON object per line on the console, with a correlation id per logger
 * so the entries of one analysis can be grouped.
 */

import { randomUUID } from 'node:crypto';
import type { JsonObject, PricingErrorCode } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

export type OpStatus = 'ok' | 'needs_justification' | 'rejected';

export interface LogEntry {
  level: LogLevel;
  service: string;
  op?: string;
  correlationId: string;
  status?: OpStatus;
  durationMs?: number;
  errorCode?: PricingErrorCode;
  meta?: JsonObject;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const MAX_META_SIZE_BYTES = 1024;

let threshold: LogThreshold = 'info';

export function setLogThreshold(level: LogThreshold): void {
  threshold = level;
}

export function getLogThreshold(): LogThreshold {
  return threshold;
}

/**
 * Truncate meta above 1KB, measured in UTF-8 bytes.
 */
export function truncateMeta(meta?: JsonObject): JsonObject | undefined {
  if (!meta) return undefined;

  const serialized = JSON.stringify(meta);
  const byteLength = Buffer.byteLength(serialized, 'utf8');

  if (byteLength <= MAX_META_SIZE_BYTES) {
    return meta;
  }

  return {
    _truncated: true,
    _original_size_bytes: byteLength,
    preview: serialized.substring(0, 200),
  };
}

/**
 * Emit a structured JSON log to console.
 */
export function structuredLog(entry: LogEntry): void {
  if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[threshold]) return;

  const logObj = {
    timestamp: new Date().toISOString(),
    level: entry.level,
    service: entry.service,
    op: entry.op,
    correlation_id: entry.correlationId,
    status: entry.status,
    duration_ms: entry.durationMs,
    error_code: entry.errorCode,
    meta: truncateMeta(entry.meta),
  };

  const logFn = entry.level === 'error' ? console.error :
                entry.level === 'warn' ? console.warn :
                entry.level === 'debug' ? console.debug :
                console.log;

  logFn(JSON.stringify(logObj));
}

type BoundEntry = Omit<LogEntry, 'level' | 'service' | 'correlationId'>;

export interface Logger {
  readonly service: string;
  readonly correlationId: string;
  debug(entry: BoundEntry): void;
  info(entry: BoundEntry): void;
  warn(entry: BoundEntry): void;
  error(entry: BoundEntry): void;
}

export function createLogger(service: string, correlationId: string = randomUUID()): Logger {
  const emit = (level: LogLevel) => (entry: BoundEntry) =>
    structuredLog({ ...entry, level, service, correlationId });

  return {
    service,
    correlationId,
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}
