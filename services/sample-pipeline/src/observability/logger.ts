import type { LogLevel } from '../config/serviceConfig';

export type LogMeta = Record<string, unknown>;

type LogPayload = {
  level: LogLevel;
  message: string;
  timestamp: string;
  source: string;
  meta?: LogMeta;
};

export type LogSink = (payload: LogPayload) => void;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(meta: LogMeta): Logger;
}

const LOG_SOURCE = process.env.SAMPLE_PIPELINE_LOG_SOURCE || 'sample-pipeline';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

let minimumLevel: LogLevel = 'info';

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function normalizeLogMeta(meta?: LogMeta): LogMeta | undefined {
  if (!meta || Object.keys(meta).length === 0) {
    return undefined;
  }
  const result: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    result[key] = serializeValue(value);
  }
  return result;
}

function outputToConsole(payload: LogPayload): void {
  const record = JSON.stringify(payload);
  switch (payload.level) {
    case 'debug':
    case 'info':
      console.log(record); // eslint-disable-line no-console
      break;
    case 'warn':
      console.warn(record); // eslint-disable-line no-console
      break;
    case 'error':
    default:
      console.error(record); // eslint-disable-line no-console
      break;
  }
}

let sink: LogSink = outputToConsole;

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

/** Swap the output sink; returns the previous one so tests can restore it. */
export function setLogSink(next: LogSink): LogSink {
  const previous = sink;
  sink = next;
  return previous;
}

export function logStructured(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minimumLevel]) {
    return;
  }
  const normalizedMeta = normalizeLogMeta(meta);
  const payload: LogPayload = {
    level,
    message,
    timestamp: new Date().toISOString(),
    source: LOG_SOURCE,
    ...(normalizedMeta ? { meta: normalizedMeta } : {})
  };
  sink(payload);
}

export function createLogger(baseMeta: LogMeta = {}): Logger {
  const merge = (meta?: LogMeta): LogMeta => ({ ...baseMeta, ...meta });
  return {
    debug(message, meta) {
      logStructured('debug', message, merge(meta));
    },
    info(message, meta) {
      logStructured('info', message, merge(meta));
    },
    warn(message, meta) {
      logStructured('warn', message, merge(meta));
    },
    error(message, meta) {
      logStructured('error', message, merge(meta));
    },
    child(meta) {
      return createLogger(merge(meta));
    }
  };
}

export const logger = createLogger();
