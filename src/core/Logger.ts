/**
 * Logger configuration using Pino
 * Human-readable lines to stdout and to an append-only log file
 */
import pino, { multistream, type Logger } from 'pino';
import pretty from 'pino-pretty';
import { errorMessage } from './errors.js';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

export interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
  /** Append-only log file; omitted means stdout only */
  file?: string;
}

const levelSymbols: Record<string, string> = {
  fatal: '💀',
  error: '❌',
  warn: '⚠️',
  info: 'ℹ️',
  debug: '🔍',
  trace: '📝',
};

export const symbols = {
  success: '✅',
  error: '❌',
  dns: '🌐',
  ip: '📡',
  notify: '🔔',
  startup: '🚀',
};

/**
 * Format a value for inline display
 */
export function formatValue(value: unknown, maxLen: number = 40): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') {
    return value.length > maxLen ? value.substring(0, maxLen) + '...' : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    if (value.length <= 3) {
      return value.map((v) => formatValue(v, 30)).join(', ');
    }
    return `${value.length} items`;
  }

  if (value instanceof Date) return value.toISOString();

  if (typeof value === 'object') {
    const keys = Object.keys(value);
    if (keys.length === 0) return '{}';
    return `{${keys.length} fields}`;
  }

  return String(value);
}

// Keys that hold opaque ids: truncate to short form
const ID_KEYS = new Set(['recordId', 'requestId', 'id']);

/**
 * Format context data as ` (key=value, ...)`, most useful fields first
 */
export function formatContext(log: Record<string, unknown>, excludeKeys: string[]): string {
  const priorityKeys = ['domain', 'ip', 'previousIp', 'outcome', 'source', 'action', 'recordId'];

  const sortedKeys = Object.keys(log)
    .filter((k) => !excludeKeys.includes(k))
    .sort((a, b) => {
      const aIdx = priorityKeys.indexOf(a);
      const bIdx = priorityKeys.indexOf(b);
      if (aIdx >= 0 && bIdx >= 0) return aIdx - bIdx;
      if (aIdx >= 0) return -1;
      if (bIdx >= 0) return 1;
      return 0;
    });

  const contextParts: string[] = [];
  for (const key of sortedKeys.slice(0, 6)) {
    const maxLen = ID_KEYS.has(key) ? 12 : 40;
    const formatted = formatValue(log[key], maxLen);
    if (formatted) {
      contextParts.push(`${key}=${formatted}`);
    }
  }

  return contextParts.length > 0 ? ` (${contextParts.join(', ')})` : '';
}

/**
 * Render one log line body: symbol, [service] prefix, message, context
 */
export function formatMessage(log: Record<string, unknown>, messageKey: string): string {
  const level = log['level'];
  const service = log['service'];
  const msg = log[messageKey];
  const symbol = (typeof level === 'string' ? levelSymbols[level] : undefined) ?? 'ℹ️';

  let output = '';
  if (typeof service === 'string') {
    output += `[${service}] `;
  }
  output += typeof msg === 'string' ? msg : '';

  const excludeKeys = ['level', 'time', 'pid', 'hostname', 'app', 'service', messageKey, 'err', 'error', 'stack'];
  output += formatContext(log, excludeKeys);

  return `${symbol} ${output}`;
}

function createPrettyStream(colorize: boolean, destination: string | number) {
  return pretty({
    colorize,
    translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
    ignore: 'app',
    hideObject: true,
    destination,
    append: true,
    mkdir: true,
    sync: true,
    messageFormat: (log, messageKey) => formatMessage(log, messageKey),
    customPrettifiers: {
      level: () => '',
    },
  });
}

/**
 * Create the run logger. Nothing global: the caller owns the instance and
 * hands it (or children of it) to every component.
 */
export function createLogger(options: LoggerOptions): Logger {
  const baseConfig: pino.LoggerOptions = {
    level: options.level,
    base: {
      app: 'aliddns',
      pid: undefined,
      hostname: undefined,
    },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  const streams: pino.StreamEntry[] = [];

  if (options.pretty) {
    streams.push({ level: options.level, stream: createPrettyStream(true, 1) });
    if (options.file) {
      streams.push({ level: options.level, stream: createPrettyStream(false, options.file) });
    }
  } else {
    streams.push({ level: options.level, stream: pino.destination({ dest: 1, sync: true }) });
    if (options.file) {
      streams.push({
        level: options.level,
        stream: pino.destination({ dest: options.file, append: true, mkdir: true, sync: true }),
      });
    }
  }

  return pino(baseConfig, multistream(streams));
}

/**
 * Create the run logger. When the log file cannot be opened the run still
 * goes ahead, logging to stdout only.
 */
export function createRunLogger(options: LoggerOptions): Logger {
  try {
    return createLogger(options);
  } catch (error) {
    const logger = createLogger({ ...options, file: undefined });
    logger.warn({ file: options.file, error: errorMessage(error) }, 'Cannot open log file, logging to stdout only');
    return logger;
  }
}

/**
 * Logger that drops everything
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Create a child logger scoped to a component
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export type { Logger };
