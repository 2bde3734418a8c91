export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function activeLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : 'info';
}

function serializeError(error: Error): Record<string, unknown> {
  const result: Record<string, unknown> = { name: error.name, message: error.message };
  if (error.stack) result.stack = error.stack;
  if (error.cause !== undefined) {
    result.cause = error.cause instanceof Error ? serializeError(error.cause) : error.cause;
  }
  return result;
}

function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) return serializeError(value);
  if (typeof value === 'bigint') return value.toString();
  return value;
}

export function formatMeta(value: unknown): string {
  if (value instanceof Error) return value.stack ?? `${value.name}: ${value.message}`;
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value, replacer);
  } catch {
    return String(value);
  }
}

export function formatLine(level: LogLevel, message: string, meta: unknown[], at: Date = new Date()): string {
  if (process.env.LOG_FORMAT?.trim().toLowerCase() === 'json') {
    const entry: Record<string, unknown> = { time: at.toISOString(), level, message };
    if (meta.length === 1) entry.meta = meta[0];
    else if (meta.length > 1) entry.meta = meta;
    return JSON.stringify(entry, replacer);
  }
  const parts = [at.toISOString(), level.toUpperCase().padEnd(5), message, ...meta.map(formatMeta)];
  return parts.join(' ');
}

function emit(level: LogLevel, message: string, meta: unknown[]) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel()]) return;
  const line = formatLine(level, message, meta);
  if (level === 'warn' || level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
}

export const log = {
  debug: (message: string, ...meta: unknown[]) => emit('debug', message, meta),
  info: (message: string, ...meta: unknown[]) => emit('info', message, meta),
  warn: (message: string, ...meta: unknown[]) => emit('warn', message, meta),
  error: (message: string, ...meta: unknown[]) => emit('error', message, meta)
};
