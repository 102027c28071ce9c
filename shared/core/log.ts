export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
  ts: number;
  data?: Record<string, unknown>;
}

export type LogEmitter = (entry: LogEntry) => void;

export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const SECRET_KEYS = new Set(['nsec', 'secretKey', 'sk', 'privateKey']);

let emitter: LogEmitter | null = null;
let quiet = false;

export function setLogEmitter(next: LogEmitter | null): void {
  emitter = typeof next === 'function' ? next : null;
}

/** Silences console output; the emitter still receives entries. */
export function setConsoleLoggingEnabled(enabled: boolean): void {
  quiet = !enabled;
}

export function redactSensitive(entry: LogEntry): LogEntry {
  const clone: LogEntry = { ...entry };
  if (clone.data) {
    const data: Record<string, unknown> = { ...clone.data };
    for (const key of Object.keys(data)) {
      if (SECRET_KEYS.has(key)) {
        data[key] = '[redacted]';
      }
    }
    clone.data = data;
  }
  return clone;
}

export function formatLog(entry: LogEntry): string {
  return JSON.stringify(redactSensitive(entry));
}

function write(scope: string, level: LogLevel, message: string, data?: Record<string, unknown>): void {
  const entry = redactSensitive({ level, scope, message, ts: Date.now(), data });
  if (!quiet) {
    const line = `[${scope}] ${message}`;
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.info;
    if (entry.data) {
      sink(line, entry.data);
    } else {
      sink(line);
    }
  }
  if (!emitter) {
    return;
  }
  try {
    emitter(entry);
  } catch (error) {
    if (!quiet) {
      console.warn('[core/log] emitter failed', error);
    }
  }
}

export function createLogger(scope: string): Logger {
  return {
    info: (message, data) => write(scope, 'info', message, data),
    warn: (message, data) => write(scope, 'warn', message, data),
    error: (message, data) => write(scope, 'error', message, data),
  };
}
