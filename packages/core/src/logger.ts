/**
 * Scoped logger with an in-memory ring buffer of recent entries.
 * Entries at or above LOG_LEVEL are echoed to the console.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  id: string;
  ts: number;
  scope: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };
const MAX_LOGS = 500;

const logs: LogEntry[] = [];
let nextId = 1;
let consoleLevel: LogLevel | 'silent' = parseLevel(process.env.LOG_LEVEL);

function parseLevel(value: string | undefined): LogLevel {
  const v = (value ?? '').toLowerCase();
  return v === 'debug' || v === 'warn' || v === 'error' ? v : 'info';
}

export function setLogLevel(level: LogLevel | 'silent'): void {
  consoleLevel = level;
}

function echo(entry: LogEntry): void {
  if (consoleLevel === 'silent' || LEVEL_ORDER[entry.level] < LEVEL_ORDER[consoleLevel]) return;
  const line = `[${entry.scope}] [${entry.level.toUpperCase()}] ${entry.message}`;
  const args = entry.data === undefined ? [line] : [line, entry.data];
  if (entry.level === 'error') console.error(...args);
  else if (entry.level === 'warn') console.warn(...args);
  else console.log(...args);
}

export function log(scope: string, level: LogLevel, message: string, data?: unknown): LogEntry {
  const entry: LogEntry = { id: `log-${nextId++}`, ts: Date.now(), scope, level, message, data };
  logs.push(entry);
  if (logs.length > MAX_LOGS) logs.shift();
  echo(entry);
  return entry;
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, data) => void log(scope, 'debug', message, data),
    info: (message, data) => void log(scope, 'info', message, data),
    warn: (message, data) => void log(scope, 'warn', message, data),
    error: (message, data) => void log(scope, 'error', message, data),
  };
}

export function getLogs(afterId?: string): LogEntry[] {
  if (!afterId) return [...logs];
  const idx = logs.findIndex((l) => l.id === afterId);
  if (idx < 0) return [...logs];
  return logs.slice(idx + 1);
}

export function clearLogs(): void {
  logs.length = 0;
}
