import { redact, safeStringify } from './redact.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogWriter = (level: LogLevel, line: string) => void;

interface LogEntry {
  level: LogLevel;
  ts: string;
  msg: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

function levelFromEnv(): LogLevel {
  const raw = process.env['PIPEWRIGHT_LOG_LEVEL'] ?? process.env['LOG_LEVEL'];
  return isLogLevel(raw) ? raw : 'info';
}

const defaultWriter: LogWriter = (level, line) => {
  if (level === 'error') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
};

let currentLevel: LogLevel = levelFromEnv();
let writer: LogWriter = defaultWriter;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Redirect log lines. Passing no writer restores stdout/stderr output.
 */
export function setLogWriter(next?: LogWriter): void {
  writer = next ?? defaultWriter;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;
  const entry: LogEntry = {
    ...extra,
    level,
    ts: new Date().toISOString(),
    msg: redact(msg),
  };
  writer(level, safeStringify(entry));
}

export const logger = {
  debug: (msg: string, extra?: Record<string, unknown>) => log('debug', msg, extra),
  info: (msg: string, extra?: Record<string, unknown>) => log('info', msg, extra),
  warn: (msg: string, extra?: Record<string, unknown>) => log('warn', msg, extra),
  error: (msg: string, extra?: Record<string, unknown>) => log('error', msg, extra),
  isDebugEnabled: () => shouldLog('debug'),
};
