/**
 * Console logger for jobs and engine services.
 *
 * Keeps the emoji-prefixed console output the jobs have always printed, adds a scope tag
 * and a LOG_LEVEL threshold (debug | info | warn | error | silent).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type Severity = 'debug' | 'info' | 'success' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const SEVERITY_LEVEL: Record<Severity, LogLevel> = {
  debug: 'debug',
  info: 'info',
  success: 'info',
  warn: 'warn',
  error: 'error',
};

const EMOJI: Record<Severity, string> = {
  debug: '🔍',
  info: 'ℹ️ ',
  success: '✅',
  warn: '⚠️ ',
  error: '❌',
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function currentLogLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  success(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function createLogger(scope: string): Logger {
  const emit = (severity: Severity, message: string, data?: unknown): void => {
    // Read per call so tests and the CLI can change LOG_LEVEL after import
    if (LEVEL_ORDER[SEVERITY_LEVEL[severity]] < LEVEL_ORDER[currentLogLevel()]) return;

    const line = `${EMOJI[severity]} [${scope}] ${message}`;
    const sink = severity === 'error' ? console.error : severity === 'warn' ? console.warn : console.log;
    if (data !== undefined) {
      sink(line, data);
    } else {
      sink(line);
    }
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    success: (message, data) => emit('success', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
  };
}
