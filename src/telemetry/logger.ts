type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogThreshold(value: string): value is LogThreshold {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

let threshold: LogThreshold | undefined;

function currentThreshold(): LogThreshold {
  if (threshold) return threshold;
  const fromEnv = process.env.LEXLOCATOR_LOG_LEVEL?.trim().toLowerCase() ?? '';
  return isLogThreshold(fromEnv) ? fromEnv : 'info';
}

/** Overrides LEXLOCATOR_LOG_LEVEL; pass undefined to fall back to the env again. */
export function setLogLevel(level: LogThreshold | undefined): void {
  threshold = level;
}

export function getLogLevel(): LogThreshold {
  return currentThreshold();
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentThreshold()]) return;
  // stdout is reserved for machine-readable CLI output (`--json`, search hits).
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
