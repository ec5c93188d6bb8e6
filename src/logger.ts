import { appConfig, LogLevel } from './config';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

const minLevel: LogLevel = appConfig.logLevel;

function shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel];
}

function write(
  name: string,
  level: Exclude<LogLevel, 'silent'>,
  message: string,
  context?: Record<string, unknown>
): void {
  if (!shouldLog(level)) return;

  const prefix = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${name}:`;
  const contextStr = context ? ` ${JSON.stringify(context)}` : '';
  const line = `${prefix} ${message}${contextStr}`;

  if (level === 'warn' || level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Create a logger whose lines are tagged with `name`, e.g. `karma.ledger`.
 */
export function createLogger(name: string): Logger {
  return {
    debug: (message, context) => write(name, 'debug', message, context),
    info: (message, context) => write(name, 'info', message, context),
    warn: (message, context) => write(name, 'warn', message, context),
    error: (message, context) => write(name, 'error', message, context)
  };
}

export function describeError(error: unknown): Record<string, unknown> {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return { error: String(error.message), name: 'name' in error ? String(error.name) : 'Error' };
  }
  return { error: String(error) };
}
