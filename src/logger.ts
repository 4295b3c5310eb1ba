/**
 * Logging utility for catdiff
 * Writes to stderr so stdout stays reserved for per-case results
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Line sink, stderr by default */
  write?: (line: string) => void;
  color?: boolean;
}

function formatMessage(
  level: LogLevel,
  message: string,
  color: boolean,
  data?: Record<string, unknown>
): string {
  const timestamp = new Date().toISOString().slice(11, 23); // HH:mm:ss.SSS
  const prefix = `[${timestamp}] [CATDIFF]`;
  const levelStr = level.toUpperCase().padEnd(5);

  if (!color) {
    return data ? `${prefix} ${levelStr} ${message} ${JSON.stringify(data)}` : `${prefix} ${levelStr} ${message}`;
  }

  let tint = COLORS.reset;
  switch (level) {
    case 'debug':
      tint = COLORS.dim;
      break;
    case 'info':
      tint = COLORS.cyan;
      break;
    case 'warn':
      tint = COLORS.yellow;
      break;
    case 'error':
      tint = COLORS.red;
      break;
  }

  let output = `${tint}${prefix} ${levelStr}${COLORS.reset} ${message}`;
  if (data) {
    output += ` ${COLORS.dim}${JSON.stringify(data)}${COLORS.reset}`;
  }
  return output;
}

export function createLogger(level: LogLevel, options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => console.error(line));
  const color = options.color ?? Boolean(process.stderr.isTTY);
  const shouldLog = (candidate: LogLevel) => LOG_LEVELS[candidate] >= LOG_LEVELS[level];

  return {
    level,

    debug(message, data) {
      if (shouldLog('debug')) write(formatMessage('debug', message, color, data));
    },

    info(message, data) {
      if (shouldLog('info')) write(formatMessage('info', message, color, data));
    },

    warn(message, data) {
      if (shouldLog('warn')) write(formatMessage('warn', message, color, data));
    },

    error(message, error, data) {
      if (!shouldLog('error')) return;
      const errorData = error === undefined
        ? data
        : error instanceof Error
          ? { ...data, error: error.message }
          : { ...data, error: String(error) };
      write(formatMessage('error', message, color, errorData));
    },
  };
}

/**
 * Level taken from CATDIFF_LOG_LEVEL, falling back to 'info' when unset or invalid.
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const parsed = LogLevelSchema.safeParse(env.CATDIFF_LOG_LEVEL);
  return parsed.success ? parsed.data : 'info';
}
