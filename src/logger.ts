/**
 * Console logger with level filtering and ANSI colours
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// Colors for terminal output
export const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  /** Disable colours (always off for custom sinks) */
  color?: boolean;
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const sink = options.sink ?? consoleSink;
  const useColor = options.sink ? false : options.color ?? process.stdout.isTTY === true;

  const emit = (level: Exclude<LogLevel, 'silent'>, tag: string, color: string, message: string) => {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = `  [${tag}] ${message}`;
    sink(level, useColor ? `${color}${line}${colors.reset}` : line);
  };

  return {
    debug: message => emit('debug', 'DEBUG', colors.gray, message),
    info: message => emit('info', 'INFO', colors.blue, message),
    success: message => emit('info', 'OK', colors.green, message),
    warn: message => emit('warn', 'WARN', colors.yellow, message),
    error: message => emit('error', 'ERROR', colors.red, message),
  };
}

/** Logger that discards everything */
export const silentLogger: Logger = createLogger({ level: 'silent' });
