export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown> | undefined;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minimumLevel: LogLevel = 'info';

function formatLog(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()}: ${entry.message}`;
  if (entry.data) {
    return `${base} ${JSON.stringify(entry.data)}`;
  }
  return base;
}

function createLogEntry(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>
): LogEntry {
  return {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

/**
 * Set the minimum level that reaches the console.
 */
export function configureLogger(options: { level: LogLevel }): void {
  minimumLevel = options.level;
}

export const logger = {
  debug(message: string, data?: Record<string, unknown>): void {
    if (enabled('debug')) console.debug(formatLog(createLogEntry('debug', message, data)));
  },

  info(message: string, data?: Record<string, unknown>): void {
    if (enabled('info')) console.info(formatLog(createLogEntry('info', message, data)));
  },

  warn(message: string, data?: Record<string, unknown>): void {
    if (enabled('warn')) console.warn(formatLog(createLogEntry('warn', message, data)));
  },

  error(message: string, data?: Record<string, unknown>): void {
    if (enabled('error')) console.error(formatLog(createLogEntry('error', message, data)));
  },
};

export type Logger = typeof logger;
