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

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

// biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
const envLevel = process.env['LOG_LEVEL'];
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

/**
 * Set the minimum level that is written to the console.
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function formatLog(entry: LogEntry): string {
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

export const logger = {
  debug(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('debug')) {
      console.debug(formatLog(createLogEntry('debug', message, data)));
    }
  },

  info(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('info')) {
      console.info(formatLog(createLogEntry('info', message, data)));
    }
  },

  warn(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('warn')) {
      console.warn(formatLog(createLogEntry('warn', message, data)));
    }
  },

  error(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('error')) {
      console.error(formatLog(createLogEntry('error', message, data)));
    }
  },
};
