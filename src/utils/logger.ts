/**
 * Structured logger
 *
 * One JSON object per line with level, component, message and timestamp.
 * The minimum level is set once at startup from configuration.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: LogLevel = process.env.NODE_ENV === 'test' ? 'error' : 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minLevel];
}

function formatEntry(
  level: LogLevel,
  component: string,
  message: string,
  context?: Record<string, unknown>
): string {
  return JSON.stringify({
    level,
    component,
    msg: message,
    ts: new Date().toISOString(),
    ...context,
  });
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Logger bound to a component name, e.g. createLogger('ChatService')
 */
export function createLogger(component: string): Logger {
  return {
    debug(message, context) {
      if (!shouldLog('debug')) return;
      console.debug(formatEntry('debug', component, message, context));
    },
    info(message, context) {
      if (!shouldLog('info')) return;
      console.info(formatEntry('info', component, message, context));
    },
    warn(message, context) {
      if (!shouldLog('warn')) return;
      console.warn(formatEntry('warn', component, message, context));
    },
    error(message, context) {
      if (!shouldLog('error')) return;
      console.error(formatEntry('error', component, message, context));
    },
  };
}

export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      error: error.message,
      errorName: error.name,
      stack: error.stack,
    };
  }
  return { error: String(error) };
}
