export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'text';
export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(component: string): Logger;
  startTimer(): { end: () => number };
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Component logger. Text output goes through console[level]; json output is
 * written as one line per entry on stderr so stdout stays free for data.
 */
export function createLogger(
  component: string,
  minLevel: LogLevel = 'info',
  format: LogFormat = 'text'
): Logger {
  const minLevelValue = LOG_LEVELS[minLevel];

  function logText(level: LogLevel, message: string, context?: LogContext): void {
    const line = `${new Date().toISOString()} [${level.toUpperCase()}] [${component}] ${message}`;
    if (context === undefined) {
      console[level](line);
    } else {
      console[level](line, context);
    }
  }

  function logJson(level: LogLevel, message: string, context?: LogContext): void {
    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
    };
    if (context !== undefined) {
      entry.context = context;
    }
    process.stderr.write(JSON.stringify(entry) + '\n');
  }

  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS[level] < minLevelValue) {
      return;
    }

    if (format === 'json') {
      logJson(level, message, context);
    } else {
      logText(level, message, context);
    }
  }

  function startTimer(): ReturnType<Logger['startTimer']> {
    const startTime = Date.now();
    return {
      end: () => Date.now() - startTime,
    };
  }

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
    child: (name) => createLogger(`${component}:${name}`, minLevel, format),
    startTimer,
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

export function isLogFormat(value: string): value is LogFormat {
  return value === 'json' || value === 'text';
}
