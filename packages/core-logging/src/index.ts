export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggerContext = {
  service?: string;
  component?: string;
  [key: string]: unknown;
};

export type Logger = {
  debug: (message: string, context?: LoggerContext) => void;
  info: (message: string, context?: LoggerContext) => void;
  warn: (message: string, context?: LoggerContext) => void;
  error: (message: string, context?: LoggerContext) => void;
  child: (context: LoggerContext) => Logger;
};

export interface LoggerOptions {
  /** Entries below this level are dropped. Defaults to `info`. */
  level?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function serializeEntry(level: LogLevel, message: string, context?: LoggerContext) {
  const entry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    ...context
  };

  return Object.fromEntries(
    Object.entries(entry)
      .filter(([, value]) => value !== undefined && value !== null)
      .map(([key, value]) => [key, serializeValue(value)])
  );
}

export function createLogger(baseContext: LoggerContext = {}, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];

  const write = (level: LogLevel, message: string, context?: LoggerContext) => {
    if (LEVEL_ORDER[level] < threshold) return;
    const payload = serializeEntry(level, message, { ...baseContext, ...context });
    // Every level goes to stdout; the level travels inside the JSON payload
    console.log(JSON.stringify(payload));
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    child: (context) => createLogger({ ...baseContext, ...context }, options)
  };
}
