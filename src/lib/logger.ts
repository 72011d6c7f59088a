export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  bindings?: LogContext;
  now?: () => number;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.info(line);
  }
};

// Error objects do not survive JSON.stringify, so flatten them first.
function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    const out: LogContext = { name: value.name, message: value.message };
    if ('code' in value && typeof value.code === 'string') out.code = value.code;
    if (value.cause !== undefined) out.cause = serializeValue(value.cause);
    return out;
  }
  return value;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    sink = consoleSink,
    bindings = {},
    now = () => Date.now(),
  } = options;
  const threshold = LEVEL_ORDER[level];

  const write = (lvl: LogLevel, message: string, context?: LogContext) => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    const fields: LogContext = {};
    for (const [k, v] of Object.entries({ ...bindings, ...context })) {
      fields[k] = serializeValue(v);
    }
    const line = JSON.stringify({
      timestamp: new Date(now()).toISOString(),
      level: lvl,
      message,
      ...fields,
    });
    sink(lvl, line);
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    child: (extra) => createLogger({ level, sink, now, bindings: { ...bindings, ...extra } }),
  };
}

// Drops everything; for callers that pass no logger.
export const silentLogger: Logger = createLogger({ level: 'error', sink: () => undefined });
