type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

/**
 * Output target for console loggers. `console` satisfies it.
 */
type LogSink = Pick<Console, LogLevel>;

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const noop: LogFn = () => {};

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }
}

/**
 * Create a logger writing to `sink` (console by default).
 * Messages below `minLevel` are dropped.
 */
const createConsoleLogger = (
  minLevel: LogLevel = 'info',
  sink: LogSink = console,
): Logger => {
  const threshold = LOG_LEVEL_ORDER[minLevel];
  const methodFor = (level: LogLevel): LogFn =>
    LOG_LEVEL_ORDER[level] >= threshold
      ? (...args: unknown[]) => sink[level](...args)
      : noop;

  return new Logger({
    debug: methodFor('debug'),
    info: methodFor('info'),
    warn: methodFor('warn'),
    error: methodFor('error'),
  });
};

const createSilentLogger = (): Logger =>
  new Logger({ debug: noop, info: noop, warn: noop, error: noop });

export { Logger, createConsoleLogger, createSilentLogger };
export type { LogFn, LogLevel, LogSink, LoggerMethods };
