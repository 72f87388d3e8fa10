import { format } from 'node:util';

type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

/**
 * Writable target for console loggers (process.stderr by default)
 */
interface LogSink {
  write(chunk: string): unknown;
}

interface ConsoleLoggerOptions {
  /**
   * Lowest level that is written (default: 'info')
   */
  level?: LogLevel;

  /**
   * Destination stream. Defaults to stderr so stdout stays free for command output.
   */
  sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
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

  /**
   * Create a logger that formats arguments like console.* and writes
   * every message at or above `level` to the sink.
   */
  static console(options: ConsoleLoggerOptions = {}): Logger {
    const threshold = LEVEL_ORDER[options.level ?? 'info'];
    const sink = options.sink ?? process.stderr;

    const writer = (level: Exclude<LogLevel, 'silent'>): LogFn => {
      if (LEVEL_ORDER[level] < threshold) {
        return noop;
      }
      return (...args) => {
        sink.write(`${format(...args)}\n`);
      };
    };

    return new Logger({
      debug: writer('debug'),
      info: writer('info'),
      warn: writer('warn'),
      error: writer('error'),
    });
  }
}

export { Logger };
export type {
  ConsoleLoggerOptions,
  LoggerMethods,
  LogFn,
  LogLevel,
  LogSink,
};
