/**
 * Structured console logging for trn-reader.
 *
 * Lines read `[timestamp] [LEVEL] [module] message {data}`, with `data`
 * JSON-encoded when given. The threshold comes from `TRN_READER_LOG_LEVEL`.
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

type Sink = (line: string) => void;

// Resolved at call time so console spies installed later still see output.
const sinks: Record<LogLevel, Sink> = {
  [LogLevel.ERROR]: (line) => console.error(line),
  [LogLevel.WARN]: (line) => console.warn(line),
  [LogLevel.INFO]: (line) => console.log(line),
  [LogLevel.DEBUG]: (line) => console.log(line),
};

export class Logger {
  constructor(
    private readonly module: string,
    private readonly threshold: LogLevel = LogLevel.INFO,
  ) {}

  private write(level: LogLevel, message: string, data: unknown): void {
    if (level > this.threshold) return;
    let line = `[${new Date().toISOString()}] [${LogLevel[level]}] [${this.module}] ${message}`;
    if (data !== undefined) line += ` ${JSON.stringify(data)}`;
    sinks[level](line);
  }

  error(message: string, data?: unknown): void {
    this.write(LogLevel.ERROR, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write(LogLevel.WARN, message, data);
  }

  info(message: string, data?: unknown): void {
    this.write(LogLevel.INFO, message, data);
  }

  debug(message: string, data?: unknown): void {
    this.write(LogLevel.DEBUG, message, data);
  }

  /** Logger for a sub-component, e.g. `pool:thread`, at the same threshold. */
  child(name: string): Logger {
    return new Logger(`${this.module}:${name}`, this.threshold);
  }
}

export function createLogger(module: string, level: LogLevel = getLogLevelFromEnv()): Logger {
  return new Logger(module, level);
}

export function getLogLevelFromEnv(): LogLevel {
  const name = process.env.TRN_READER_LOG_LEVEL?.toUpperCase();
  switch (name) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
      return LogLevel.WARN;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}
