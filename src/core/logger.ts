import { createWriteStream, type WriteStream } from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  /** Flush and release the log file, if any */
  close(): void;
}

export interface LoggerOptions {
  /** Emit debug lines */
  verbose?: boolean;
  /** Append to this file instead of writing to stderr */
  logFile?: string;
  /** Defaults to process.stderr */
  sink?: { write(chunk: string): unknown };
  now?: () => Date;
}

/**
 * Logger that discards everything. The default when a library caller injects none.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  close: () => {},
};

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Create a logger writing `[ISO] LEVEL message` lines.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const now = options.now ?? (() => new Date());
  let stream: WriteStream | undefined;
  if (options.logFile) {
    stream = createWriteStream(options.logFile, { flags: 'a' });
  }
  const sink = stream ?? options.sink ?? process.stderr;

  function write(level: LogLevel, message: string): void {
    sink.write(`[${now().toISOString()}] ${level.toUpperCase()} ${message}\n`);
  }

  return {
    debug(message) {
      if (options.verbose) {
        write('debug', message);
      }
    },
    info: message => write('info', message),
    warn: message => write('warn', message),
    error(message, error) {
      write('error', error === undefined ? message : `${message}: ${describeError(error)}`);
    },
    close() {
      stream?.end();
    },
  };
}
