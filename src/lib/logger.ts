import { appendFileSync } from 'node:fs';

export type Verbosity = 0 | 1 | 2;

export interface CribbageLogger {
  /** Printed when verbosity >= level (default 1), or always under debug. */
  log(message: string, level?: Verbosity): void;
  /** Printed only in debug mode. */
  debug(message: string): void;
  error(message: string, err?: unknown): void;
}

export interface ConsoleLoggerOptions {
  verbosity: Verbosity;
  debug: boolean;
  logFile?: string;
  tag?: string;
}

export function createConsoleLogger({ verbosity, debug, logFile, tag = '[CRIBBAGE]' }: ConsoleLoggerOptions): CribbageLogger {
  const write = (message: string) => {
    console.log(`${tag} ${message}`);
    if (logFile) appendFileSync(logFile, `${message}\n`);
  };

  return {
    log(message, level = 1) {
      if (debug || verbosity >= level) write(message);
    },
    debug(message) {
      if (debug) write(message);
    },
    error(message, err) {
      console.error(`${tag} ${message}`, err ?? '');
      if (logFile) appendFileSync(logFile, `[ERROR] ${message}\n`);
    },
  };
}

export const silentLogger: CribbageLogger = {
  log: () => undefined,
  debug: () => undefined,
  error: () => undefined,
};
