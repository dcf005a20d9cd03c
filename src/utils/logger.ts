/**
 * Logger Module
 *
 * Level-filtered diagnostics for the analyzer and the CLI. Entries go to
 * stderr, so stdout stays clean for reports, and optionally to a log file
 * (`analyze --log-file`).
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Log levels ordered by severity (lower = more severe)
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export interface Logger {
  error(component: string, message: string, meta?: object): void;
  warn(component: string, message: string, meta?: object): void;
  info(component: string, message: string, meta?: object): void;
  debug(component: string, message: string, meta?: object): void;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  /** Suppress stderr output; the log file, if any, still receives entries */
  setSilentConsole(silent: boolean): void;
  /** Log file in use, or null once writing to it has failed */
  readonly filePath: string | null;
}

export interface LoggerOptions {
  /** Default: from the environment, else INFO */
  level?: LogLevel;
  /** Append entries to this file, creating its directory on first write */
  filePath?: string;
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
};

/**
 * One log line: `[timestamp] [LEVEL] [component] message {meta}`
 *
 * @example
 * ```typescript
 * formatLogEntry(LogLevel.WARN, 'Scanner', 'Slow scan', { ms: 900 }, new Date(0))
 * // => '[1970-01-01T00:00:00.000Z] [WARN] [Scanner] Slow scan {"ms":900}'
 * ```
 */
export function formatLogEntry(
  level: LogLevel,
  component: string,
  message: string,
  meta?: object,
  now: Date = new Date()
): string {
  const line = `[${now.toISOString()}] [${LEVEL_NAMES[level]}] [${component}] ${message}`;
  return meta && Object.keys(meta).length > 0 ? `${line} ${JSON.stringify(meta)}` : line;
}

class CohesionLogger implements Logger {
  private level: LogLevel;
  private silentConsole = false;
  private logFile: string | null;
  private directoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? getLogLevelFromEnv();
    this.logFile = options.filePath ? path.resolve(options.filePath) : null;
  }

  get filePath(): string | null {
    return this.logFile;
  }

  private write(level: LogLevel, component: string, message: string, meta?: object): void {
    if (level > this.level) return;

    const entry = formatLogEntry(level, component, message, meta);
    if (this.logFile) {
      this.appendToFile(this.logFile, entry);
    }
    if (!this.silentConsole) {
      // stderr for every level; stdout carries --json reports
      console.error(entry);
    }
  }

  private appendToFile(file: string, entry: string): void {
    try {
      if (!this.directoryReady) {
        fs.mkdirSync(path.dirname(file), { recursive: true });
        this.directoryReady = true;
      }
      fs.appendFileSync(file, entry + '\n');
    } catch (err) {
      // Stop using the file; later entries still reach stderr
      this.logFile = null;
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[Logger] Cannot write log file ${file}: ${reason}`);
    }
  }

  error(component: string, message: string, meta?: object): void {
    this.write(LogLevel.ERROR, component, message, meta);
  }

  warn(component: string, message: string, meta?: object): void {
    this.write(LogLevel.WARN, component, message, meta);
  }

  info(component: string, message: string, meta?: object): void {
    this.write(LogLevel.INFO, component, message, meta);
  }

  debug(component: string, message: string, meta?: object): void {
    this.write(LogLevel.DEBUG, component, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setSilentConsole(silent: boolean): void {
    this.silentConsole = silent;
  }
}

let loggerInstance: CohesionLogger | null = null;

/**
 * Parse a log level name, falling back to INFO
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Level from DEBUG / COHESION_DEBUG (1, true, debug) or LOG_LEVEL / COHESION_LOG_LEVEL
 */
export function getLogLevelFromEnv(): LogLevel {
  const debug = process.env.DEBUG || process.env.COHESION_DEBUG;
  if (debug === '1' || debug === 'true' || debug?.toLowerCase() === 'debug') {
    return LogLevel.DEBUG;
  }

  const logLevel = process.env.LOG_LEVEL || process.env.COHESION_LOG_LEVEL;
  return logLevel ? parseLogLevel(logLevel) : LogLevel.INFO;
}

/**
 * Replace the shared logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  loggerInstance = new CohesionLogger(options);
  return loggerInstance;
}

/**
 * The shared logger, created on first use with the environment's level
 */
export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new CohesionLogger();
  }
  return loggerInstance;
}

/**
 * Drop the shared logger (mainly for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}
