/**
 * Logger
 *
 * Structured console and file logging shared by every module.
 */

import fs from 'fs';
import path from 'path';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  module: string;
  operation?: string;
  timestamp: Date;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  /** Minimum level written */
  minLevel: LogLevel;
  consoleOutput: boolean;
  fileOutput: boolean;
  /** Append-only log file, used when fileOutput is set */
  filePath?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export class Logger {
  private options: LoggerOptions;
  private readonly moduleName: string;
  private readonly parent: Logger | null;

  constructor(moduleName: string = 'weather-alert', options: Partial<LoggerOptions> = {}, parent: Logger | null = null) {
    this.moduleName = moduleName;
    this.parent = parent;
    this.options = {
      minLevel: LogLevel.INFO,
      consoleOutput: true,
      fileOutput: false,
      ...options
    };
  }

  debug(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.DEBUG, message, data, operation);
  }

  info(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.INFO, message, data, operation);
  }

  warn(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.WARN, message, data, operation);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.ERROR, message, data, operation, error);
  }

  fatal(message: string, error?: Error, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.FATAL, message, data, operation, error);
  }

  /**
   * Sub-loggers read their options from the root, so reconfiguring the root
   * after they are created still applies to them.
   */
  getOptions(): LoggerOptions {
    return this.parent ? this.parent.getOptions() : { ...this.options };
  }

  setOptions(options: Partial<LoggerOptions>): void {
    if (this.parent) {
      this.parent.setOptions(options);
      return;
    }
    this.options = { ...this.options, ...options };
  }

  getModuleName(): string {
    return this.moduleName;
  }

  createSubLogger(moduleName: string): Logger {
    return new Logger(`${this.moduleName}.${moduleName}`, {}, this.parent ?? this);
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    operation?: string,
    error?: Error
  ): void {
    const options = this.getOptions();
    if (LEVEL_ORDER[level] < LEVEL_ORDER[options.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      module: this.moduleName,
      operation,
      timestamp: new Date(),
      data,
      error
    };

    const line = formatLogEntry(entry);

    if (options.consoleOutput) {
      this.writeToConsole(entry.level, line);
    }

    if (options.fileOutput && options.filePath) {
      this.writeToFile(options.filePath, line);
    }
  }

  private writeToConsole(level: LogLevel, line: string): void {
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(line);
        break;
      case LogLevel.INFO:
        console.info(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        console.error(line);
        break;
    }
  }

  private writeToFile(filePath: string, line: string): void {
    try {
      fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
      fs.appendFileSync(filePath, `${line}\n`, 'utf8');
    } catch (error) {
      // The file sink is lost; keep logging to the console.
      this.setOptions({ fileOutput: false });
      console.error(`Failed to write log file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

export function formatLogEntry(entry: LogEntry): string {
  const timestamp = entry.timestamp.toISOString();
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const operationStr = entry.operation ? ` [${entry.operation}]` : '';

  let line = `${timestamp} ${levelStr} [${entry.module}]${operationStr} ${entry.message}`;

  if (entry.error) {
    line += `\nError: ${entry.error.message}`;
    if (entry.error.stack) {
      line += `\nStack: ${entry.error.stack}`;
    }
  }

  if (entry.data && Object.keys(entry.data).length > 0) {
    line += `\nData: ${JSON.stringify(entry.data, null, 2)}`;
  }

  return line;
}

/**
 * Root logger
 */
export const defaultLogger = new Logger();

export function createLogger(moduleName: string): Logger {
  return defaultLogger.createSubLogger(moduleName);
}

/**
 * Apply process-wide logging settings (level, log file).
 */
export function configureLogging(options: Partial<LoggerOptions>): void {
  defaultLogger.setOptions(options);
}
