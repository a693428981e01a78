import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { sanitizeLogArgs } from './sanitize.js';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

function formatArg(arg: unknown): string {
  if (arg instanceof Date) return arg.toISOString();
  if (typeof arg !== 'object' || arg === null) return String(arg);

  try {
    return JSON.stringify(arg, null, 2);
  } catch {
    return String(arg);
  }
}

class Logger {
  private debugMode = false;
  private logDirectory: string | null = null;
  private logFilePath: string | null = null;
  private writeStream: fs.WriteStream | null = null;

  /**
   * Debug mode controls console output of debug records, not file logging
   */
  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
  }

  isDebugMode(): boolean {
    return this.debugMode;
  }

  /**
   * Enable file logging into `<directory>/submission-YYYY-MM-DD.log`.
   * Passing null turns file logging off.
   */
  setLogDirectory(directory: string | null): void {
    if (directory === this.logDirectory) return;

    this.closeStream()?.end();
    this.logDirectory = directory;
    this.logFilePath = null;
  }

  /**
   * Get the current log file path
   * @returns Log file path or null if file logging is off
   */
  getLogFilePath(): string | null {
    this.openStream();
    return this.logFilePath;
  }

  private openStream(): void {
    if (this.writeStream || !this.logDirectory) return;

    try {
      fs.mkdirSync(this.logDirectory, { recursive: true });

      const today = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
      this.logFilePath = path.join(this.logDirectory, `submission-${today}.log`);

      // open() errors (EISDIR, EACCES) arrive as an event, not a throw
      const stream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
      stream.on('error', (error) => {
        if (this.writeStream === stream) {
          this.disableFileLogging(error);
        }
      });
      this.writeStream = stream;
    } catch (error) {
      this.disableFileLogging(error);
    }
  }

  private disableFileLogging(error: unknown): void {
    console.warn(chalk.yellow(`⚠ File logging disabled: ${error instanceof Error ? error.message : String(error)}`));
    this.logDirectory = null;
    this.logFilePath = null;
    this.writeStream = null;
  }

  /**
   * Format: [ISO timestamp] [LEVEL] message args
   * Args are sanitized before writing
   */
  private writeToLogFile(level: LogLevel, message: string, ...args: unknown[]): void {
    this.openStream();
    if (!this.writeStream) return;

    const timestamp = new Date().toISOString();
    const sanitizedArgs = sanitizeLogArgs(...args);
    const argsStr = sanitizedArgs.length > 0 ? ' ' + sanitizedArgs.map(formatArg).join(' ') : '';

    this.writeStream.write(`[${timestamp}] [${level.toUpperCase()}] ${message}${argsStr}\n`);
  }

  private closeStream(): fs.WriteStream | null {
    const stream = this.writeStream;
    this.writeStream = null;
    return stream;
  }

  /**
   * Flush and close the log file
   */
  async close(): Promise<void> {
    const stream = this.closeStream();
    if (!stream) return;

    await new Promise<void>((resolve, reject) => {
      stream.once('error', reject);
      stream.end(() => resolve());
    });
  }

  debug(message: string, ...args: unknown[]): void {
    this.writeToLogFile(LogLevel.DEBUG, message, ...args);

    if (this.debugMode) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...sanitizeLogArgs(...args));
    }
  }

  info(message: string, ...args: unknown[]): void {
    this.writeToLogFile(LogLevel.INFO, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.writeToLogFile(LogLevel.WARN, message, ...args);
    console.warn(chalk.yellow(`⚠ ${message}`), ...sanitizeLogArgs(...args));
  }

  error(message: string, error?: Error | unknown): void {
    let errorDetails = '';
    if (error) {
      if (error instanceof Error) {
        errorDetails = error.message;
        if (error.stack) {
          errorDetails += `\n${error.stack}`;
        }
      } else {
        errorDetails = String(error);
      }
    }

    this.writeToLogFile(LogLevel.ERROR, message, ...(errorDetails ? [errorDetails] : []));

    console.error(chalk.red(`✗ ${message}`));
    if (error) {
      console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    }
  }
}

export type { Logger };

export const logger = new Logger();
