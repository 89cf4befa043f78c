import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

/**
 * Log level
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  HIGHLIGHT = 'HIGHLIGHT',
}

/**
 * Logger configuration
 */
export type LoggerConfig = {
  level: LogLevel;
  useColors: boolean;
  /** Append records to this file as well (plain text, no colors) */
  filePath?: string;
  /** Minimum level written to the file */
  fileLevel: LogLevel;
};

/**
 * Per-record options
 */
export type LogOptions = {
  /** Write to the log file only */
  fileOnly?: boolean;
};

/**
 * ANSI color codes
 */
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
};

const LEVEL_ORDER = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.SUCCESS,
  LogLevel.WARNING,
  LogLevel.ERROR,
  LogLevel.HIGHLIGHT,
];

const pad = (value: number, width = 2): string => value.toString().padStart(width, '0');

/**
 * Logger with colored console output and an optional append-only log file
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      useColors: config.useColors ?? true,
      filePath: config.filePath,
      fileLevel: config.fileLevel ?? LogLevel.INFO,
    };

    if (this.config.filePath) {
      mkdirSync(dirname(this.config.filePath), { recursive: true });
    }
  }

  /**
   * Get emoji for log level
   */
  private getEmoji(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '🔍';
      case LogLevel.INFO:
        return 'ℹ️';
      case LogLevel.SUCCESS:
        return '✅';
      case LogLevel.WARNING:
        return '⚠️';
      case LogLevel.ERROR:
        return '❌';
      case LogLevel.HIGHLIGHT:
        return '🌟';
      default:
        return '•';
    }
  }

  /**
   * Format date for the console (MM-DD HH:mm:ss)
   */
  private formatDate(date: Date): string {
    return `${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(
      date.getSeconds(),
    )}`;
  }

  /**
   * Format date for the log file (YYYY-MM-DD HH:mm:ss,SSS)
   */
  private formatFileDate(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(
      date.getMinutes(),
    )}:${pad(date.getSeconds())},${pad(date.getMilliseconds(), 3)}`;
  }

  private format(level: LogLevel, message: string): string {
    return `${this.formatDate(new Date())} ${this.getEmoji(level)} ${message}`;
  }

  private colorize(text: string, color: string): string {
    if (!this.config.useColors) return text;
    return `${color}${text}${colors.reset}`;
  }

  private writeFile(level: LogLevel, message: string): void {
    const { filePath, fileLevel } = this.config;
    if (!filePath || LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(fileLevel)) {
      return;
    }

    // One record per line; multi-line messages are folded
    const line = `${this.formatFileDate(new Date())} - ${level} - ${message.replace(/\r?\n/g, ' | ')}\n`;
    appendFileSync(filePath, line, 'utf-8');
  }

  private write(level: LogLevel, message: string, color: string, options: LogOptions): void {
    this.writeFile(level, message);

    if (options.fileOnly || !this.shouldLog(level)) {
      return;
    }

    const output = this.format(level, this.colorize(message, color));
    if (level === LogLevel.ERROR) {
      console.error(output);
    } else {
      console.log(output);
    }
  }

  debug(message: string, options: LogOptions = {}): void {
    this.write(LogLevel.DEBUG, message, colors.dim, options);
  }

  info(message: string, options: LogOptions = {}): void {
    this.write(LogLevel.INFO, message, colors.blue, options);
  }

  success(message: string, options: LogOptions = {}): void {
    this.write(LogLevel.SUCCESS, message, colors.green, options);
  }

  warning(message: string, options: LogOptions = {}): void {
    this.write(LogLevel.WARNING, message, colors.yellow, options);
  }

  error(message: string, options: LogOptions = {}): void {
    this.write(LogLevel.ERROR, message, colors.red, options);
  }

  highlight(message: string, options: LogOptions = {}): void {
    this.write(LogLevel.HIGHLIGHT, message, colors.bright + colors.magenta, options);
  }

  /**
   * Check if message should reach the console based on level
   */
  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }
}
