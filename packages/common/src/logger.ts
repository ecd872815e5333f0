/**
 * @license
 * Copyright 2025 BrowserOS
 */
import fs from 'node:fs';

export type LogLevel = 'off' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = [
  'off',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
];

type EmitLevel = Exclude<LogLevel, 'off'>;

const SEVERITY: Record<LogLevel, number> = {
  off: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

const COLORS: Record<EmitLevel, string> = {
  error: '\x1b[31m',
  warn: '\x1b[33m',
  info: '\x1b[32m',
  debug: '\x1b[36m',
  trace: '\x1b[90m',
};

const RESET = '\x1b[0m';

export interface LoggerOptions {
  level?: LogLevel;
  /** Append plain lines to this file instead of writing to the console. */
  filePath?: string;
  /** Merged into the meta of every line. */
  bindings?: Record<string, unknown>;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  private level: LogLevel;
  private logFilePath?: string;
  private bindings?: Record<string, unknown>;
  private fileErrorReported = false;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.logFilePath = options.filePath;
    this.bindings = options.bindings;
  }

  /**
   * Derive a logger that shares nothing mutable with this one.
   */
  child(options: LoggerOptions): Logger {
    return new Logger({
      level: options.level ?? this.level,
      filePath: options.filePath ?? this.logFilePath,
      bindings: {...this.bindings, ...options.bindings},
    });
  }

  setLogFile(filePath: string | undefined) {
    this.logFilePath = filePath;
    this.fileErrorReported = false;
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: EmitLevel): boolean {
    return SEVERITY[level] <= SEVERITY[this.level];
  }

  private metaString(meta?: object): string {
    const merged = this.bindings ? {...this.bindings, ...meta} : meta;
    if (!merged || Object.keys(merged).length === 0) return '';
    try {
      return ` ${JSON.stringify(merged)}`;
    } catch {
      return ' [unserializable meta]';
    }
  }

  private format(level: EmitLevel, message: string, meta?: object): string {
    const timestamp = new Date().toISOString();
    const color = COLORS[level];
    return `${color}[${timestamp}] [${level.toUpperCase()}]${RESET} ${message}${this.metaString(meta)}`;
  }

  private formatPlain(level: EmitLevel, message: string, meta?: object): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${this.metaString(meta)}`;
  }

  private log(level: EmitLevel, message: string, meta?: object) {
    if (!this.isEnabled(level)) return;

    if (this.logFilePath) {
      const plainFormatted = this.formatPlain(level, message, meta);
      try {
        // One append per line keeps concurrent writers from interleaving.
        fs.appendFileSync(this.logFilePath, plainFormatted + '\n');
      } catch (error) {
        if (!this.fileErrorReported) {
          this.fileErrorReported = true;
          console.error(`Failed to write to log file: ${error}`);
        }
      }
      return;
    }

    const formatted = this.format(level, message, meta);
    switch (level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      default:
        console.log(formatted);
    }
  }

  error(message: string, meta?: object) {
    this.log('error', message, meta);
  }

  warn(message: string, meta?: object) {
    this.log('warn', message, meta);
  }

  info(message: string, meta?: object) {
    this.log('info', message, meta);
  }

  debug(message: string, meta?: object) {
    this.log('debug', message, meta);
  }

  trace(message: string, meta?: object) {
    this.log('trace', message, meta);
  }
}

function levelFromEnv(): LogLevel {
  const value = process.env.DYNAMIC_EXTRACT_LOG_LEVEL?.toLowerCase();
  return isLogLevel(value) ? value : 'off';
}

export const logger = new Logger({level: levelFromEnv()});
