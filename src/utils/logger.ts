// logger.ts - level-based logging with pluggable formatters and transports

import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import boxen from 'boxen';
import { Writable } from 'stream';
import { formatDate } from './dateFormatter';

// --- Configuration ---

export const LOG_LEVELS = ['error', 'warn', 'info', 'success', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const standardLevels: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  success: 2,
  http: 3,
  verbose: 4,
  debug: 5,
  silly: 6,
};
export type LogMeta = Record<string, unknown>;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// --- Interfaces ---

export interface LogEntry {
  level: LogLevel;
  message: string | Error | object;
  meta?: LogMeta;
  timestamp: Date;
}

export interface Formatter {
  format(entry: LogEntry): string;
}

export interface Transport {
  log(formattedMessage: string, entry: LogEntry): void;
  level?: LogLevel;
  close?(): Promise<void>;
  formatter: Formatter;
}

// --- Formatters ---

export class JsonFormatter implements Formatter {
  format(entry: LogEntry): string {
    let messageValue: unknown = entry.message;
    let metaObj = entry.meta;
    if (entry.message instanceof Error) {
      messageValue = entry.message.message;
      metaObj = { ...entry.meta, name: entry.message.name, stack: entry.message.stack };
    }
    const logObject = {
      level: entry.level,
      message: messageValue,
      timestamp: formatDate(entry.timestamp),
    };
    let metaBlock = '';
    if (metaObj && Object.keys(metaObj).length > 0) {
      metaBlock = '\n\tMeta: \n' + safeStringify(metaObj);
    }
    try {
      return (
        JSON.stringify(logObject, (_key, value: unknown) =>
          typeof value === 'bigint' ? value.toString() : value,
        ) + metaBlock
      );
    } catch (error) {
      const fallback = {
        level: entry.level,
        message: `[Unserializable Object: ${
          error instanceof Error ? error.message : String(error)
        }]`,
        timestamp: formatDate(entry.timestamp),
      };
      return JSON.stringify(fallback) + metaBlock;
    }
  }
}

function safeStringify(value: unknown, space?: number): string {
  try {
    return JSON.stringify(
      value,
      (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v),
      space,
    );
  } catch {
    return '[Unserializable Meta]';
  }
}

export interface PrettyFormatterOptions {
  useColors: boolean;
  useBoxes: boolean;
  showTimestamp: boolean;
  stringLengthLimit: number;
}

interface LevelStyle {
  color: (s: string) => string;
  icon: string;
  colorName: string;
}

/**
 * PrettyFormatter renders entries as `<icon> LEVEL message`, optionally
 * colored with chalk and framed with boxen.
 *
 * @example
 * const formatter = new PrettyFormatter({ useColors: false });
 * formatter.format({ level: 'info', message: 'listening', timestamp: new Date() });
 * // => 'ℹ INFO listening'
 */
export class PrettyFormatter implements Formatter {
  private readonly options: PrettyFormatterOptions;

  private static LEVEL_STYLES: Record<LogLevel, LevelStyle> = {
    error: { color: chalk.red, icon: '✖', colorName: 'red' },
    warn: { color: chalk.yellow, icon: '⚠', colorName: 'yellow' },
    info: { color: chalk.blueBright, icon: 'ℹ', colorName: 'blueBright' },
    success: { color: chalk.green, icon: '✔', colorName: 'green' },
    http: { color: chalk.magenta, icon: '↔', colorName: 'magenta' },
    verbose: { color: chalk.gray, icon: 'V', colorName: 'gray' },
    debug: { color: chalk.cyan, icon: 'D', colorName: 'cyan' },
    silly: { color: chalk.white, icon: 'S', colorName: 'white' },
  };

  constructor(options: Partial<PrettyFormatterOptions> = {}) {
    this.options = {
      useColors: options.useColors ?? true,
      useBoxes: options.useBoxes ?? false,
      showTimestamp: options.showTimestamp ?? false,
      stringLengthLimit: options.stringLengthLimit ?? 300,
    };
  }

  private formatMessage(message: LogEntry['message']): string {
    if (typeof message === 'string') {
      return message.length > this.options.stringLengthLimit
        ? message.slice(0, this.options.stringLengthLimit) + '...'
        : message;
    }
    if (message instanceof Error) {
      const stack = message.stack ? `\n${message.stack.split('\n').slice(1).join('\n')}` : '';
      return `${message.name}: ${message.message}${stack}`;
    }
    return safeStringify(message);
  }

  format(entry: LogEntry): string {
    const { level, message, meta, timestamp } = entry;
    const style = PrettyFormatter.LEVEL_STYLES[level];
    let metaBlock = '';
    if (meta && Object.keys(meta).length > 0) {
      metaBlock = '\n\tMeta: \n' + safeStringify(meta, 4);
    }
    const timestampStr = this.options.showTimestamp ? `[${formatDate(timestamp)}] ` : '';
    const levelStr = `${style.icon} ${level.toUpperCase()} `;
    const finalMessage = `${timestampStr}${levelStr}${this.formatMessage(message)}${metaBlock}`;

    if (this.options.useBoxes && this.options.useColors) {
      return boxen(finalMessage, {
        padding: 1,
        margin: { top: 0, bottom: 1, left: 0, right: 0 },
        borderColor: style.colorName,
      });
    }
    return this.options.useColors ? style.color(finalMessage) : finalMessage;
  }
}

// --- Transports ---

export class ConsoleTransport implements Transport {
  public formatter: Formatter;
  public level?: LogLevel;

  constructor(options: { formatter?: Formatter; level?: LogLevel } = {}) {
    this.formatter = options.formatter ?? new PrettyFormatter({ useColors: true, useBoxes: false });
    this.level = options.level;
  }

  log(formattedMessage: string, entry: LogEntry): void {
    if (entry.level === 'error') {
      console.error(formattedMessage);
    } else if (entry.level === 'warn') {
      console.warn(formattedMessage);
    } else {
      console.log(formattedMessage);
    }
  }
}

export class FileTransport implements Transport {
  public formatter: Formatter;
  public level?: LogLevel;
  private stream?: Writable;
  private filename: string;

  constructor(options: { filename: string; formatter?: Formatter; level?: LogLevel }) {
    this.filename = options.filename;
    // Default to JSON for files unless overridden
    this.formatter = options.formatter ?? new JsonFormatter();
    this.level = options.level;

    try {
      fs.mkdirSync(path.dirname(this.filename), { recursive: true });
      this.stream = fs.createWriteStream(this.filename, { flags: 'a' });
      this.stream.on('error', (err) => {
        console.error(`Error writing to log file ${this.filename}:`, err);
      });
    } catch (err) {
      console.error(`Failed to create log stream for ${this.filename}:`, err);
    }
  }

  log(formattedMessage: string): void {
    // No stream when the log directory could not be created
    if (!this.stream) return;

    this.stream.write(formattedMessage + '\n', (err) => {
      if (err) {
        console.error(`Failed to write to log stream ${this.filename}:`, err);
      }
    });
  }

  close(): Promise<void> {
    const stream = this.stream;
    if (!stream) return Promise.resolve();
    return new Promise<void>((resolve) => {
      stream.end(() => resolve());
    });
  }
}

// --- Logger Core ---

export interface LoggerOptions {
  level?: LogLevel;
  transports?: Transport[];
  metadata?: LogMeta;
}

/**
 * Logger provides structured, level-based logging with support for multiple
 * transports and scoped child loggers.
 *
 * @remarks
 * Levels by severity: error, warn, info (and its alias success), http,
 * verbose, debug, silly. An entry is written when its level is at or above
 * both the logger's threshold and the transport's own `level`, if it has one.
 * Children share their parent's transports and threshold.
 *
 * @example
 * ```ts
 * const log = new Logger({ level: 'debug' });
 * log.info('Server started', { port: 7777 });
 * const connLog = log.child({ remoteAddress: '10.0.0.2' });
 * connLog.warn('Header timeout');
 * ```
 */
export class Logger {
  private state: { level: LogLevel };
  private readonly transports: Transport[];
  private readonly metadata: LogMeta;

  constructor(options: LoggerOptions = {}) {
    this.state = { level: options.level ?? 'info' };
    this.transports = options.transports ?? [
      new ConsoleTransport({ formatter: new PrettyFormatter({ useColors: true }) }),
    ];
    this.metadata = options.metadata ?? {};
  }

  error(message: LogEntry['message'], meta?: LogMeta): void {
    this.log('error', message, meta);
  }
  warn(message: LogEntry['message'], meta?: LogMeta): void {
    this.log('warn', message, meta);
  }
  info(message: LogEntry['message'], meta?: LogMeta): void {
    this.log('info', message, meta);
  }
  success(message: LogEntry['message'], meta?: LogMeta): void {
    this.log('success', message, meta);
  }
  http(message: LogEntry['message'], meta?: LogMeta): void {
    this.log('http', message, meta);
  }
  verbose(message: LogEntry['message'], meta?: LogMeta): void {
    this.log('verbose', message, meta);
  }
  debug(message: LogEntry['message'], meta?: LogMeta): void {
    this.log('debug', message, meta);
  }
  silly(message: LogEntry['message'], meta?: LogMeta): void {
    this.log('silly', message, meta);
  }

  get level(): LogLevel {
    return this.state.level;
  }

  /** Changes the threshold for this logger and every child created from it. */
  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  addTransport(transport: Transport): void {
    this.transports.push(transport);
  }

  /**
   * Emits a log entry at the given level, subject to logger and transport
   * thresholds. Shorthand methods (`logger.info()` etc.) delegate here.
   */
  log(level: LogLevel, message: LogEntry['message'], meta?: LogMeta): void {
    const levelValue = standardLevels[level];
    if (levelValue > standardLevels[this.state.level]) return;

    const entry: LogEntry = {
      level,
      message,
      meta: { ...this.metadata, ...meta },
      timestamp: new Date(),
    };

    for (const transport of this.transports) {
      if (transport.level && levelValue > standardLevels[transport.level]) continue;
      try {
        transport.log(transport.formatter.format(entry), entry);
      } catch (err) {
        console.error(`Error in transport ${transport.constructor.name}:`, err);
      }
    }
  }

  /**
   * Creates a child logger that shares transports and threshold and merges
   * additional metadata into every entry.
   */
  child(metadata: LogMeta): Logger {
    const child = new Logger({
      transports: this.transports,
      metadata: { ...this.metadata, ...metadata },
    });
    child.state = this.state;
    return child;
  }

  /**
   * Flushes and closes all transports.
   */
  async close(): Promise<void> {
    await Promise.all(this.transports.map((transport) => transport.close?.()));
  }
}

// --- Default Export ---

const envLevel = process.env.LOG_LEVEL ?? 'info';

const defaultLogger = new Logger({
  level: isLogLevel(envLevel) ? envLevel : 'info',
  transports: [
    new ConsoleTransport({
      formatter: new PrettyFormatter({
        useColors: true,
        useBoxes: false,
        showTimestamp: true,
      }),
    }),
  ],
});

export default defaultLogger;
