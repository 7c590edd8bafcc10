/**
 * Structured Logging
 * ==================
 * One winston instance backs every namespaced Logger. Console output is
 * colorized text in development and JSON in production. Daily-rotated log files
 * are written only when LOG_FILE=true, and never under NODE_ENV=test.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export interface LogContext {
  runId?: string;
  strategy?: string;
  symbol?: string;
  interval?: string;
  [key: string]: unknown;
}

interface LoggerSettings {
  level: string;
  production: boolean;
  console: boolean;
  /** Directory for rotated files, null when file output is off */
  fileDir: string | null;
  maxFiles: string;
  maxSize: string;
}

function readSettings(env: NodeJS.ProcessEnv): LoggerSettings {
  const production = env.NODE_ENV === 'production';
  const fileOutput = env.LOG_FILE === 'true' && env.NODE_ENV !== 'test';
  return {
    level: env.LOG_LEVEL || (production ? 'info' : 'debug'),
    production,
    console: env.LOG_CONSOLE !== 'false',
    fileDir: fileOutput ? env.LOG_DIR || path.join(process.cwd(), 'logs') : null,
    maxFiles: env.LOG_MAX_FILES || '14d',
    maxSize: env.LOG_MAX_SIZE || '20m',
  };
}

const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const textFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const details = Object.keys(meta).length ? `\n${JSON.stringify(meta, null, 2)}` : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${details}`;
  })
);

function rotatingFile(dir: string, name: string, settings: LoggerSettings, level?: string): DailyRotateFile {
  return new DailyRotateFile({
    filename: path.join(dir, `${name}-%DATE%.log`),
    datePattern: 'YYYY-MM-DD',
    level,
    format: jsonFormat,
    maxSize: settings.maxSize,
    maxFiles: settings.maxFiles,
    zippedArchive: true,
  });
}

function buildTransports(settings: LoggerSettings): winston.transport[] {
  const transports: winston.transport[] = [];
  if (settings.console) {
    transports.push(
      new winston.transports.Console({
        format: settings.production ? jsonFormat : textFormat,
        level: settings.level,
      })
    );
  }
  if (settings.fileDir !== null) {
    fs.mkdirSync(settings.fileDir, { recursive: true });
    transports.push(
      rotatingFile(settings.fileDir, 'error', settings, 'error'),
      rotatingFile(settings.fileDir, 'combined', settings)
    );
  }
  return transports;
}

const settings = readSettings(process.env);

const rootSink = winston.createLogger({
  level: settings.level,
  format: jsonFormat,
  defaultMeta: { service: 'tradelab' },
  transports: buildTransports(settings),
  exitOnError: false,
});

/**
 * Namespaced logger with immutable context. Every entry carries the namespace
 * and the context of the logger it was written through.
 */
export class Logger {
  constructor(
    private readonly namespace: string,
    private readonly context: LogContext = {},
    private readonly sink: winston.Logger = rootSink
  ) {}

  getNamespace(): string {
    return this.namespace;
  }

  /**
   * Logger writing to the same sink with extra context
   */
  child(context: LogContext): Logger {
    return new Logger(this.namespace, { ...this.context, ...context }, this.sink);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const meta = this.meta(context);
    if (error instanceof Error) {
      this.sink.error(message, { ...meta, error: { name: error.name, message: error.message, stack: error.stack } });
    } else if (error !== undefined) {
      this.sink.error(message, { ...meta, error });
    } else {
      this.sink.error(message, meta);
    }
  }

  warn(message: string, context?: LogContext): void {
    this.sink.warn(message, this.meta(context));
  }

  info(message: string, context?: LogContext): void {
    this.sink.info(message, this.meta(context));
  }

  debug(message: string, context?: LogContext): void {
    this.sink.debug(message, this.meta(context));
  }

  private meta(context?: LogContext): LogContext {
    return { namespace: this.namespace, ...this.context, ...context };
  }
}

export const logger = new Logger('tradelab');
