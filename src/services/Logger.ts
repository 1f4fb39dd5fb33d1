import { ILogger } from '../interfaces/services';
import { describeError } from '../types/errors';
import path from 'path';
import winston from 'winston';

export interface LoggerOptions {
  level?: string;
  logDir?: string;
}

// Console lines stay short for people watching a run; the files keep full JSON
const consoleFormat = winston.format.printf(({ level, message, label, timestamp, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} ${level} [${label}] ${message}${extra}`;
});

// Logger implementation following Single Responsibility Principle
export class Logger implements ILogger {
  private logger: winston.Logger;

  constructor(serviceName: string = 'redaction-runner', options: LoggerOptions = {}) {
    const logDir = options.logDir ?? process.env.LOG_DIR ?? 'logs';

    this.logger = winston.createLogger({
      level: options.level ?? process.env.LOG_LEVEL ?? 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.label({ label: serviceName }),
        winston.format.json()
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            consoleFormat
          )
        }),
        new winston.transports.File({
          filename: path.join(logDir, `${serviceName}.log`),
          level: 'info'
        }),
        new winston.transports.File({
          filename: path.join(logDir, `${serviceName}-error.log`),
          level: 'error'
        })
      ]
    });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  // Accepts whatever was caught; Errors keep their stack
  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.logger.error(message, { error: error.message, name: error.name, stack: error.stack });
      return;
    }
    this.logger.error(message, error === undefined ? undefined : { error: describeError(error) });
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  // Factory method for creating service-specific loggers
  static create(serviceName: string, options?: LoggerOptions): Logger {
    return new Logger(serviceName, options);
  }
}
