// ============================================================================
// chatdeck - Logger Utility
// ============================================================================

import winston from 'winston';
import type { Logger as LoggerContract } from '../types/chat-types.js';

export interface LoggerOptions {
  level?: string;

  /** Extra file transport, written in JSON lines */
  file?: string;
}

/**
 * winston-backed logger. The finder owns stdout, so console output always
 * goes to stderr.
 */
export class Logger implements LoggerContract {
  private logger: winston.Logger;

  constructor(options: LoggerOptions = {}) {
    const isSilent = process.env.LOG_SILENT === 'true';

    this.logger = winston.createLogger({
      level: options.level ?? 'warn',
      format: winston.format.combine(
        winston.format.timestamp({
          format: 'YYYY-MM-DD HH:mm:ss'
        }),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: { service: 'chatdeck' },
      transports: [
        new winston.transports.Console({
          silent: isSilent,
          stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.printf(({ timestamp, level, message, service, ...metadata }) => {
              let msg = `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}`;
              if (Object.keys(metadata).length > 0) {
                msg += ` ${JSON.stringify(metadata)}`;
              }
              return msg;
            })
          )
        })
      ]
    });

    if (options.file) {
      this.logger.add(new winston.transports.File({ filename: options.file, silent: isSilent }));
    }
  }

  private shouldLog(): boolean {
    return process.env.LOG_SILENT !== 'true';
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog()) {
      this.logger.info(message, metadata);
    }
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog()) {
      this.logger.warn(message, metadata);
    }
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog()) {
      this.logger.error(message, metadata);
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog()) {
      this.logger.debug(message, metadata);
    }
  }

  get level(): string {
    return this.logger.level;
  }
}
