import winston from 'winston';
import * as path from 'path';
import fs from 'fs-extra';
import type { LoggingConfig } from '../config/index.js';

// Custom log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    return JSON.stringify({
      timestamp,
      level,
      message,
      ...meta
    });
  })
);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'insurance-nl2sql' },
  transports: [],
});

if (process.env.NODE_ENV === 'production') {
  logger.add(new winston.transports.Console());
} else {
  logger.add(new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaString = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
        return `${timestamp} ${level}: ${message} ${metaString}`;
      })
    )
  }));
}

// Specific loggers for different components
export const queryLogger = logger.child({ component: 'query' });
export const llmLogger = logger.child({ component: 'llm' });
export const databaseLogger = logger.child({ component: 'database' });
export const apiLogger = logger.child({ component: 'api' });

let fileTransportsDir: string | null = null;

/**
 * Applies the configured level and, when a directory is given, adds the
 * rotating file transports. File transports are added at most once.
 */
export function configureLogging(options: LoggingConfig): void {
  logger.level = options.level;

  if (!options.dir || fileTransportsDir) return;
  fs.ensureDirSync(options.dir);
  fileTransportsDir = options.dir;

  // Errors only
  logger.add(new winston.transports.File({
    filename: path.join(options.dir, 'error.log'),
    level: 'error',
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5
  }));

  logger.add(new winston.transports.File({
    filename: path.join(options.dir, 'combined.log'),
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5
  }));

  // Question/SQL pairs, one JSON object per line
  logger.add(new winston.transports.File({
    filename: path.join(options.dir, 'queries.log'),
    level: 'info',
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 3,
    format: winston.format.combine(
      winston.format((info) => (info.component === 'query' ? info : false))(),
      logFormat
    )
  }));
}
