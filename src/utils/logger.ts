import winston from 'winston';
import * as path from 'path';
import fs from 'fs-extra';

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'error' : 'info';
}

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
  level: defaultLevel(),
  format: logFormat,
  defaultMeta: { service: 'sqlweave' },
  transports: [],
});

// File logging is opt-in through LOG_DIR
const logsDir = process.env.LOG_DIR;
if (logsDir) {
  fs.ensureDirSync(logsDir);
  logger.add(new winston.transports.File({
    filename: path.join(logsDir, 'error.log'),
    level: 'error',
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5
  }));
  logger.add(new winston.transports.File({
    filename: path.join(logsDir, 'combined.log'),
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5
  }));
  logger.add(new winston.transports.File({
    filename: path.join(logsDir, 'queries.log'),
    level: 'debug',
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 3
  }));
}

// Console logging outside production; stderr keeps stdout clean for CLI output
if (process.env.NODE_ENV !== 'production') {
  logger.add(new winston.transports.Console({
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaString = Object.keys(meta).length ? JSON.stringify(meta) : '';
        return `${timestamp} ${level}: ${message} ${metaString}`.trimEnd();
      })
    )
  }));
} else if (!logsDir) {
  // Production without LOG_DIR still reports warnings and errors
  logger.add(new winston.transports.Console({
    level: 'warn',
    stderrLevels: ['error', 'warn'],
  }));
}

export const databaseLogger = logger.child({ component: 'database' });
export const queryLogger = logger.child({ component: 'query' });
export const cliLogger = logger.child({ component: 'cli' });

export function setLogLevel(level: string): void {
  logger.level = level;
}
