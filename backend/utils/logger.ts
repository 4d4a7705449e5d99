import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { sanitizeLogObject, sanitizeLogMessage } from './logSanitizer';

// Rotated log files; DailyRotateFile creates the directory if it doesn't exist
const logsDir = process.env.LOGS_DIR || path.join(__dirname, '..', 'logs');

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Define colors for each level
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
};

// Tell winston that you want to link the colors
winston.addColors(colors);

// Custom format to sanitize sensitive data
const sanitizeFormat = winston.format((info) => {
  // Sanitize the message
  if (typeof info.message === 'string') {
    info.message = sanitizeLogMessage(info.message);
  }
  // Sanitize any additional metadata (IPs, fingerprints, secrets)
  const sanitized = sanitizeLogObject({ ...info });
  return typeof sanitized === 'object' && sanitized !== null ? Object.assign(info, sanitized) : info;
});

// Production: JSON lines, fewer files
const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

// Define which transports the logger must use
const transports: winston.transport[] = [
  // Console transport - JSON in production, colorized in development
  new winston.transports.Console({
    format: isProduction
      ? winston.format.combine(
          sanitizeFormat(),
          winston.format.timestamp(),
          winston.format.json()  // Structured logs for log aggregators
        )
      : winston.format.combine(
          sanitizeFormat(),
          winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
          winston.format.colorize({ all: true }),
          winston.format.printf(
            (info) => `${String(info.timestamp)} ${info.level}: ${String(info.message)}`
          )
        ),
  }),
];

// File transports only in development or when explicitly enabled
// In production, rely on container log aggregation; never under test
if (!isTest && (!isProduction || process.env.ENABLE_FILE_LOGS === 'true')) {
  transports.push(
    // File transport for errors
    new DailyRotateFile({
      filename: path.join(logsDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '10m',
      maxFiles: '7d',     // One week of history
      format: winston.format.combine(
        sanitizeFormat(),
        winston.format.timestamp(),
        winston.format.json()
      ),
    }),
    // File transport for all logs
    new DailyRotateFile({
      filename: path.join(logsDir, 'combined-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxSize: '10m',
      maxFiles: '7d',     // One week of history
      format: winston.format.combine(
        sanitizeFormat(),
        winston.format.timestamp(),
        winston.format.json()
      ),
    })
  );
}

// Create the logger; tests only see errors unless LOG_LEVEL says otherwise
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (isTest ? 'error' : 'info'),
  levels,
  transports,
  // Do not exit on handled exceptions
  exitOnError: false,
});

export type ContextLogger = ReturnType<typeof createContextLogger>;

/**
 * Create a logger instance with request context
 * Adds the request ID and client details to every entry of one request
 */
export function createContextLogger(context: Record<string, unknown>) {
  return {
    error: (message: string, meta?: Record<string, unknown>) => {
      logger.error(message, { ...context, ...meta });
    },
    warn: (message: string, meta?: Record<string, unknown>) => {
      logger.warn(message, { ...context, ...meta });
    },
    info: (message: string, meta?: Record<string, unknown>) => {
      logger.info(message, { ...context, ...meta });
    },
    http: (message: string, meta?: Record<string, unknown>) => {
      logger.http(message, { ...context, ...meta });
    },
    debug: (message: string, meta?: Record<string, unknown>) => {
      logger.debug(message, { ...context, ...meta });
    },
  };
}

export default logger;
