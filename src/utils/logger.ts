import winston from 'winston';
import * as fs from 'fs';
import * as dotenv from 'dotenv';

dotenv.config();

const logLevel = process.env.LOG_LEVEL || 'info';
const isTest = process.env.NODE_ENV === 'test';

// Create logs directory if it doesn't exist
if (!isTest && !fs.existsSync('logs')) {
  fs.mkdirSync('logs');
}

export const logger = winston.createLogger({
  level: logLevel,
  silent: isTest,
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss',
    }),
    winston.format.errors({ stack: true }),
    winston.format.json(),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
      return `${timestamp} [${level.toUpperCase()}]: ${message} ${
        Object.keys(meta).length > 0 ? JSON.stringify(meta, null, 2) : ''
      }`;
    })
  ),
  defaultMeta: { service: 'whale-position-bot' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      ),
    }),
    ...(isTest
      ? []
      : [
          new winston.transports.File({
            filename: 'logs/error.log',
            level: 'error',
          }),
          new winston.transports.File({
            filename: 'logs/combined.log',
          }),
        ]),
  ],
});

export interface ReportLogData {
  chatId: string;
  activeWhales: number;
  totalWhales: number;
  positions: number;
  payloads: number;
  durationMs: number;
}

export const logReport = (data: ReportLogData): void => {
  logger.info('Report delivered', data);
};

export const logError = (error: unknown, context?: Record<string, unknown>): void => {
  if (error instanceof Error) {
    logger.error('Error occurred', {
      message: error.message,
      stack: error.stack,
      context,
    });
    return;
  }

  logger.error('Error occurred', { message: String(error), context });
};
