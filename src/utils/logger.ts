import winston from 'winston';
import path from 'path';

const logDir = process.env.LOG_DIR || 'logs';
const timestamp = winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' });

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  timestamp,
  winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `[${timestamp}] [${service}] ${level}: ${message} ${metaStr}`;
  })
);

// Тесты не пишут в logs/
const silent = process.env.NODE_ENV === 'test';

const fileTransports = silent
  ? []
  : [
      new winston.transports.File({ filename: path.join(logDir, 'error.log'), level: 'error' }),
      new winston.transports.File({ filename: path.join(logDir, 'combined.log') })
    ];

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent,
  format: winston.format.combine(timestamp, winston.format.errors({ stack: true }), winston.format.json()),
  defaultMeta: { service: 'wg-subscription-bot' },
  transports: [...fileTransports, new winston.transports.Console({ format: consoleFormat })]
});

export default logger;
