import winston from 'winston';
import { readLogSettings } from './env.js';

const { combine, timestamp, errors, json, colorize, printf } = winston.format;

const settings = readLogSettings();

const devFormat = printf(({ level, message, timestamp: ts, ...meta }) => {
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(ts)} ${level}: ${String(message)}${rest}`;
});

export const logger = winston.createLogger({
  level: settings.LOG_LEVEL,
  silent: settings.NODE_ENV === 'test',
  format: combine(timestamp(), errors({ stack: true })),
  transports: [
    new winston.transports.Console({
      format:
        settings.NODE_ENV === 'production'
          ? json()
          : combine(colorize(), devFormat),
    }),
  ],
});
