import path from 'path';
import winston from 'winston';
import { config } from '../config';

const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

winston.addColors({
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
});

const baseFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true })
);

const consoleFormat = winston.format.combine(
  baseFormat,
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${extra}`;
  })
);

const transports: winston.transport[] = [new winston.transports.Console({ format: consoleFormat })];

// Jest runs with NODE_ENV=test; keep the log directory out of test runs.
if (config.server.env !== 'test') {
  transports.push(
    new winston.transports.File({
      filename: path.join(config.logging.dir, 'error.log'),
      level: 'error',
      format: winston.format.combine(baseFormat, winston.format.json()),
    }),
    new winston.transports.File({
      filename: path.join(config.logging.dir, 'combined.log'),
      format: winston.format.combine(baseFormat, winston.format.json()),
    })
  );
}

export const logger = winston.createLogger({
  level: config.logging.level,
  levels,
  transports,
});

export default logger;
