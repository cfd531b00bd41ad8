import winston from 'winston';
import { env } from '../../config/env';

const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
};

winston.addColors(colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.colorize({ all: true }),
  winston.format.printf((info) => {
    const { timestamp, level: lvl, message, component, ...meta } = info;
    const scope = typeof component === 'string' ? ` [${component}]` : '';
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${lvl}${scope}: ${String(message)}${extra}`;
  })
);

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.uncolorize(),
  winston.format.json()
);

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  levels,
  format: env.NODE_ENV === 'production' ? jsonFormat : consoleFormat,
  transports: [new winston.transports.Console()],
  silent: env.NODE_ENV === 'test',
});

export type Logger = winston.Logger;

export function createLogger(component: string): Logger {
  return logger.child({ component });
}
