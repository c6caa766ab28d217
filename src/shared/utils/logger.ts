import winston from 'winston';
import chalk from 'chalk';
import { config } from '../config.js';

const { combine, timestamp, printf, colorize } = winston.format;

// Console line: [time] level [component][task] message {meta}
const consoleFormat = printf(({ level, message, timestamp, component, task, ...meta }) => {
  const ts = chalk.gray(`[${String(timestamp)}]`);
  const comp = component ? chalk.cyan(`[${String(component)}]`) : '';
  const label = task ? chalk.magenta(`[${String(task)}]`) : '';
  const metaStr = Object.keys(meta).length ? chalk.gray(` ${JSON.stringify(meta)}`) : '';

  return `${ts} ${level} ${comp}${label} ${String(message)}${metaStr}`;
});

// Vitest sets NODE_ENV=test; keep test runs from writing log files
const fileTransports = config.nodeEnv === 'test' ? [] : [
  new winston.transports.File({
    filename: 'logs/error.log',
    level: 'error',
    format: combine(timestamp(), winston.format.json())
  }),
  new winston.transports.File({
    filename: 'logs/combined.log',
    format: combine(timestamp(), winston.format.json())
  })
];

export const logger = winston.createLogger({
  level: config.logLevel,
  format: combine(
    timestamp({ format: 'HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true })
  ),
  transports: [
    new winston.transports.Console({
      format: combine(
        colorize({ all: true }),
        consoleFormat
      )
    }),
    ...fileTransports
  ]
});

// Helper to create component-specific loggers
export function createLogger(component: string) {
  return {
    debug: (message: string, meta?: Record<string, unknown>) =>
      logger.debug(message, { component, ...meta }),
    info: (message: string, meta?: Record<string, unknown>) =>
      logger.info(message, { component, ...meta }),
    warn: (message: string, meta?: Record<string, unknown>) =>
      logger.warn(message, { component, ...meta }),
    error: (message: string, meta?: Record<string, unknown>) =>
      logger.error(message, { component, ...meta }),
    task: (label: string, message: string, meta?: Record<string, unknown>) =>
      logger.info(message, { component, task: label, ...meta })
  };
}

export type ComponentLogger = ReturnType<typeof createLogger>;

export default logger;
