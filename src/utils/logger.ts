import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type LevelName = 'error' | 'warn' | 'info' | 'debug';

// Color definitions for different log levels
const levelColors: Record<LevelName, chalk.Chalk> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.blue,
  debug: chalk.cyan,
};

const levelBrightColors: Record<LevelName, chalk.Chalk> = {
  error: chalk.redBright,
  warn: chalk.yellowBright,
  info: chalk.blueBright,
  debug: chalk.cyanBright,
};

const levelIcons: Record<LevelName, string> = {
  error: '❌',
  warn: '⚠️ ',
  info: 'ℹ️ ',
  debug: '🔍',
};

function isLevelName(level: string): level is LevelName {
  return level in levelColors;
}

// Custom colorized format for console output
const colorizedFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const known = isLevelName(level) ? level : undefined;
  const color = known ? levelColors[known] : chalk.white;
  const brightColor = known ? levelBrightColors[known] : chalk.whiteBright;
  const icon = known ? levelIcons[known] : '📝';

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = color(`[${level.toUpperCase()}]`);

  const formattedMessage = typeof message === 'string' ? brightColor(message) : String(message);

  // Include stack trace for errors
  return typeof stack === 'string'
    ? `${timestampStr} ${icon} ${levelStr}\n${chalk.red(stack)}`
    : `${timestampStr} ${icon} ${levelStr} ${formattedMessage}`;
});

// Simple format for file output (no colors)
const fileFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const body = typeof stack === 'string' ? stack : String(message);
  return `${String(ts)} [${level.toUpperCase()}]: ${body}`;
});

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true })),
  defaultMeta: { service: 'fuzzy-dates' },
  transports: [
    new winston.transports.Console({
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        colorizedFormat
      ),
    }),
  ],
});

// Add file transports in production
if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        fileFormat
      ),
    })
  );
  logger.add(
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        fileFormat
      ),
    })
  );
}

function toMessage(args: unknown): string {
  return typeof args === 'string' ? args : JSON.stringify(args, null, 2);
}

export class Logging {
  public static info = (args: unknown): void => {
    logger.info(toMessage(args));
  };

  public static warn = (args: unknown): void => {
    logger.warn(toMessage(args));
  };

  public static error = (args: unknown): void => {
    logger.error(toMessage(args));
  };

  public static debug = (args: unknown): void => {
    logger.debug(toMessage(args));
  };
}

export default logger;
