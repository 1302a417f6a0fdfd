import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

/**
 * Single-string log callback used by components that only need a message line
 * (the request logger middleware, event handlers wired at bootstrap).
 */
export type LogSink = (message: string) => void;

const isTest = process.env.NODE_ENV === 'test';
const logDir = process.env.LOG_DIR || 'logs';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

function rotatingFile(name: string, level: string, maxFiles: string): DailyRotateFile {
  return new DailyRotateFile({
    filename: `${logDir}/${name}-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    maxSize: '20m',
    maxFiles,
    level,
    format: logFormat
  });
}

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
    silent: isTest && process.env.LOG_LEVEL === undefined
  })
];

if (!isTest) {
  transports.push(
    rotatingFile('error', 'error', '30d'),
    rotatingFile('combined', 'info', '14d')
  );
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'reverse-proxy' },
  transports
});

export const defaultLogSink: LogSink = (message: string) => {
  logger.info(message);
};
