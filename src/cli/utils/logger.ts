import winston from 'winston';
import path from 'path';
import { config, AppConfig } from '../config';
import { isEngineError } from '../../shared/engine/errors';

const SERVICE_NAME = 'chesswalk-sbox';

/**
 * Normalise Error values in log metadata. Engine errors keep their code and
 * context; anything else is reduced to name, message and stack.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }

  if (isEngineError(info.error)) {
    info.error = info.error.toJSON();
  } else if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  return info;
});

/**
 * Format for structured JSON logging (file transports, and console when
 * LOG_FORMAT=json).
 */
export const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output.
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${metaStr}`;
  })
);

/**
 * Build a logger for the given settings. Logs go to stderr so the CLI's
 * report on stdout stays machine-readable.
 */
export function createAppLogger(
  logging: AppConfig['logging'],
  nodeEnv: AppConfig['nodeEnv']
): winston.Logger {
  const transports: Array<
    winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance
  > = [
    new winston.transports.Console({
      format: logging.format === 'json' ? jsonFormat : consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ];

  if (logging.file) {
    transports.push(
      new winston.transports.File({
        filename: path.resolve(logging.file),
        format: jsonFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return winston.createLogger({
    level: logging.level,
    defaultMeta: {
      service: SERVICE_NAME,
      environment: nodeEnv,
    },
    silent: nodeEnv === 'test',
    transports,
  });
}

const logger = createAppLogger(config.logging, config.nodeEnv);

export { logger };
