import winston from 'winston';
import path from 'path';
import { loggingConfig } from '@core/config/logging';

export type ServiceName = keyof typeof loggingConfig.services;

export interface ILoggerFactory {
  createServiceLogger(serviceName: ServiceName): winston.Logger;
}

// Add colors to Winston
winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    if (process.env.TEXTBLOCKS_DEBUG !== 'true') {
      return `${level}: ${String(message)}`;
    }

    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += '\n' + JSON.stringify(metadata, null, 2);
    }
    return msg;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.json()
);

function getLogLevel(fallback: string): string {
  // Explicit LOG_LEVEL takes precedence
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  // During tests, respect TEST_LOG_LEVEL or default to error for minimal output
  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.TEXTBLOCKS_DEBUG === 'true') {
    return 'debug';
  }

  return fallback;
}

function createFileTransports(): winston.transports.FileTransportInstance[] {
  return [
    new winston.transports.File({
      filename: path.join(loggingConfig.files.directory, loggingConfig.files.mainLog),
      format: fileFormat,
      maxsize: loggingConfig.files.maxSize,
      maxFiles: loggingConfig.files.maxFiles,
      tailable: loggingConfig.files.tailable
    }),
    new winston.transports.File({
      filename: path.join(loggingConfig.files.directory, loggingConfig.files.errorLog),
      level: 'error',
      format: fileFormat,
      maxsize: loggingConfig.files.maxSize,
      maxFiles: loggingConfig.files.maxFiles,
      tailable: loggingConfig.files.tailable
    })
  ];
}

/**
 * Factory service for creating Winston loggers
 */
export class LoggerFactory implements ILoggerFactory {
  /**
   * Create a service-specific logger. Console output is suppressed under
   * NODE_ENV=test; file transports are only attached in production.
   */
  createServiceLogger(serviceName: ServiceName): winston.Logger {
    const serviceConfig = loggingConfig.services[serviceName];
    const level = getLogLevel(serviceConfig.level);

    return winston.createLogger({
      level,
      levels: loggingConfig.levels,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      defaultMeta: { service: serviceName },
      silent: process.env.NODE_ENV === 'test' && !process.env.TEST_LOG_LEVEL,
      transports: [
        new winston.transports.Console({
          format: consoleFormat,
          level
        }),
        ...(process.env.NODE_ENV === 'production' ? createFileTransports() : [])
      ]
    });
  }
}

export const loggerFactory = new LoggerFactory();

export function createServiceLogger(serviceName: ServiceName): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

// Service loggers
export const grammarLogger = createServiceLogger('grammar');
export const extractionLogger = createServiceLogger('extraction');
export const substitutionLogger = createServiceLogger('substitution');
export const resolutionLogger = createServiceLogger('resolution');
export const validationLogger = createServiceLogger('validation');
export const formatLogger = createServiceLogger('format');
export const storeLogger = createServiceLogger('store');
export const templateLogger = createServiceLogger('template');
export const configLogger = createServiceLogger('config');
export const cliLogger = createServiceLogger('cli');
