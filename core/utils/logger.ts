import winston from 'winston';
import path from 'path';
import { loggingConfig, type LoggedService } from '@core/config/logging';

winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.json()
);

type LoggerTransport = winston.Logger['transports'][number];

const isTest = (): boolean => process.env.NODE_ENV === 'test';

/**
 * LOG_LEVEL wins, then TEST_LOG_LEVEL under test, then STACHE_DEBUG, then the
 * service's configured default.
 */
function resolveLogLevel(fallback: string): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  if (isTest()) {
    return process.env.TEST_LOG_LEVEL || 'error';
  }
  if (process.env.STACHE_DEBUG === 'true') {
    return 'debug';
  }
  return fallback;
}

function createTransports(level: string): LoggerTransport[] {
  const transports: LoggerTransport[] = [];

  // Silent under test unless TEST_LOG_LEVEL asks for output
  if (!isTest() || process.env.TEST_LOG_LEVEL) {
    transports.push(new winston.transports.Console({ format: consoleFormat, level }));
  }

  if (process.env.NODE_ENV === 'production') {
    transports.push(
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
    );
  }

  // winston warns when a logger has no transports at all
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return transports;
}

/**
 * Factory for per-service winston loggers
 */
export class LoggerFactory {
  private readonly loggers = new Map<LoggedService, winston.Logger>();

  createServiceLogger(serviceName: LoggedService): winston.Logger {
    const existing = this.loggers.get(serviceName);
    if (existing) {
      return existing;
    }

    const level = resolveLogLevel(loggingConfig.services[serviceName].level);
    const logger = winston.createLogger({
      level,
      levels: loggingConfig.levels,
      defaultMeta: { service: serviceName },
      transports: createTransports(level)
    });

    this.loggers.set(serviceName, logger);
    return logger;
  }

  /**
   * Change the level of every logger created so far (CLI --verbose/--debug).
   */
  setLevel(level: string): void {
    for (const logger of this.loggers.values()) {
      logger.level = level;
      logger.transports.forEach(transport => {
        transport.level = level;
      });
    }
  }
}

export const loggerFactory = new LoggerFactory();

export function createServiceLogger(serviceName: LoggedService): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

export const parserLogger = createServiceLogger('parser');
export const rendererLogger = createServiceLogger('renderer');
export const partialsLogger = createServiceLogger('partials');
export const extractorLogger = createServiceLogger('extractor');
export const configLogger = createServiceLogger('config');
export const filesystemLogger = createServiceLogger('filesystem');
export const cliLogger = createServiceLogger('cli');
