import winston from 'winston';
import { loggingConfig, type LoggingService } from '@core/config/logging';

/**
 * The subset of a winston logger the tools depend on
 */
export interface ILogger {
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    // Concise output unless debugging
    if (process.env.TEMPLATE_TOOLS_DEBUG !== 'true') {
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

/**
 * LOG_LEVEL wins, then the test default, then debug mode, then the
 * service's configured level.
 */
function resolveLogLevel(service: LoggingService): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.TEMPLATE_TOOLS_DEBUG === 'true') {
    return 'debug';
  }

  return loggingConfig.services[service].level;
}

const serviceLoggers = new Map<LoggingService, winston.Logger>();

/**
 * Create (or reuse) the winston logger for one tool service
 */
export function createServiceLogger(service: LoggingService): winston.Logger {
  const existing = serviceLoggers.get(service);
  if (existing) {
    return existing;
  }

  const logger = winston.createLogger({
    level: resolveLogLevel(service),
    levels: loggingConfig.levels,
    defaultMeta: { service },
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
        // Keep test output clean unless a level was asked for
        silent: process.env.NODE_ENV === 'test' && !process.env.TEST_LOG_LEVEL
      }),
      ...(process.env.TEMPLATE_TOOLS_LOG_FILE ? [
        new winston.transports.File({
          filename: process.env.TEMPLATE_TOOLS_LOG_FILE,
          format: fileFormat,
          maxsize: loggingConfig.files.maxSize,
          maxFiles: loggingConfig.files.maxFiles,
          tailable: loggingConfig.files.tailable
        })
      ] : [])
    ]
  });

  serviceLoggers.set(service, logger);
  return logger;
}

export const loopLogger = createServiceLogger('loop');
export const dataLogger = createServiceLogger('data');
export const toolboxLogger = createServiceLogger('toolbox');
export const configLogger = createServiceLogger('config');
