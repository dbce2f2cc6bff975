import winston from 'winston';
import { loggingConfig, type LoggerService } from '@core/config/logging';
import type { LoggingConfig } from '@core/config/types';

winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
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

const isTest = () => process.env.NODE_ENV === 'test';

// Determine the log level based on environment variables
const getLogLevel = (fallback: string = loggingConfig.defaultLevel): string => {
  // Explicit LOG_LEVEL takes precedence
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  // During tests, respect TEST_LOG_LEVEL or default to error for minimal output
  if (isTest()) {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.SCRIPTENV_DEBUG === 'true') {
    return 'debug';
  }

  return fallback;
};

// Tests keep a silent console transport; winston complains about loggers without transports
const createConsoleTransport = () =>
  new winston.transports.Console({
    format: consoleFormat,
    silent: isTest() && !process.env.TEST_LOG_LEVEL
  });

const serviceLoggers = new Map<LoggerService, winston.Logger>();

// Shared by every logger while logging.file is configured
let fileTransport: winston.transports.FileTransportInstance | undefined;

/**
 * Create (or reuse) the logger of one library service
 */
export function createServiceLogger(serviceName: LoggerService): winston.Logger {
  const existing = serviceLoggers.get(serviceName);
  if (existing) {
    return existing;
  }

  const serviceLogger = winston.createLogger({
    level: getLogLevel(loggingConfig.services[serviceName].level),
    levels: loggingConfig.levels,
    defaultMeta: { service: serviceName },
    transports: fileTransport ? [createConsoleTransport(), fileTransport] : [createConsoleTransport()]
  });

  serviceLoggers.set(serviceName, serviceLogger);
  return serviceLogger;
}

export const logger = winston.createLogger({
  level: getLogLevel(),
  levels: loggingConfig.levels,
  transports: [createConsoleTransport()]
});

/**
 * Apply the logging section of a loaded configuration to every logger.
 * Environment variables still win over the configured level. Each call
 * replaces the file transport of the previous one.
 */
export function configureLogging(config: LoggingConfig = {}): void {
  const level = getLogLevel(config.level ?? loggingConfig.defaultLevel);
  const all = [logger, ...serviceLoggers.values()];

  for (const target of all) {
    target.level = level;
  }

  const previous = fileTransport;
  fileTransport = undefined;
  if (previous) {
    for (const target of all) {
      target.remove(previous);
    }
    previous.close?.();
  }

  if (config.file) {
    const transport = new winston.transports.File({
      filename: config.file,
      format: fileFormat
    });
    fileTransport = transport;
    for (const target of all) {
      target.add(transport);
    }
  }
}

export const policyLogger = createServiceLogger('policy');
export const environmentLogger = createServiceLogger('environment');
export const scriptLogger = createServiceLogger('script');
export const loopLogger = createServiceLogger('loop');
export const hostLogger = createServiceLogger('host');

export default logger;
