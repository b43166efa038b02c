import winston from 'winston';
import { loggingConfig, type ServiceName } from '@core/config/logging';

/**
 * Interface for the LoggerFactory
 */
export interface ILoggerFactory {
  createServiceLogger(serviceName: ServiceName): winston.Logger;
}

// Add colors to Winston
winston.addColors(loggingConfig.colors);

const allLevels = Object.keys(loggingConfig.levels);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    // Concise output unless debugging
    if (process.env.MDTASK_DEBUG !== 'true') {
      return `${service ? `[${String(service)}] ` : ''}${String(message)}`;
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
 * Resolve the level for a service from the environment, falling back to its configured level
 */
function resolveLevel(fallback: string): string {
  // Explicit LOG_LEVEL takes precedence
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  // During tests, respect TEST_LOG_LEVEL or default to error for minimal output
  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.MDTASK_DEBUG === 'true') {
    return 'debug';
  }

  return fallback;
}

function createTransports(level: string): winston.transport[] {
  const transports: winston.transport[] = [];

  // stdout belongs to the commands being run, so the console transport writes to stderr
  if (process.env.NODE_ENV !== 'test') {
    transports.push(
      new winston.transports.Console({
        format: consoleFormat,
        level,
        stderrLevels: allLevels
      })
    );
  }

  const logFile = process.env.MDTASK_LOG_FILE;
  if (logFile) {
    transports.push(
      new winston.transports.File({
        filename: logFile,
        format: fileFormat,
        maxsize: loggingConfig.files.maxSize,
        maxFiles: loggingConfig.files.maxFiles,
        tailable: loggingConfig.files.tailable
      })
    );
  }

  return transports;
}

/**
 * Factory service for creating Winston loggers
 */
export class LoggerFactory implements ILoggerFactory {
  private readonly loggers = new Map<ServiceName, winston.Logger>();

  /**
   * Create (or reuse) the logger for a service
   */
  createServiceLogger(serviceName: ServiceName): winston.Logger {
    const existing = this.loggers.get(serviceName);
    if (existing) {
      return existing;
    }

    const level = resolveLevel(loggingConfig.services[serviceName].level);
    const logger = winston.createLogger({
      level,
      levels: loggingConfig.levels,
      defaultMeta: { service: serviceName },
      transports: createTransports(level)
    });

    // winston complains on every write to a logger without transports
    if (logger.transports.length === 0) {
      logger.add(new winston.transports.Console({ silent: true }));
    }

    this.loggers.set(serviceName, logger);
    return logger;
  }

  /**
   * Change the level of every logger created so far, including their transports
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

export function createServiceLogger(serviceName: ServiceName): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

/**
 * Apply a level from configuration or CLI flags. LOG_LEVEL in the environment still wins.
 */
export function setLogLevel(level: string): void {
  if (process.env.LOG_LEVEL) {
    return;
  }
  loggerFactory.setLevel(level);
}

// Create service loggers
export const parserLogger = createServiceLogger('parser');
export const resolverLogger = createServiceLogger('resolver');
export const executorLogger = createServiceLogger('executor');
export const configLogger = createServiceLogger('config');
export const locatorLogger = createServiceLogger('locator');
export const cliLogger = createServiceLogger('cli');
