// =============================================================================
// LOGGER UTILITY
// =============================================================================

import winston from 'winston'
import path from 'path'
import { config } from '../config'

export type LogMeta = Record<string, unknown>

// =============================================================================
// LOG LEVELS
// =============================================================================

const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4
}

const logColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white'
}

winston.addColors(logColors)

// =============================================================================
// LOG FORMATS
// =============================================================================

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(
    (info) => `${info.timestamp} ${info.level}: ${info.message}`
  )
)

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
)

// =============================================================================
// TRANSPORTS
// =============================================================================

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat
  })
]

if (config.logging.file.enabled) {
  const logDir = path.join(process.cwd(), 'logs')
  transports.push(
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: config.logging.file.maxSize,
      maxFiles: config.logging.file.maxFiles
    }),
    new winston.transports.File({
      filename: path.join(logDir, config.logging.file.filename),
      format: fileFormat,
      maxsize: config.logging.file.maxSize,
      maxFiles: config.logging.file.maxFiles
    })
  )
}

// =============================================================================
// LOGGER INSTANCE
// =============================================================================

const logger = winston.createLogger({
  level: config.logging.level,
  levels: logLevels,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: 'catalog-server',
    environment: config.server.env
  },
  transports,
  exitOnError: false
})

// =============================================================================
// STREAM FOR MORGAN
// =============================================================================

export const morganStream = {
  write: (message: string) => {
    logger.http(message.trimEnd())
  }
}

// =============================================================================
// LOGGER METHODS
// =============================================================================

export class Logger {
  static error(message: string, meta?: LogMeta): void {
    logger.error(message, meta)
  }

  static warn(message: string, meta?: LogMeta): void {
    logger.warn(message, meta)
  }

  static info(message: string, meta?: LogMeta): void {
    logger.info(message, meta)
  }

  static http(message: string, meta?: LogMeta): void {
    logger.http(message, meta)
  }

  static debug(message: string, meta?: LogMeta): void {
    logger.debug(message, meta)
  }

  static logError(error: Error, context?: string): void {
    logger.error(`${context ? `[${context}] ` : ''}${error.message}`, {
      stack: error.stack,
      name: error.name,
      context
    })
  }

  static logCache(event: string, meta?: LogMeta): void {
    logger.debug(`Cache: ${event}`, meta)
  }

  static logPerformance(operation: string, duration: number, metadata?: LogMeta): void {
    logger.info(`Performance: ${operation}`, {
      duration: `${duration}ms`,
      ...metadata
    })
  }
}

// =============================================================================
// EXPORTS
// =============================================================================

export default logger
export { logger }
