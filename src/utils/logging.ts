import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { ConfigManager } from '../config/ConfigManager.js';

// stdout carries the JSON records printed by the CLI, so every level goes to stderr
const STDERR_LEVELS = ['error', 'warn', 'info', 'debug'];

// Create logger with default config first to avoid circular dependency
// Will be configured properly during initializeLogger()
export const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: STDERR_LEVELS,
      format: winston.format.combine(
        winston.format.colorize({ all: true }),
        winston.format.simple()
      ),
    }),
  ],
});

// Flag to track if logger has been initialized
let isInitialized = false;

/**
 * Initialize logger with configuration from ConfigManager
 * Must be called after ConfigManager is fully initialized
 */
export function initializeLogger(): void {
  if (isInitialized) {
    return;
  }

  const config = ConfigManager.getInstance().getLoggingConfig();

  logger.level = config.level;

  // Clear default transports
  logger.clear();

  if (config.file.enabled) {
    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/error-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        maxSize: config.file.maxSize,
        maxFiles: `${config.file.maxFiles}d`, // Keep logs for N days
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-error.json`,
      })
    );

    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/app-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxSize: config.file.maxSize,
        maxFiles: `${config.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-app.json`,
      })
    );
  }

  if (config.console.enabled) {
    logger.add(
      new winston.transports.Console({
        stderrLevels: STDERR_LEVELS,
        format: winston.format.combine(
          winston.format.colorize({ all: config.console.colorize }),
          winston.format.simple()
        ),
      })
    );
  }

  // winston warns when a logger has no transports at all
  if (!config.file.enabled && !config.console.enabled) {
    logger.add(new winston.transports.Console({ silent: true }));
  }

  isInitialized = true;
  logger.debug('Logger initialized with configuration', { level: config.level });
}
