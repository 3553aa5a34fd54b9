/**
 * Logger Configuration
 *
 * Configures pino logger with environment-aware formatting:
 * - Production: JSON output for log aggregation
 * - Development: Pretty-printed colorized output for readability
 * - Test: silent unless LOG_LEVEL says otherwise
 *
 * Logs go to stderr so that stdout stays free for recommendation output.
 *
 * Usage:
 *   import { createComponentLogger } from './logger';
 *   const log = createComponentLogger('consensus');
 *   log.info({ specLocation }, 'Recommendation built');
 */

import pino, { Logger, LoggerOptions } from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const NODE_ENV = process.env.NODE_ENV || 'development';
const isDevelopment = NODE_ENV === 'development';
const isTest = NODE_ENV === 'test';

const LOG_LEVEL = process.env.LOG_LEVEL || (isTest ? 'silent' : isDevelopment ? 'debug' : 'info');

/**
 * Base logger options shared across environments
 */
const baseOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: {
    pid: process.pid,
    env: NODE_ENV,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      'apiKey',
      'token',
      'secret',
      '*.apiKey',
      '*.token',
      '*.secret',
    ],
    remove: true,
  },
};

/**
 * Development-specific options with pretty printing
 */
const developmentOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      destination: 2,
      translateTime: 'SYS:HH:MM:ss.l',
      ignore: 'pid,hostname,env',
      messageFormat: '{msg}',
      singleLine: false,
    },
  },
};

/**
 * Production options - JSON output for log aggregation
 */
const productionOptions: LoggerOptions = {
  ...baseOptions,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      env: NODE_ENV,
    }),
  },
};

// =============================================================================
// Logger Instance
// =============================================================================

/**
 * Main application logger instance
 */
export const logger: Logger = isDevelopment
  ? pino(developmentOptions)
  : pino(productionOptions, pino.destination(2));

// =============================================================================
// Child Logger Factories
// =============================================================================

/**
 * Create a child logger for a specific component/module
 *
 * @example
 * const registryLogger = createComponentLogger('registry');
 * registryLogger.warn({ agent: 'risk' }, 'Agent failed');
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

/**
 * Create a child logger scoped to one analyzed example
 */
export function createExampleLogger(specLocation: string): Logger {
  return logger.child({ specLocation });
}

