/**
 * Logging service exports
 * Central export point for all logging utilities
 */

// Core logger
export {
  logger,
  createAgentLogger,
  createLogger,
  logStartup,
  logShutdown,
} from './logger.js';

// Structured logging helpers
export {
  loggers,
  startTimer,
  loggedOperation,
} from './log-helpers.js';
