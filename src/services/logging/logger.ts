/**
 * Logging service using Pino
 * Provides structured logging with debate and agent context
 */

import pino from 'pino';
import type { AgentKind } from '../../types/debate.js';

/**
 * Development transport configuration with pretty printing
 */
const developmentTransport = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'pid,hostname',
    messageFormat: '{levelLabel} - {msg}',
  },
};

/**
 * Production logger configuration (JSON format for log aggregation)
 */
const productionConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      hostname: bindings.hostname,
      node_version: process.version,
    }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    env: process.env.NODE_ENV,
  },
};

/**
 * Development logger configuration (human-readable format)
 */
const developmentConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'debug',
  transport: developmentTransport,
};

/**
 * Test runs log plain JSON in-process, usually at 'silent'
 */
const testConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'silent',
};

function selectConfig(env: string | undefined): pino.LoggerOptions {
  if (env === 'production') return productionConfig;
  if (env === 'test') return testConfig;
  return developmentConfig;
}

/**
 * Main logger instance
 */
export const logger = pino(selectConfig(process.env.NODE_ENV));

/**
 * Create a child logger with agent context
 */
export function createAgentLogger(agentType: AgentKind | 'judge' | 'orchestrator') {
  return logger.child({ agentType, context: 'agent' });
}

/**
 * Create a child logger with custom context
 */
export function createLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

/**
 * Log system startup information
 */
export function logStartup(port: number | string) {
  logger.info(
    {
      port,
      nodeEnv: process.env.NODE_ENV,
      nodeVersion: process.version,
      logLevel: logger.level,
    },
    'Server starting'
  );
}

/**
 * Log system shutdown information
 */
export function logShutdown(signal: string) {
  logger.info({ signal }, 'Shutting down gracefully');
}
