/**
 * Environment variable helpers shared by the config modules
 */

import pino from 'pino';

const logger = pino({
  name: 'config',
  level: process.env.LOG_LEVEL || 'info',
});

/**
 * Get environment variable or throw error if required and missing
 */
export function getEnvVar(key: string, required: boolean = false, defaultValue?: string): string {
  const value = process.env[key] || defaultValue;

  if (required && !value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }

  return value || '';
}

/**
 * Parse integer from environment variable
 */
export function getEnvInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    logger.warn({ key, value, defaultValue }, 'Invalid integer value in environment, using default');
    return defaultValue;
  }

  return parsed;
}

/**
 * Parse boolean flag from environment variable ('true' / '1' are truthy)
 */
export function getEnvBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  return value === 'true' || value === '1';
}
