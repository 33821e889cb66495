/**
 * Pino logger factory shared by the flagwire packages
 */

import process from 'node:process';
import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

const isPrettyEnabled = (): boolean => {
  const pretty = process.env['FLAGWIRE_LOG_PRETTY']?.toLowerCase() ?? '';
  return pretty === 'true' || pretty === '1';
};

/**
 * Create a named logger.
 * Level comes from FLAGWIRE_LOG_LEVEL (default `info`); FLAGWIRE_LOG_PRETTY
 * switches on the pino-pretty transport.
 */
export function createLogger(name: string): Logger {
  const options: LoggerOptions = {
    name,
    level: process.env['FLAGWIRE_LOG_LEVEL'] ?? 'info',
  };

  if (isPrettyEnabled()) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
      },
    };
  }

  return pino(options);
}

/**
 * Mask a credential for safe logging, keeping the first 4 characters
 */
export function maskSecret(value: string | undefined): string {
  if (!value) return '<unset>';
  if (value.length <= 4) return '*'.repeat(value.length);
  return value.slice(0, 4) + '*'.repeat(value.length - 4);
}

/**
 * Package logger for the transport layer
 */
export const logger = createLogger('fetch-transport');
