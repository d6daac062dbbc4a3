import pino from 'pino';

/**
 * Root pino logger. Secrets that travel through config objects are redacted:
 * botToken and databaseUrl, at the top level or one object deep.
 */
const logger = pino({
  level: process.env.LOG_LEVEL || 'info',

  redact: {
    paths: [
      'botToken',
      'databaseUrl',
      '*.botToken',
      '*.databaseUrl',
    ],
    censor: '[REDACTED]'
  },

  // Pretty print in development, JSON in production
  transport: process.env.NODE_ENV === 'development'
    ? { target: 'pino-pretty' }
    : undefined
});

export type Logger = pino.Logger;

/**
 * Create a child logger with module context.
 *
 * @example
 * const log = createChildLogger('ledger');
 * log.info({ pairAddress }, 'Trade recorded');
 * // Output includes: { module: 'ledger', ... }
 */
function createChildLogger(module: string): Logger {
  return logger.child({ module });
}

export { createChildLogger };
