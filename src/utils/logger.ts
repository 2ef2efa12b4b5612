import { pino } from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

/**
 * Structured logger using pino
 *
 * Configuration:
 * - LOG_LEVEL environment variable controls verbosity (trace, debug, info, warn, error, fatal)
 * - ISO timestamps for consistent time formatting
 * - JSON format for structured logging
 * - Gateway credentials are redacted wherever they end up in a log object
 */
export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      '*.token',
      '*.secret',
      '*.accessToken',
      '*.refreshToken',
      '*.clientSecret',
      '*.access_token',
      '*.refresh_token',
      '*.client_secret',
      '*.authorization',
      '*.webhookUrl',
    ],
    censor: '[REDACTED]',
  },
});

