/**
 * Structured JSON logger with credential redaction.
 * Passwords, autologin tokens and pins never reach the log output.
 */

import pino from 'pino';

const logLevel = process.env['LOG_LEVEL'] ?? 'info';

// Pretty output in development unless JSON is requested explicitly.
// Tests and production always get plain JSON.
const usePretty =
  process.env['LOG_FORMAT'] === 'pretty' ||
  (process.env['NODE_ENV'] !== 'production' &&
    process.env['NODE_ENV'] !== 'test' &&
    process.env['LOG_FORMAT'] !== 'json');

/** Redaction paths shared with anything that builds its own pino instance. */
export const REDACT_PATHS = [
  'headers["x-password"]',
  'headers["x-autologin"]',
  'headers["x-pin"]',
  '*.password',
  '*.autologin',
  '*.pin',
];

export const logger = pino({
  name: 'nsapi-pacer',
  level: logLevel,
  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
  },
  ...(usePretty && {
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        colorize: true,
      },
    },
  }),
});
