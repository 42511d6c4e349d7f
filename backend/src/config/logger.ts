import pino from 'pino';

/**
 * Paths to redact from all log output.
 * Tokens and credentials never reach the log stream.
 */
const REDACT_PATHS: string[] = [
  'req.headers.authorization',
  'req.headers.cookie',
  'password',
  'req.body.password',
  'accessToken',
  'refreshToken',
  'DATABASE_URL',
  'data.password',
  'data.accessToken',
];

const isTest = process.env['NODE_ENV'] === 'test';

/**
 * Pino logger instance with redaction enabled.
 *
 * Usage:
 *   import { logger } from './config/logger.js';
 *   logger.info({ documentId: 42 }, 'Document received');
 *   logger.error({ err, documentId }, 'Forward failed');
 */
export const logger = pino({
  name: 'custody-tracker',
  level: process.env['LOG_LEVEL'] ?? (isTest ? 'silent' : 'info'),

  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  serializers: {
    err: pino.stdSerializers.err,
    req: (req: Record<string, unknown>) => ({
      method: req['method'],
      url: req['url'],
      remoteAddress: req['remoteAddress'],
    }),
    res: (res: Record<string, unknown>) => ({
      statusCode: res['statusCode'],
    }),
  },

  // Plain JSON in production; stdout transport elsewhere. No worker thread under tests.
  ...(process.env['NODE_ENV'] !== 'production' && !isTest
    ? {
        transport: {
          target: 'pino/file',
          options: { destination: 1 }, // stdout
        },
      }
    : {}),
});

/**
 * Create a child logger scoped to a specific service/module.
 *
 * Usage:
 *   const log = createServiceLogger('custody-service');
 *   log.info('Forwarding...');
 */
export function createServiceLogger(service: string): pino.Logger {
  return logger.child({ service });
}
