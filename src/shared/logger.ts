import pino from 'pino';

const env = process.env['NODE_ENV'];

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport:
    env !== 'production' && env !== 'test'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  redact: {
    paths: ['token', 'trigger_secret', 'api_key', 'password', '*.token', '*.trigger_secret', '*.api_key'],
    censor: '***REDACTED***',
  },
});
