import { pino } from 'pino';

export const logger = pino({
  name: 'report-merge-api',
  level: process.env.LOG_LEVEL ?? 'info',
  redact: {
    paths: ['req.headers.authorization', '*.secret_key', '*.minio_credentials'],
    censor: '[redacted]',
  },
});

export type { Logger } from 'pino';
