import { destination, pino } from 'pino';

/**
 * Worker-wide logger. Writes to stderr so the command-line shell keeps
 * stdout for its own report output.
 */
export const logger = pino(
  {
    name: 'report-merge',
    level: process.env.LOG_LEVEL ?? 'info',
    redact: {
      paths: ['*.secret_key', '*.secretKey', 'minioCredentials.secretKey', 'settings.minioCredentials.secretKey'],
      censor: '[redacted]',
    },
  },
  destination(2),
);

export type { Logger } from 'pino';
