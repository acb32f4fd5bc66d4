/**
 * Structured logging for the downloader. Logs go to stderr so stdout stays
 * free for search results and the session summary.
 */

import pino from 'pino';

const level = process.env['LOG_LEVEL'] ?? 'info';
const env = process.env['NODE_ENV'] ?? 'development';
const pretty = env === 'development';

export const logger = pino(
  {
    level,
    base: { app: 'hires-dl' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: { colorize: true, ignore: 'pid,hostname,app', destination: 2 },
        }
      : undefined,
  },
  pretty ? undefined : pino.destination(2)
);

export type Logger = typeof logger;

/** Child logger tagged with a component name and any extra fields */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
