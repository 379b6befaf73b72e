import { type Logger, pino } from 'pino';

export type { Logger };

/** Environment variable overriding the default log level. */
export const LOG_LEVEL_ENV = 'WEBSERVICE_LOG_LEVEL';

/**
 * Creates the pino logger used when no logger is injected.
 * Level comes from `WEBSERVICE_LOG_LEVEL`, defaulting to `warn`.
 */
export function createLogger(level: string = process.env[LOG_LEVEL_ENV] ?? 'warn'): Logger {
  return pino({ name: 'webservice', level });
}
