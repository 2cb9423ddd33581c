/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger instance (structured JSON logs).
 * - Keeps logging consistent across app/modules.
 * - Adds stable metadata (service, env) so container log aggregation can filter on it.
 *
 * HOW TO USE:
 * - Import `logger` anywhere you need logs.
 * - Entry points call configureLogger() with the AppConfig values.
 * - Prefer using `withRequestContext(req)` when logging inside request handlers.
 * - Log errors as `{ message, stack }` fields; nested Error objects serialize to {}.
 * - Never log database credentials (use describeConfig() for startup logs).
 */

import winston from 'winston';

export type Logger = winston.Logger;

export type LoggerSettings = {
  level: string;
  service: string;
  env: string;
};

export const logger: Logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }), // ensures Error.stack is serialized
    winston.format.json(),
  ),
  defaultMeta: {
    service: 'employee-directory',
  },
  transports: [new winston.transports.Console()],
});

/**
 * Applies the validated config (LOG_LEVEL, SERVICE_NAME, NODE_ENV) at startup.
 * Until then the logger runs at 'info' with the default service name.
 */
export function configureLogger(settings: LoggerSettings): void {
  logger.level = settings.level;
  logger.defaultMeta = { service: settings.service, env: settings.env };
}
