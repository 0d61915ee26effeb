/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger instance (structured JSON logs).
 * - Keeps logging consistent across HTTP handlers and cable connections.
 * - Adds stable metadata (service, env) for log querying.
 *
 * HOW TO USE:
 * - Import `logger` anywhere you need logs.
 * - Prefer `withRequestContext(req)` inside request handlers and
 *   `withConnectionContext(...)` inside cable connections.
 * - Do not log raw Error objects alone; pass `{ err }` so stack/message is preserved.
 * - Never log tokens (access or refresh) or passwords.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'squadlink-backend';
const level = process.env.LOG_LEVEL ?? 'info';

export type Logger = winston.Logger;

export const logger: Logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }), // ensures Error.stack is serialized
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console()],
});
