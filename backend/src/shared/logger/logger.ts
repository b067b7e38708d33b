/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger instance (structured JSON logs).
 * - Keeps logging consistent across app/modules.
 * - Adds stable metadata (service, env) for log querying.
 *
 * HOW TO USE:
 * - Services receive a `Logger` through their deps; scripts import `logger` directly.
 * - Pass errors as `{ err }` meta; serializeErr keeps name/message/stack in the JSON line.
 * - Never log plaintext passwords, digests or raw session tokens.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'credential-kernel';
const level = process.env.LOG_LEVEL ?? 'info';

export type Logger = winston.Logger;

// JSON.stringify drops an Error's own fields (they are non-enumerable).
const serializeErr = winston.format((info) => {
  const err: unknown = info.err;
  if (err instanceof Error) {
    info.err = { name: err.name, message: err.message, stack: err.stack };
  }
  return info;
});

export const logger: Logger = winston.createLogger({
  level,
  silent: process.env.LOG_SILENT === 'true',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    serializeErr(),
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console()],
});
