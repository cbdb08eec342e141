import { pino } from 'pino';

/**
 * Process-wide structured logger.
 *
 * Reads LOG_LEVEL straight from the environment so it can be imported before
 * (and independently of) the validated config module.
 */

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
type LogLevel = (typeof LEVELS)[number];

function resolveLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  return LEVELS.find((level) => level === value) ?? 'info';
}

export const logger = pino({
  level: resolveLevel(process.env.LOG_LEVEL),
  base: { service: 'mscbot' },
  timestamp: pino.stdTimeFunctions.isoTime,
});
