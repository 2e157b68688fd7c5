import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Root process logger. Components take a child of it
 * (`logger.child({ component: 'agent', agent_id })`).
 */
export function createLogger(level: string, name: string): Logger {
  return pino({
    name,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
