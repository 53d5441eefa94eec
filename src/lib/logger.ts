import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({
  name: 'ticket-hunter',
  level: process.env.LOG_LEVEL ?? 'info'
});

/**
 * Child logger tagged with the component name
 */
export function createLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
