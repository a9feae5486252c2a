// src/logger.ts
// Shared pino logger; components log through children tagged with their name

import { pino, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: 'nodeflow',
    level: process.env.NODEFLOW_LOG_LEVEL ?? 'info',
    ...options,
  });
}

export const rootLogger: Logger = createLogger();

/**
 * Child logger for a component. Pass `parent` to attach to an injected logger.
 */
export function getLogger(component: string, parent: Logger = rootLogger): Logger {
  return parent.child({ component });
}
