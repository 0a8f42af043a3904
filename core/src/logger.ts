import pino, { type Logger } from 'pino';

export type { Logger };

const rootLogger = pino({
  name: 'modsync',
  level: process.env.LOG_LEVEL ?? 'info',
});

/**
 * Get a logger for the specified module.
 * To use in a module, call `getLog('ModuleName')` near the top of the file.
 */
export function getLog(module: string): Logger {
  return rootLogger.child({ module });
}
