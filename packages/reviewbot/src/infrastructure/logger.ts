import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Build the process logger. Pretty-printed outside production.
 * Components take the instance as a parameter instead of importing a global.
 */
export function createLogger(level: LogLevel = 'info', env: NodeJS.ProcessEnv = process.env): Logger {
  const isDev = env.NODE_ENV !== 'production';

  const targets: pino.TransportTargetOptions[] = [];

  if (isDev) {
    targets.push({
      target: 'pino-pretty',
      options: { colorize: true },
    });
  }

  if (targets.length === 0) {
    return pino({ level, name: 'anchorbot' });
  }

  return pino({
    level,
    name: 'anchorbot',
    transport: { targets },
  });
}
