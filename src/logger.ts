import pino from 'pino';
import env from './env';

/**
 * Root logger. Output goes to stderr so that stdout carries only what a
 * command prints.
 */
export const logger = pino(
  {
    name: 'termjudge',
    level: env.TERMJUDGE_LOG_LEVEL,
    redact: ['token', 'headers.Authorization']
  },
  pino.destination(2)
);

export function moduleLogger(module: string): pino.Logger {
  return logger.child({ module });
}
