import pino from 'pino';

/**
 * Shared structured logger.
 *
 * Reads LOG_LEVEL straight from the environment so it can be imported before
 * (and independently of) config validation. Pretty output outside production
 * and tests; plain JSON lines otherwise.
 */

const level = process.env.LOG_LEVEL ?? 'info';
const usePretty = process.env.NODE_ENV !== 'production'
  && process.env.NODE_ENV !== 'test'
  && !process.env.VITEST;

export const logger = pino({
  name: 'huddle',
  level,
  ...(usePretty
    ? {
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
      },
    }
    : {}),
});

export type Logger = typeof logger;
