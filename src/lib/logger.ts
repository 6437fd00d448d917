import pino from 'pino';

const isTest: boolean = 'test' === process.env.NODE_ENV;
const isDev: boolean = 'development' === process.env.NODE_ENV;

export const logger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : 'info'),
  redact: {
    paths: ['password', 'token', 'config.password', 'config.telegram.token'],
    censor: '[REDACTED]',
  },
  base: { service: 'sensor-monitor' },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,service',
        },
      }
    : undefined,
});

export const pollerLogger = logger.child({ module: 'poller' });
export const alertLogger = logger.child({ module: 'alerts' });
export const dbLogger = logger.child({ module: 'db' });
export const notifyLogger = logger.child({ module: 'notify' });
export const httpLogger = logger.child({ module: 'http' });

const children = [pollerLogger, alertLogger, dbLogger, notifyLogger, httpLogger];

/** Children keep the level they were created with, so update them too. */
export function setLogLevel(level: string): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}
