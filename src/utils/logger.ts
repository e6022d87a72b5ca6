// Shared pino logger for services and scripts
// Fastify keeps its own request logger with the same settings (see server.ts)
// Reads LOG_LEVEL and NODE_ENV itself: env.ts logs through this module

import { pino } from 'pino';

const isDevelopment = (process.env.NODE_ENV || 'development') === 'development';

export const loggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  ...(isDevelopment
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }
    : {}),
};

export const logger = pino(loggerOptions);

export function moduleLogger(module: string) {
  return logger.child({ module });
}
