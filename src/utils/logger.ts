import pino from 'pino';
import { getConfig } from '../config.js';

const config = getConfig();

export const logger = pino({
  level: config.logLevel,
  redact: ['apiKey', 'headers.authorization', 'headers["x-api-key"]'],
  transport:
    config.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export const createChildLogger = (name: string) => logger.child({ name });
