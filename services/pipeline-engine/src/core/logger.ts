import { pino, stdSerializers, type Logger } from 'pino';

import { env } from './env.js';

const defaultLevel = (): string => {
  if (env.LOG_LEVEL) {
    return env.LOG_LEVEL;
  }
  if (env.NODE_ENV === 'test') {
    return 'silent';
  }
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
};

export const logger: Logger = pino({
  name: 'pipeline-engine',
  level: defaultLevel(),
  serializers: {
    error: stdSerializers.err,
  },
});

export type { Logger };
