import pino from 'pino';
import { env } from '../config/env';

export const logger = pino({
  level: env.logLevel,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
});

/** Child logger tagged with the component that owns the log lines */
export function componentLogger(component: string): pino.Logger {
  return logger.child({ component });
}
