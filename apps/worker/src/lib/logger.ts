import pino from 'pino';
import type { Logger } from 'pino';

// ============ CONFIGURATION ============
const env = process.env.NODE_ENV || 'development';
const isDevelopment = env !== 'production' && env !== 'test';

// ============ LOGGER INSTANCE ============
export const logger = pino({
  level: process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info'),

  // Pretty print in development
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,

  base: {
    service: 'manifest-audit-worker',
    version: process.env.APP_VERSION || '1.0.0',
    env,
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  // Delegated tokens and signed assertions must never reach the log sink
  redact: {
    paths: [
      'token',
      'accessToken',
      'access_token',
      'assertion',
      'signedJwt',
      'authorization',
      'credential',
      '*.token',
      '*.accessToken',
      '*.access_token',
      '*.assertion',
      '*.credential',
    ],
    censor: '[REDACTED]',
  },

  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
});

// ============ CHILD LOGGERS FOR MODULES ============
export const createModuleLogger = (module: string): Logger => {
  return logger.child({ module });
};

// ============ RUN CONTEXT LOGGER ============
export const createRunLogger = (runId: string): Logger => {
  return logger.child({ runId });
};

export type { Logger };

export default logger;
