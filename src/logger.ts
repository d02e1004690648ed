import pino from 'pino';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const isProduction = process.env.NODE_ENV === 'production';

const pinoOptions: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL ?? 'info',
  enabled: !isTest,
  redact: {
    paths: [
      'password',
      'passwordHash',
      'secret',
      'sessionSecret',
      '*.password',
      '*.passwordHash',
      'req.headers.cookie',
      'req.headers.authorization'
    ],
    censor: '***REDACTED***'
  },
  serializers: {
    err: pino.stdSerializers.err
  }
};

export const logger =
  isProduction || isTest
    ? pino(pinoOptions)
    : pino({
        ...pinoOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname'
          }
        }
      });

export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}
