import pino from 'pino';

const isTestRuntime =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST_WORKER_ID !== undefined;

export const logger = pino({
  level: process.env.LOG_LEVEL ?? (isTestRuntime ? 'silent' : 'info'),
  base: {
    service: 'clipforge'
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err
  },
  redact: {
    paths: [
      'headers.Authorization',
      'headers["x-api-key"]',
      'config.RUNWARE_API_KEY',
      'config.MIRELO_API_KEY',
      'config.TELEGRAM_BOT_TOKEN',
      '*.apiKey'
    ],
    remove: true
  },
  transport: isTestRuntime
    ? undefined
    : {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          // stdout is reserved for `clipforge --json`
          destination: 2
        }
      }
});

export const childLogger = (bindings: Record<string, unknown>) => logger.child(bindings);
