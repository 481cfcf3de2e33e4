import pino, { type LoggerOptions } from 'pino';

const isDev = process.env['NODE_ENV'] !== 'production';
const isTest = process.env['NODE_ENV'] === 'test';

// stdout carries the verdict document, so every log line goes to stderr
const options: LoggerOptions = {
  level: process.env['P4VERDICT_LOG_LEVEL'] ?? (isTest ? 'warn' : 'info'),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

if (isDev && !isTest) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      destination: 2,
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

export const logger: pino.Logger = options.transport
  ? pino(options)
  : pino(options, pino.destination({ dest: 2, sync: true }));

export function createLogger(module: string): pino.Logger {
  return logger.child({ module });
}
