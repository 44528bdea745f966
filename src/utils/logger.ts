import pino from 'pino';

const isProduction = process.env['NODE_ENV'] === 'production';
const isTest = process.env['NODE_ENV'] === 'test';
const logLevel = process.env['LOG_LEVEL'] ?? (isProduction ? 'info' : 'debug');

// stdout carries search output; logs go to stderr
export const logger =
  isProduction || isTest
    ? pino({ level: logLevel }, pino.destination(2))
    : pino({
        level: logLevel,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
      });

export function createChildLogger(name: string) {
  return logger.child({ component: name });
}
