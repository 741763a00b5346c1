import { pino, type BaseLogger } from 'pino';

// the slice of pino the domain logs through; Fastify's request/app loggers satisfy it too
export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
});
