/**
 * Logger utility (pino wrapper)
 *
 * Structured JSON logging shared by the core modules. The server's request
 * logger is configured separately through Fastify.
 */

import { pino } from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;
