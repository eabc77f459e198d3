import type { FastifyBaseLogger } from 'fastify';
import { pino } from 'pino';

export function loggerOptions(level: string): { name: string; level: string } {
  return { name: 'fulfillment-api', level };
}

// Used outside Fastify (migration CLI, services built before the app).
export function createLogger(level = 'info'): FastifyBaseLogger {
  return pino(loggerOptions(level));
}

export function silentLogger(): FastifyBaseLogger {
  return pino({ level: 'silent' });
}
