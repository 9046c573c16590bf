import type { FastifyBaseLogger } from 'fastify';

/** The slice of Fastify's pino logger the DNS side uses; tests hand in plain spies. */
export type Logger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
