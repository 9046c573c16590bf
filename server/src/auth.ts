import crypto from 'node:crypto';
import type { FastifyRequest } from 'fastify';
import type { AppConfig } from './config.js';

export class HttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
  }
}

function sha256(input: string): Buffer {
  return crypto.createHash('sha256').update(input, 'utf8').digest();
}

function getBearerToken(request: FastifyRequest): string {
  const header = String(request.headers.authorization ?? '');
  const m = /^Bearer\s+(.+)$/i.exec(header.trim());
  return m?.[1]?.trim() ?? '';
}

export function isAdmin(config: Pick<AppConfig, 'ADMIN_TOKEN'>, request: FastifyRequest): boolean {
  const expected = config.ADMIN_TOKEN.trim();
  if (!expected) return false;
  const provided = getBearerToken(request);
  if (!provided) return false;
  // Compare digests so both sides have the same length.
  return crypto.timingSafeEqual(sha256(provided), sha256(expected));
}

export async function requireAdmin(config: Pick<AppConfig, 'ADMIN_TOKEN'>, request: FastifyRequest): Promise<void> {
  if (!isAdmin(config, request)) {
    throw new HttpError(401, 'Unauthorized');
  }
}
