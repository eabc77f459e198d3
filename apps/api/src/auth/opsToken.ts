import crypto from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';

import { fail } from '../routes/httpResponses.js';

function safeEquals(a: string, b: string): boolean {
  const aBuf = Buffer.from(a, 'utf8');
  const bBuf = Buffer.from(b, 'utf8');
  if (aBuf.length !== bBuf.length) return false;
  return crypto.timingSafeEqual(aBuf, bBuf);
}

/** Gate for operator routes: 503 when no token is configured, 401 on mismatch. */
export function requireOpsToken(req: FastifyRequest, reply: FastifyReply, expected: string | null): boolean {
  if (!expected) {
    reply.status(503).send(fail('Ops API not configured (OPS_API_TOKEN missing)'));
    return false;
  }

  const got = String(req.headers['x-ops-token'] ?? '').trim();
  if (!got || !safeEquals(got, expected)) {
    reply.status(401).send(fail('Unauthorized'));
    return false;
  }
  return true;
}
