import type { FastifyReply, FastifyRequest } from 'fastify';

import type { Session } from '../domain/types.js';
import { errorMessage } from '../errors.js';
import type { UserStore } from '../store/types.js';

export const SESSION_COOKIE = 'session_id';

const UUID_LIKE_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

function extractSessionId(req: FastifyRequest): string | null {
  const authzRaw = req.headers.authorization;
  const authz = typeof authzRaw === 'string' ? authzRaw.trim() : '';

  if (authz.toLowerCase().startsWith('bearer ')) {
    const token = authz.slice('bearer '.length).trim();
    return token.length > 0 ? token : null;
  }

  const cookieSession = req.cookies?.[SESSION_COOKIE];
  return typeof cookieSession === 'string' && cookieSession.trim().length > 0 ? cookieSession.trim() : null;
}

/**
 * Resolves the session (bearer header or cookie) or answers 401/503 itself and returns null.
 * Roles are never read from the session; callers load them fresh.
 */
export async function requireSession(
  req: FastifyRequest,
  reply: FastifyReply,
  users: Pick<UserStore, 'findSession'>,
): Promise<Session | null> {
  const sessionId = extractSessionId(req);

  if (!sessionId) {
    reply.status(401).send({ ok: false, error: 'Unauthorized' });
    return null;
  }

  // Session ids are UUIDs; reject obviously malformed tokens early.
  if (!UUID_LIKE_RE.test(sessionId)) {
    reply.status(401).send({ ok: false, error: 'Invalid session' });
    return null;
  }

  let session: Session | null;
  try {
    session = await users.findSession(sessionId);
  } catch (e) {
    req.log.error({ err: e }, `session lookup failed: ${errorMessage(e)}`);
    reply.status(503).send({ ok: false, error: 'Session store unavailable' });
    return null;
  }

  if (!session) {
    reply.status(401).send({ ok: false, error: 'Invalid session' });
    return null;
  }

  if (session.expiresAt.getTime() <= Date.now()) {
    reply.status(401).send({ ok: false, error: 'Session expired' });
    return null;
  }

  return session;
}
