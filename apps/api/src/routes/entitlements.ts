import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { requireSession } from '../auth/session.js';
import type { DownloadEvent } from '../domain/types.js';
import type { AppServices } from '../services.js';
import { sendDomainError } from './domainErrors.js';
import { fail, ok } from './httpResponses.js';
import { entitlementIdParamsSchema } from './schemas/common.js';

const issueTokenBodySchema = z
  .object({ singleUse: z.boolean().optional() })
  .optional()
  .transform((v) => v ?? {});

// Client hash and token id stay internal.
function serializeDownloadEvent(event: DownloadEvent) {
  return {
    id: event.id,
    occurredAt: event.occurredAt.toISOString(),
    outcome: event.outcome,
    reason: event.reason,
  };
}

export async function registerEntitlementRoutes(
  app: FastifyInstance,
  deps: Pick<AppServices, 'users' | 'entitlements' | 'audit' | 'guard'>,
) {
  app.post('/entitlements/:entitlementId/download-token', async (req, reply) => {
    const session = await requireSession(req, reply, deps.users);
    if (!session) return;

    const params = entitlementIdParamsSchema.safeParse(req.params);
    if (!params.success) {
      return reply.status(400).send(fail('Invalid entitlementId', { issues: params.error.issues }));
    }
    const body = issueTokenBodySchema.safeParse(req.body);
    if (!body.success) {
      return reply.status(400).send(fail('Invalid request body', { issues: body.error.issues }));
    }

    try {
      const issued = await deps.guard.issueToken(session.userId, params.data.entitlementId, body.data);
      return reply.status(201).send(
        ok({
          token: issued.token,
          expiresAt: issued.expiresAt.toISOString(),
          singleUse: issued.singleUse,
          downloadPath: `/downloads/${issued.token}`,
        }),
      );
    } catch (e) {
      return sendDomainError(reply, e);
    }
  });

  app.get('/entitlements/:entitlementId/downloads', async (req, reply) => {
    const session = await requireSession(req, reply, deps.users);
    if (!session) return;

    const params = entitlementIdParamsSchema.safeParse(req.params);
    if (!params.success) {
      return reply.status(400).send(fail('Invalid entitlementId', { issues: params.error.issues }));
    }

    try {
      const entitlement = await deps.entitlements.findById(params.data.entitlementId);
      if (!entitlement || entitlement.userId !== session.userId) {
        return reply.status(403).send(fail('Not entitled', { kind: 'NotEntitled' }));
      }
      const events = await deps.audit.listForEntitlement(entitlement.id);
      return reply.status(200).send(ok({ entitlementId: entitlement.id, events: events.map(serializeDownloadEvent) }));
    } catch (e) {
      return sendDomainError(reply, e);
    }
  });
}
