import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { remainingDownloads } from '../entitlements/rules.js';
import type { AppServices } from '../services.js';
import { sendDomainError } from './domainErrors.js';
import { fail, ok } from './httpResponses.js';
import { queryFlagSchema } from './schemas/common.js';

const redeemParamsSchema = z.object({ token: z.string().min(1).max(2048) });
const redeemQuerySchema = z.object({ redirect: queryFlagSchema });

// The token is the credential; no session is needed to redeem it.
export async function registerDownloadRoutes(app: FastifyInstance, deps: Pick<AppServices, 'guard'>) {
  app.get('/downloads/:token', async (req, reply) => {
    const params = redeemParamsSchema.safeParse(req.params);
    const query = redeemQuerySchema.safeParse(req.query);
    if (!params.success || !query.success) {
      return reply.status(400).send(fail('Invalid download request'));
    }

    const userAgent = req.headers['user-agent'];
    try {
      const redemption = await deps.guard.redeem(params.data.token, {
        ip: req.ip,
        userAgent: typeof userAgent === 'string' ? userAgent : null,
      });

      reply.header('cache-control', 'no-store');
      if (query.data.redirect) return reply.redirect(redemption.downloadUrl, 302);

      return reply.status(200).send(
        ok({
          downloadUrl: redemption.downloadUrl,
          expiresInSec: redemption.expiresInSec,
          downloadsRemaining: remainingDownloads(redemption.entitlement),
        }),
      );
    } catch (e) {
      return sendDomainError(reply, e);
    }
  });
}
