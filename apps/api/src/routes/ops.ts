import type { FastifyInstance } from 'fastify';

import { requireOpsToken } from '../auth/opsToken.js';
import type { AppConfig } from '../config.js';
import { buildReadinessReport } from '../readiness.js';
import type { AppServices } from '../services.js';
import { sendDomainError } from './domainErrors.js';
import { fail, ok } from './httpResponses.js';
import { orderIdParamsSchema } from './schemas/common.js';

export async function registerOpsRoutes(app: FastifyInstance, deps: Pick<AppServices, 'ledger'> & { config: AppConfig }) {
  app.get('/ops/readiness', async () => {
    return ok(buildReadinessReport(deps.config));
  });

  app.post('/ops/orders/:orderId/refund', async (req, reply) => {
    if (!requireOpsToken(req, reply, deps.config.opsApiToken)) return;

    const params = orderIdParamsSchema.safeParse(req.params);
    if (!params.success) {
      return reply.status(400).send(fail('Invalid orderId', { issues: params.error.issues }));
    }

    try {
      const result = await deps.ledger.refund(params.data.orderId);
      return reply.status(200).send(ok({ ...result }));
    } catch (e) {
      return sendDomainError(reply, e);
    }
  });
}
