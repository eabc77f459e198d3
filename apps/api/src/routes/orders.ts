import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { requireSession } from '../auth/session.js';
import type { AppServices } from '../services.js';
import { sendDomainError } from './domainErrors.js';
import { fail, ok } from './httpResponses.js';
import { orderIdParamsSchema } from './schemas/common.js';

const createOrderBodySchema = z.object({
  lineItems: z
    .array(z.object({ productId: z.string().trim().min(1).max(128) }))
    .min(1)
    .max(50),
});

export async function registerOrderRoutes(
  app: FastifyInstance,
  deps: Pick<AppServices, 'users' | 'ledger' | 'entitlements'>,
) {
  // Checkout: prices are resolved from the catalog, never taken from the client.
  app.post('/orders', async (req, reply) => {
    const session = await requireSession(req, reply, deps.users);
    if (!session) return;

    const parsed = createOrderBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send(fail('Invalid request body', { issues: parsed.error.issues }));
    }

    try {
      const order = await deps.ledger.createOrder(session.userId, parsed.data.lineItems);
      return reply.status(201).send(ok({ order }));
    } catch (e) {
      return sendDomainError(reply, e);
    }
  });

  app.get('/orders', async (req, reply) => {
    const session = await requireSession(req, reply, deps.users);
    if (!session) return;

    const orders = await deps.ledger.listOrdersForUser(session.userId);
    return reply.status(200).send(ok({ orders }));
  });

  app.get('/orders/:orderId', async (req, reply) => {
    const session = await requireSession(req, reply, deps.users);
    if (!session) return;

    const params = orderIdParamsSchema.safeParse(req.params);
    if (!params.success) {
      return reply.status(400).send(fail('Invalid orderId', { issues: params.error.issues }));
    }

    try {
      const order = await deps.ledger.getOrder(params.data.orderId);
      // Someone else's order is indistinguishable from a missing one.
      if (order.userId !== session.userId) {
        return reply.status(404).send(fail('Order not found', { kind: 'UnknownOrder' }));
      }
      const entitlements = await deps.entitlements.listForOrder(order.id);
      return reply.status(200).send(ok({ order, entitlementIds: entitlements.map((e) => e.id) }));
    } catch (e) {
      return sendDomainError(reply, e);
    }
  });
}
