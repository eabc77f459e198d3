import type { FastifyInstance } from 'fastify';

import { requireSession } from '../auth/session.js';
import type { Entitlement, LineItem, Order } from '../domain/types.js';
import { storeMetadataSchema } from '../domain/types.js';
import { remainingDownloads } from '../entitlements/rules.js';
import type { AppServices } from '../services.js';
import { sendDomainError } from './domainErrors.js';
import { fail, ok } from './httpResponses.js';

function lineItemsByKey(orders: Order[]): Map<string, LineItem> {
  const map = new Map<string, LineItem>();
  for (const order of orders) {
    for (const li of order.lineItems) map.set(`${order.id}:${li.lineItemId}`, li);
  }
  return map;
}

function serializeLibraryItem(e: Entitlement, lineItem: LineItem | undefined) {
  return {
    entitlementId: e.id,
    productId: e.productId,
    productName: lineItem?.productName ?? null,
    orderId: e.orderId,
    licenseKey: e.licenseKey,
    status: e.status,
    downloadLimit: e.downloadLimit,
    downloadsRemaining: remainingDownloads(e),
    expiresAt: e.expiresAt ? e.expiresAt.toISOString() : 'never',
    lastAccessedAt: e.lastAccessedAt ? e.lastAccessedAt.toISOString() : null,
    purchasedAt: e.createdAt.toISOString(),
  };
}

// Totals cover paid orders only. Mixed currencies have no single total.
function librarySummary(orders: Order[], entitlements: Entitlement[]) {
  const paid = orders.filter((o) => o.status === 'paid');
  const paidIds = new Set(paid.map((o) => o.id));
  const currencies = new Set(paid.map((o) => o.currency));
  const currency = currencies.size === 1 ? paid[0].currency : null;

  return {
    totalPurchases: paid.length,
    totalSpent: currencies.size > 1 ? null : paid.reduce((sum, o) => sum + o.total, 0),
    currency,
    totalDownloads: entitlements
      .filter((e) => paidIds.has(e.orderId))
      .reduce((sum, e) => sum + e.downloadsConsumed, 0),
  };
}

export async function registerMeRoutes(app: FastifyInstance, deps: Pick<AppServices, 'users' | 'ledger' | 'entitlements' | 'roles'>) {
  app.get('/me', async (req, reply) => {
    const session = await requireSession(req, reply, deps.users);
    if (!session) return;

    try {
      const role = await deps.roles.getRole(session.userId);
      const creator = role === 'creator' ? await deps.users.findCreatorRecord(session.userId) : null;
      return reply.status(200).send(
        ok({ userId: session.userId, role, creator, sessionExpiresAt: session.expiresAt.toISOString() }),
      );
    } catch (e) {
      return sendDomainError(reply, e);
    }
  });

  app.get('/me/library', async (req, reply) => {
    const session = await requireSession(req, reply, deps.users);
    if (!session) return;

    const [entitlements, orders] = await Promise.all([
      deps.entitlements.listForUser(session.userId),
      deps.ledger.listOrdersForUser(session.userId),
    ]);
    const lineItems = lineItemsByKey(orders);

    return reply.status(200).send(
      ok({
        items: entitlements.map((e) => serializeLibraryItem(e, lineItems.get(`${e.orderId}:${e.lineItemId}`))),
        summary: librarySummary(orders, entitlements),
      }),
    );
  });

  app.post('/me/creator', async (req, reply) => {
    const session = await requireSession(req, reply, deps.users);
    if (!session) return;

    const parsed = storeMetadataSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send(fail('Invalid request body', { issues: parsed.error.issues }));
    }

    try {
      const creator = await deps.roles.promoteToCreator(session.userId, parsed.data);
      return reply.status(201).send(ok({ creator }));
    } catch (e) {
      return sendDomainError(reply, e);
    }
  });
}
