import crypto from 'node:crypto';

import type { FastifyBaseLogger } from 'fastify';

import type { CatalogClient, DownloadExpiryPolicy } from '../collaborators/catalog.js';
import type { LineItem, Order, OrderStatus } from '../domain/types.js';
import { DomainError } from '../errors.js';
import type { OrderLedger } from '../orders/orderLedger.js';
import type { EntitlementStore } from '../store/types.js';

export type PaymentOutcome = 'succeeded' | 'failed';

export type PaymentConfirmation = {
  orderId: string;
  paymentRef: string;
  outcome: PaymentOutcome;
  sequence?: number;
};

export type FulfillmentResult = {
  orderId: string;
  status: OrderStatus;
  transitioned: boolean;
  entitlementsCreated: number;
  entitlementIds: string[];
};

export type FulfillmentProcessorDeps = {
  ledger: OrderLedger;
  entitlements: EntitlementStore;
  catalog: CatalogClient;
  log: FastifyBaseLogger;
  clock?: () => Date;
};

const DAY_MS = 24 * 60 * 60 * 1000;

export function expiryFor(policy: DownloadExpiryPolicy, fulfilledAt: Date): Date | null {
  switch (policy.kind) {
    case 'never':
      return null;
    case 'days_after_fulfillment':
      return new Date(fulfilledAt.getTime() + policy.days * DAY_MS);
    case 'fixed':
      return new Date(policy.expiresAt.getTime());
  }
}

/** `LIC-<8 upper hex>-<productId>`; only ever stored by the insert that creates the entitlement. */
export function makeLicenseKey(productId: string): string {
  return `LIC-${crypto.randomBytes(4).toString('hex').toUpperCase()}-${productId}`;
}

export class FulfillmentProcessor {
  private readonly clock: () => Date;

  constructor(private readonly deps: FulfillmentProcessorDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Applies one payment confirmation. Safe to call any number of times for the
   * same confirmation: the first call transitions the order, later calls
   * complete whatever entitlements are still missing and otherwise no-op.
   */
  async handlePaymentConfirmation(confirmation: PaymentConfirmation): Promise<FulfillmentResult> {
    const { orderId, paymentRef, outcome, sequence } = confirmation;
    const log = this.deps.log.child({ orderId, paymentRef });

    // Surfaces UnknownOrder before any side effect.
    await this.deps.ledger.getOrder(orderId);

    if (outcome === 'failed') {
      const { order, transitioned } = await this.deps.ledger.markFailed(orderId, paymentRef, sequence);
      log.info({ status: order.status, transitioned }, 'payment failure applied');
      return { orderId, status: order.status, transitioned, entitlementsCreated: 0, entitlementIds: [] };
    }

    const { order, transitioned } = await this.deps.ledger.markPaid(orderId, paymentRef, sequence);
    if (order.status !== 'paid') {
      return { orderId, status: order.status, transitioned, entitlementsCreated: 0, entitlementIds: [] };
    }

    const { created, entitlementIds } = await this.ensureEntitlements(order);

    // A refund that landed while entitlements were being written must still win.
    const latest = await this.deps.ledger.getOrder(orderId);
    if (latest.status === 'refunded' && created > 0) {
      const revoked = await this.deps.entitlements.revokeForOrder(orderId, this.clock());
      log.warn({ revoked }, 'order refunded during fulfillment; revoked late entitlements');
    }

    log.info({ transitioned, entitlementsCreated: created }, 'order fulfilled');
    return { orderId, status: latest.status, transitioned, entitlementsCreated: created, entitlementIds };
  }

  private async ensureEntitlements(order: Order): Promise<{ created: number; entitlementIds: string[] }> {
    const existing = await this.deps.entitlements.listForOrder(order.id);
    const byLineItem = new Map(existing.map((e) => [e.lineItemId, e.id]));

    let created = 0;
    for (const lineItem of order.lineItems) {
      if (byLineItem.has(lineItem.lineItemId)) continue;
      const result = await this.materialize(order, lineItem);
      byLineItem.set(lineItem.lineItemId, result.id);
      if (result.created) created += 1;
    }

    return {
      created,
      entitlementIds: order.lineItems.flatMap((li) => {
        const id = byLineItem.get(li.lineItemId);
        return id ? [id] : [];
      }),
    };
  }

  private async materialize(order: Order, lineItem: LineItem): Promise<{ id: string; created: boolean }> {
    const product = await this.deps.catalog.resolveProduct(lineItem.productId);
    if (!product) {
      // The order was priced from this product; losing it afterwards is a catalog fault.
      throw new DomainError('CatalogUnavailable', `Product ${lineItem.productId} is no longer in the catalog`, {
        productId: lineItem.productId,
        orderId: order.id,
      });
    }

    const fulfilledAt = this.clock();
    const { entitlement, created } = await this.deps.entitlements.insertIfAbsent(
      {
        userId: order.userId,
        productId: lineItem.productId,
        orderId: order.id,
        lineItemId: lineItem.lineItemId,
        fileBlobRef: product.fileBlobRef,
        downloadLimit: product.downloadLimit,
        expiresAt: expiryFor(product.downloadExpiryPolicy, fulfilledAt),
        // A retried insert loses to the stored row, so the first key issued sticks.
        licenseKey: product.licenseType ? makeLicenseKey(lineItem.productId) : null,
      },
      fulfilledAt,
    );
    return { id: entitlement.id, created };
  }
}
