import { randomBytes, randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';

import type { CatalogClient, CatalogProduct } from '../collaborators/catalog.js';
import type { LineItem, Order } from '../domain/types.js';
import { DomainError } from '../errors.js';
import type { EntitlementStore, OrderStore } from '../store/types.js';

export type OrderLedgerDeps = {
  orders: OrderStore;
  entitlements: EntitlementStore;
  catalog: CatalogClient;
  log: FastifyBaseLogger;
  clock?: () => Date;
};

export type RequestedLineItem = { productId: string };

export type SettleResult = {
  order: Order;
  /** false when the call was a replay against an already-settled order. */
  transitioned: boolean;
};

export type RefundResult = SettleResult & { entitlementsRevoked: number };

function makeOrderNumber(): string {
  return `ORD-${randomBytes(4).toString('hex').toUpperCase()}`;
}

function invalidLineItem(productId: string, reason: string): DomainError {
  return new DomainError('InvalidLineItem', `Line item for product ${productId} is invalid: ${reason}`, {
    productId,
    reason,
  });
}

function priceLineItems(requested: RequestedLineItem[], products: (CatalogProduct | null)[]): LineItem[] {
  const lineItems = requested.map((item, index): LineItem => {
    const product = products[index];
    if (!product) throw invalidLineItem(item.productId, 'unknown_product');
    if (!product.available) throw invalidLineItem(item.productId, 'unavailable');
    if (!Number.isInteger(product.price) || product.price <= 0) {
      throw invalidLineItem(item.productId, 'unresolvable_price');
    }
    return {
      lineItemId: `li-${index + 1}`,
      productId: item.productId,
      productName: product.name,
      unitPrice: product.price,
      currency: product.currency,
    };
  });

  const currency = lineItems[0]?.currency;
  const mixed = lineItems.find((li) => li.currency !== currency);
  if (mixed) throw invalidLineItem(mixed.productId, 'mixed_currency');

  return lineItems;
}

/**
 * Order state machine:
 *
 *   pending_payment → paid | failed
 *   paid → refunded
 *
 * Every transition is a conditional update against the expected source state,
 * so concurrent duplicate deliveries resolve to one winner and replays.
 */
export class OrderLedger {
  private readonly clock: () => Date;

  constructor(private readonly deps: OrderLedgerDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async createOrder(userId: string, requested: RequestedLineItem[]): Promise<Order> {
    if (requested.length === 0) {
      throw new DomainError('InvalidLineItem', 'An order needs at least one line item', { reason: 'empty_order' });
    }

    const seen = new Set<string>();
    for (const item of requested) {
      if (seen.has(item.productId)) throw invalidLineItem(item.productId, 'duplicate_product');
      seen.add(item.productId);
    }

    // Prices are resolved now and frozen into the order.
    const products = await Promise.all(requested.map((item) => this.deps.catalog.resolveProduct(item.productId)));
    const lineItems = priceLineItems(requested, products);

    const now = this.clock();
    const order = await this.deps.orders.insert({
      id: randomUUID(),
      orderNumber: makeOrderNumber(),
      userId,
      lineItems,
      currency: lineItems[0].currency,
      total: lineItems.reduce((sum, li) => sum + li.unitPrice, 0),
      status: 'pending_payment',
      paymentRef: null,
      paymentSequence: null,
      createdAt: now,
      updatedAt: now,
      paidAt: null,
      failedAt: null,
      refundedAt: null,
    });

    this.deps.log.info(
      { orderId: order.id, orderNumber: order.orderNumber, userId, total: order.total, currency: order.currency },
      'order created',
    );
    return order;
  }

  async getOrder(orderId: string): Promise<Order> {
    const order = await this.deps.orders.findById(orderId);
    if (!order) throw new DomainError('UnknownOrder', `Order ${orderId} not found`, { orderId });
    return order;
  }

  listOrdersForUser(userId: string): Promise<Order[]> {
    return this.deps.orders.listForUser(userId);
  }

  markPaid(orderId: string, paymentRef: string, sequence?: number): Promise<SettleResult> {
    return this.settle(orderId, paymentRef, 'paid', sequence);
  }

  markFailed(orderId: string, paymentRef: string, sequence?: number): Promise<SettleResult> {
    return this.settle(orderId, paymentRef, 'failed', sequence);
  }

  async refund(orderId: string): Promise<RefundResult> {
    const at = this.clock();
    const refunded = await this.deps.orders.transition({ orderId, from: 'paid', to: 'refunded', at });

    let order = refunded;
    if (!order) {
      const current = await this.getOrder(orderId);
      if (current.status !== 'refunded') {
        throw new DomainError('InvalidTransition', `Cannot refund an order in ${current.status}`, {
          orderId,
          from: current.status,
          to: 'refunded',
        });
      }
      // Replay: finish revocation in case an earlier attempt stopped after the transition.
      order = current;
    }

    const entitlementsRevoked = await this.deps.entitlements.revokeForOrder(orderId, at);
    this.deps.log.info({ orderId, entitlementsRevoked, replay: !refunded }, 'order refunded');

    return { order, transitioned: Boolean(refunded), entitlementsRevoked };
  }

  private async settle(
    orderId: string,
    paymentRef: string,
    to: 'paid' | 'failed',
    sequence: number | undefined,
  ): Promise<SettleResult> {
    const updated = await this.deps.orders.transition({
      orderId,
      from: 'pending_payment',
      to,
      paymentRef,
      paymentSequence: sequence ?? null,
      at: this.clock(),
    });
    if (updated) {
      this.deps.log.info({ orderId, paymentRef, sequence, status: to }, 'order settled');
      return { order: updated, transitioned: true };
    }

    const current = await this.getOrder(orderId);

    if (current.status === 'pending_payment') {
      // Lost a race with nothing; pending_payment is never re-entered, so this terminates.
      return this.settle(orderId, paymentRef, to, sequence);
    }

    if (current.paymentRef === paymentRef) {
      if (current.status !== to) {
        this.deps.log.warn(
          { orderId, paymentRef, requested: to, status: current.status },
          'payment replay disagrees with settled status; keeping settled status',
        );
      }
      return { order: current, transitioned: false };
    }

    if (current.status === 'paid' || current.status === 'refunded') {
      this.deps.log.error(
        { orderId, paymentRef, existingPaymentRef: current.paymentRef },
        'conflicting payment reference for settled order',
      );
      throw new DomainError('ConflictingPaymentReference', `Order ${orderId} was already paid under another reference`, {
        orderId,
        paymentRef,
      });
    }

    throw new DomainError('InvalidTransition', `Cannot move order from ${current.status} to ${to}`, {
      orderId,
      from: current.status,
      to,
    });
  }
}
