import type { Db } from '../../db.js';
import { lineItemsSchema, orderStatusSchema, type Order } from '../../domain/types.js';
import type { OrderStore, OrderTransition } from '../types.js';

type OrderRow = {
  id: string;
  order_number: string;
  user_id: string;
  line_items: unknown;
  currency: string;
  total: number;
  status: string;
  payment_ref: string | null;
  payment_sequence: string | null;
  created_at: Date;
  updated_at: Date;
  paid_at: Date | null;
  failed_at: Date | null;
  refunded_at: Date | null;
};

function mapOrderRow(row: OrderRow): Order {
  return {
    id: row.id,
    orderNumber: row.order_number,
    userId: row.user_id,
    lineItems: lineItemsSchema.parse(row.line_items),
    currency: row.currency,
    total: row.total,
    status: orderStatusSchema.parse(row.status),
    paymentRef: row.payment_ref,
    // bigint columns come back as strings from pg.
    paymentSequence: row.payment_sequence === null ? null : Number(row.payment_sequence),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    paidAt: row.paid_at,
    failedAt: row.failed_at,
    refundedAt: row.refunded_at,
  };
}

export class PgOrderStore implements OrderStore {
  constructor(private readonly db: Db) {}

  async insert(order: Order): Promise<Order> {
    const res = await this.db.query<OrderRow>(
      `INSERT INTO orders (id, order_number, user_id, line_items, currency, total, status, payment_ref,
         payment_sequence, created_at, updated_at)
       VALUES ($1, $2, $3, $4::jsonb, $5, $6, $7, $8, $9, $10, $11)
       RETURNING *`,
      [
        order.id,
        order.orderNumber,
        order.userId,
        JSON.stringify(order.lineItems),
        order.currency,
        order.total,
        order.status,
        order.paymentRef,
        order.paymentSequence,
        order.createdAt,
        order.updatedAt,
      ],
    );
    return mapOrderRow(res.rows[0]);
  }

  async findById(orderId: string): Promise<Order | null> {
    const res = await this.db.query<OrderRow>('SELECT * FROM orders WHERE id = $1', [orderId]);
    return res.rows[0] ? mapOrderRow(res.rows[0]) : null;
  }

  async listForUser(userId: string): Promise<Order[]> {
    const res = await this.db.query<OrderRow>('SELECT * FROM orders WHERE user_id = $1 ORDER BY created_at DESC', [
      userId,
    ]);
    return res.rows.map(mapOrderRow);
  }

  async transition(args: OrderTransition): Promise<Order | null> {
    const res = await this.db.query<OrderRow>(
      `UPDATE orders
          SET status = $3::text,
              updated_at = $4,
              payment_ref = COALESCE($5, payment_ref),
              payment_sequence = COALESCE($6::bigint, payment_sequence),
              paid_at = CASE WHEN $3::text = 'paid' THEN $4 ELSE paid_at END,
              failed_at = CASE WHEN $3::text = 'failed' THEN $4 ELSE failed_at END,
              refunded_at = CASE WHEN $3::text = 'refunded' THEN $4 ELSE refunded_at END
        WHERE id = $1 AND status = $2
        RETURNING *`,
      [args.orderId, args.from, args.to, args.at, args.paymentRef ?? null, args.paymentSequence ?? null],
    );
    return res.rows[0] ? mapOrderRow(res.rows[0]) : null;
  }
}
