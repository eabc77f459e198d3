import { randomUUID } from 'node:crypto';

import type { Db } from '../../db.js';
import { entitlementStatusSchema, type Entitlement, type NewEntitlement } from '../../domain/types.js';
import { consumeDenial } from '../../entitlements/rules.js';
import type { ConsumeResult, EntitlementStore } from '../types.js';

type EntitlementRow = {
  id: string;
  user_id: string;
  product_id: string;
  order_id: string;
  line_item_id: string;
  file_blob_ref: string;
  license_key: string | null;
  download_limit: number | null;
  downloads_consumed: number;
  expires_at: Date | null;
  status: string;
  last_accessed_at: Date | null;
  created_at: Date;
  revoked_at: Date | null;
};

function mapEntitlementRow(row: EntitlementRow): Entitlement {
  return {
    id: row.id,
    userId: row.user_id,
    productId: row.product_id,
    orderId: row.order_id,
    lineItemId: row.line_item_id,
    fileBlobRef: row.file_blob_ref,
    licenseKey: row.license_key,
    downloadLimit: row.download_limit,
    downloadsConsumed: row.downloads_consumed,
    expiresAt: row.expires_at,
    status: entitlementStatusSchema.parse(row.status),
    lastAccessedAt: row.last_accessed_at,
    createdAt: row.created_at,
    revokedAt: row.revoked_at,
  };
}

export class PgEntitlementStore implements EntitlementStore {
  constructor(private readonly db: Db) {}

  async insertIfAbsent(input: NewEntitlement, at: Date): Promise<{ entitlement: Entitlement; created: boolean }> {
    const inserted = await this.db.query<EntitlementRow>(
      `INSERT INTO entitlements (id, user_id, product_id, order_id, line_item_id, file_blob_ref, license_key,
         download_limit, downloads_consumed, expires_at, status, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, 0, $9, 'active', $10)
       ON CONFLICT (order_id, line_item_id) DO NOTHING
       RETURNING *`,
      [
        randomUUID(),
        input.userId,
        input.productId,
        input.orderId,
        input.lineItemId,
        input.fileBlobRef,
        input.licenseKey ?? null,
        input.downloadLimit,
        input.expiresAt,
        at,
      ],
    );
    if (inserted.rows[0]) {
      return { entitlement: mapEntitlementRow(inserted.rows[0]), created: true };
    }

    const existing = await this.db.query<EntitlementRow>(
      'SELECT * FROM entitlements WHERE order_id = $1 AND line_item_id = $2',
      [input.orderId, input.lineItemId],
    );
    if (!existing.rows[0]) {
      throw new Error(`entitlement insert for ${input.orderId}/${input.lineItemId} conflicted but no row found`);
    }
    return { entitlement: mapEntitlementRow(existing.rows[0]), created: false };
  }

  async findById(entitlementId: string): Promise<Entitlement | null> {
    const res = await this.db.query<EntitlementRow>('SELECT * FROM entitlements WHERE id = $1', [entitlementId]);
    return res.rows[0] ? mapEntitlementRow(res.rows[0]) : null;
  }

  async findForUserProduct(userId: string, productId: string): Promise<Entitlement | null> {
    const res = await this.db.query<EntitlementRow>(
      `SELECT * FROM entitlements
        WHERE user_id = $1 AND product_id = $2
        ORDER BY (status = 'active') DESC, created_at DESC
        LIMIT 1`,
      [userId, productId],
    );
    return res.rows[0] ? mapEntitlementRow(res.rows[0]) : null;
  }

  async listForUser(userId: string): Promise<Entitlement[]> {
    const res = await this.db.query<EntitlementRow>(
      'SELECT * FROM entitlements WHERE user_id = $1 ORDER BY created_at DESC',
      [userId],
    );
    return res.rows.map(mapEntitlementRow);
  }

  async listForOrder(orderId: string): Promise<Entitlement[]> {
    const res = await this.db.query<EntitlementRow>(
      'SELECT * FROM entitlements WHERE order_id = $1 ORDER BY created_at ASC',
      [orderId],
    );
    return res.rows.map(mapEntitlementRow);
  }

  async consume(entitlementId: string, now: Date): Promise<ConsumeResult> {
    // Check and increment in one statement; the row lock serializes concurrent redemptions.
    const updated = await this.db.query<EntitlementRow>(
      `UPDATE entitlements
          SET downloads_consumed = downloads_consumed + 1,
              last_accessed_at = $2,
              status = CASE
                WHEN download_limit IS NOT NULL AND downloads_consumed + 1 >= download_limit THEN 'exhausted'
                ELSE 'active'
              END
        WHERE id = $1
          AND status = 'active'
          AND (download_limit IS NULL OR downloads_consumed < download_limit)
          AND (expires_at IS NULL OR expires_at > $2)
        RETURNING *`,
      [entitlementId, now],
    );
    if (updated.rows[0]) {
      return { kind: 'ok', entitlement: mapEntitlementRow(updated.rows[0]) };
    }

    const current = await this.findById(entitlementId);
    if (!current) return { kind: 'not_found' };

    // The update matched nothing, so a denial must apply; exhausted is the only remaining case.
    return { kind: consumeDenial(current, now) ?? 'exhausted', entitlement: current };
  }

  async revoke(entitlementId: string, at: Date): Promise<Entitlement | null> {
    const res = await this.db.query<EntitlementRow>(
      `UPDATE entitlements
          SET status = 'revoked', revoked_at = COALESCE(revoked_at, $2)
        WHERE id = $1
        RETURNING *`,
      [entitlementId, at],
    );
    return res.rows[0] ? mapEntitlementRow(res.rows[0]) : null;
  }

  async revokeForOrder(orderId: string, at: Date): Promise<number> {
    const res = await this.db.query(
      `UPDATE entitlements SET status = 'revoked', revoked_at = $2 WHERE order_id = $1 AND status <> 'revoked'`,
      [orderId, at],
    );
    return res.rowCount ?? 0;
  }
}
