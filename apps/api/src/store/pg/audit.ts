import { randomUUID } from 'node:crypto';

import type { Db } from '../../db.js';
import { downloadOutcomeSchema, type DownloadEvent, type NewDownloadEvent } from '../../domain/types.js';
import type { DownloadAuditStore } from '../types.js';

type DownloadEventRow = {
  id: string;
  entitlement_id: string | null;
  occurred_at: Date;
  outcome: string;
  client_ref: string | null;
  user_agent: string | null;
  token_id: string | null;
  reason: string | null;
};

function mapEventRow(row: DownloadEventRow): DownloadEvent {
  return {
    id: row.id,
    entitlementId: row.entitlement_id,
    occurredAt: row.occurred_at,
    outcome: downloadOutcomeSchema.parse(row.outcome),
    clientRef: row.client_ref,
    userAgent: row.user_agent,
    tokenId: row.token_id,
    reason: row.reason,
  };
}

export class PgDownloadAuditStore implements DownloadAuditStore {
  constructor(private readonly db: Db) {}

  async append(event: NewDownloadEvent): Promise<DownloadEvent> {
    const res = await this.db.query<DownloadEventRow>(
      `INSERT INTO download_events (id, entitlement_id, occurred_at, outcome, client_ref, user_agent, token_id, reason)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING id, entitlement_id, occurred_at, outcome, client_ref, user_agent, token_id, reason`,
      [
        randomUUID(),
        event.entitlementId,
        event.occurredAt,
        event.outcome,
        event.clientRef,
        event.userAgent,
        event.tokenId,
        event.reason,
      ],
    );
    return mapEventRow(res.rows[0]);
  }

  async listForEntitlement(entitlementId: string): Promise<DownloadEvent[]> {
    const res = await this.db.query<DownloadEventRow>(
      `SELECT id, entitlement_id, occurred_at, outcome, client_ref, user_agent, token_id, reason
         FROM download_events
        WHERE entitlement_id = $1
        ORDER BY occurred_at ASC, seq ASC`,
      [entitlementId],
    );
    return res.rows.map(mapEventRow);
  }

  async countDenialsSince(entitlementId: string, since: Date): Promise<number> {
    const res = await this.db.query<{ n: number }>(
      `SELECT count(*)::int AS n
         FROM download_events
        WHERE entitlement_id = $1 AND outcome <> 'granted' AND occurred_at >= $2`,
      [entitlementId, since],
    );
    return res.rows[0]?.n ?? 0;
  }

  async claimSingleUseToken(tokenId: string, entitlementId: string, at: Date): Promise<boolean> {
    const res = await this.db.query(
      `INSERT INTO download_token_claims (token_id, entitlement_id, claimed_at)
       VALUES ($1, $2, $3)
       ON CONFLICT (token_id) DO NOTHING`,
      [tokenId, entitlementId, at],
    );
    return res.rowCount === 1;
  }
}
