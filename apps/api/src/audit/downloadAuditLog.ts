import { createHash } from 'node:crypto';

import type { DownloadEvent, NewDownloadEvent } from '../domain/types.js';
import { DomainError, errorMessage } from '../errors.js';
import type { DownloadAuditStore } from '../store/types.js';

const USER_AGENT_MAX = 512;

export type ClientInfo = {
  ip?: string | null;
  userAgent?: string | null;
};

// Raw client addresses are never stored.
export function hashClientRef(ip: string | null | undefined): string | null {
  const trimmed = ip?.trim();
  if (!trimmed) return null;
  return createHash('sha256').update(trimmed).digest('hex');
}

export function normalizeUserAgent(userAgent: string | null | undefined): string | null {
  const trimmed = userAgent?.trim();
  if (!trimmed) return null;
  return trimmed.slice(0, USER_AGENT_MAX);
}

function unavailable(op: string, cause: unknown): DomainError {
  return new DomainError('AuditLogUnavailable', `download audit log ${op} failed: ${errorMessage(cause)}`, { op }, { cause });
}

/** Append-only record of every redemption attempt. */
export class DownloadAuditLog {
  constructor(private readonly store: DownloadAuditStore) {}

  async append(event: NewDownloadEvent): Promise<DownloadEvent> {
    try {
      return await this.store.append(event);
    } catch (e) {
      throw unavailable('append', e);
    }
  }

  async listForEntitlement(entitlementId: string): Promise<DownloadEvent[]> {
    try {
      return await this.store.listForEntitlement(entitlementId);
    } catch (e) {
      throw unavailable('read', e);
    }
  }

  async countDenialsSince(entitlementId: string, since: Date): Promise<number> {
    try {
      return await this.store.countDenialsSince(entitlementId, since);
    } catch (e) {
      throw unavailable('read', e);
    }
  }

  async claimSingleUseToken(tokenId: string, entitlementId: string, at: Date): Promise<boolean> {
    try {
      return await this.store.claimSingleUseToken(tokenId, entitlementId, at);
    } catch (e) {
      throw unavailable('claim', e);
    }
  }
}
