import type { Entitlement } from '../domain/types.js';

export type ConsumeDenial = 'revoked' | 'expired' | 'exhausted';

// Expiry outranks quota: an expired entitlement reports expired even with units left.
export function consumeDenial(e: Entitlement, now: Date): ConsumeDenial | null {
  if (e.status === 'revoked') return 'revoked';
  if (isExpired(e, now)) return 'expired';
  if (e.status === 'exhausted' || !hasQuotaLeft(e)) return 'exhausted';
  return null;
}

export function isExpired(e: Pick<Entitlement, 'expiresAt'>, now: Date): boolean {
  return e.expiresAt !== null && now.getTime() >= e.expiresAt.getTime();
}

export function hasQuotaLeft(e: Pick<Entitlement, 'downloadLimit' | 'downloadsConsumed'>): boolean {
  return e.downloadLimit === null || e.downloadsConsumed < e.downloadLimit;
}

export function remainingDownloads(e: Pick<Entitlement, 'downloadLimit' | 'downloadsConsumed'>): number | 'unlimited' {
  if (e.downloadLimit === null) return 'unlimited';
  return Math.max(0, e.downloadLimit - e.downloadsConsumed);
}
