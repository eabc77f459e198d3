import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';

import { type ClientInfo, type DownloadAuditLog, hashClientRef, normalizeUserAgent } from '../audit/downloadAuditLog.js';
import type { BlobStore } from '../collaborators/blobStore.js';
import type { DownloadOutcome, Entitlement } from '../domain/types.js';
import type { Entitlements } from '../entitlements/entitlements.js';
import { isExpired } from '../entitlements/rules.js';
import { DomainError, type DomainErrorKind, isDomainError } from '../errors.js';
import { signDownloadToken, verifyDownloadToken } from './downloadToken.js';

export type AccessGuardDeps = {
  entitlements: Entitlements;
  audit: DownloadAuditLog;
  blobs: BlobStore;
  tokenSecret: string;
  tokenTtlSec: number;
  log: FastifyBaseLogger;
  clock?: () => Date;
};

export type IssuedToken = {
  token: string;
  expiresAt: Date;
  singleUse: boolean;
};

export type Redemption = {
  downloadUrl: string;
  expiresInSec: number;
  entitlement: Entitlement;
};

const DENIALS: Partial<Record<DomainErrorKind, { outcome: DownloadOutcome; reason: string }>> = {
  EntitlementRevoked: { outcome: 'denied_revoked', reason: 'revoked' },
  EntitlementExpired: { outcome: 'denied_expired', reason: 'expired' },
  EntitlementExhausted: { outcome: 'denied_exhausted', reason: 'exhausted' },
  NotEntitled: { outcome: 'denied_token_invalid', reason: 'not_found' },
};

export class DownloadAccessGuard {
  private readonly clock: () => Date;

  constructor(private readonly deps: AccessGuardDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Signs a short-lived token for an entitlement the user owns. Spends no quota. */
  async issueToken(userId: string, entitlementId: string, opts: { singleUse?: boolean } = {}): Promise<IssuedToken> {
    const now = this.clock();
    const entitlement = await this.deps.entitlements.findById(entitlementId);
    if (!entitlement || entitlement.userId !== userId || entitlement.status !== 'active' || isExpired(entitlement, now)) {
      throw new DomainError('NotEntitled', 'No usable entitlement for this user', { entitlementId, userId });
    }

    const singleUse = opts.singleUse ?? false;
    const iat = Math.floor(now.getTime() / 1000);
    const exp = iat + this.deps.tokenTtlSec;
    const token = signDownloadToken(
      { tid: randomUUID(), eid: entitlementId, uid: userId, iat, exp, su: singleUse },
      this.deps.tokenSecret,
    );

    return { token, expiresAt: new Date(exp * 1000), singleUse };
  }

  async redeem(token: string, client: ClientInfo = {}): Promise<Redemption> {
    const now = this.clock();
    const context = {
      occurredAt: now,
      clientRef: hashClientRef(client.ip),
      userAgent: normalizeUserAgent(client.userAgent),
    };

    const verified = verifyDownloadToken(token, this.deps.tokenSecret, now);
    if (verified.kind !== 'ok') {
      const claims = verified.kind === 'expired' ? verified.claims : null;
      await this.deps.audit.append({
        ...context,
        entitlementId: claims?.eid ?? null,
        tokenId: claims?.tid ?? null,
        outcome: 'denied_token_invalid',
        reason: verified.kind,
      });
      throw new DomainError('DownloadTokenInvalid', 'Download token is invalid or expired', { reason: verified.kind });
    }

    const { eid: entitlementId, tid: tokenId } = verified.claims;

    if (verified.claims.su) {
      const claimed = await this.deps.audit.claimSingleUseToken(tokenId, entitlementId, now);
      if (!claimed) {
        await this.deps.audit.append({
          ...context,
          entitlementId,
          tokenId,
          outcome: 'denied_token_invalid',
          reason: 'replayed',
        });
        throw new DomainError('DownloadTokenInvalid', 'Download token was already used', { reason: 'replayed' });
      }
    }

    let entitlement: Entitlement;
    try {
      entitlement = await this.deps.entitlements.consume(entitlementId, now);
    } catch (e) {
      const denial = isDomainError(e) ? DENIALS[e.kind] : undefined;
      if (denial) {
        await this.deps.audit.append({ ...context, entitlementId, tokenId, ...denial });
        this.deps.log.info({ entitlementId, outcome: denial.outcome }, 'download denied');
      }
      throw e;
    }

    await this.deps.audit.append({ ...context, entitlementId, tokenId, outcome: 'granted', reason: null });

    // Quota is already spent here; the blob call runs without holding anything.
    const access = await this.deps.blobs.getTemporaryAccessUrl(entitlement.fileBlobRef);
    this.deps.log.info({ entitlementId, downloadsConsumed: entitlement.downloadsConsumed }, 'download granted');

    return { downloadUrl: access.url, expiresInSec: access.expiresInSec, entitlement };
  }
}
