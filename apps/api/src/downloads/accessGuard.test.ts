import { createHash } from 'node:crypto';
import { describe, expect, it, vi } from 'vitest';

import { createTestWorld, product } from '../testing/harness.js';

const CLIENT = { ip: '203.0.113.7', userAgent: 'test-agent/1.0' };

async function setup() {
  const world = createTestWorld([
    product({ productId: 'ebook-1', downloadLimit: 2 }),
    product({
      productId: 'webinar-1',
      downloadLimit: 5,
      downloadExpiryPolicy: { kind: 'fixed', expiresAt: new Date('2026-01-01T00:01:00.000Z') },
    }),
  ]);
  const buyer = world.addBuyer();
  const { order, entitlementIds } = await world.buy(buyer.user.id, ['ebook-1']);
  return { ...world, userId: buyer.user.id, order, entitlementId: entitlementIds[0] };
}

describe('DownloadAccessGuard.issueToken', () => {
  it('issues a short-lived token without spending quota', async () => {
    const { services, stores, userId, entitlementId, clock } = await setup();

    const issued = await services.guard.issueToken(userId, entitlementId);

    expect(issued.singleUse).toBe(false);
    expect(issued.expiresAt).toEqual(new Date(clock.now.getTime() + 300_000));
    expect(issued.token).toMatch(/^v1\.[A-Za-z0-9_-]+\.[0-9a-f]{64}$/);
    await expect(stores.entitlements.findById(entitlementId)).resolves.toMatchObject({ downloadsConsumed: 0 });
  });

  it('refuses entitlements the caller cannot use', async () => {
    const { services, userId, entitlementId, addBuyer, clock } = await setup();
    const stranger = addBuyer();

    await expect(services.guard.issueToken(stranger.user.id, entitlementId)).rejects.toMatchObject({ kind: 'NotEntitled' });
    await expect(services.guard.issueToken(userId, '00000000-0000-4000-8000-000000000000')).rejects.toMatchObject({
      kind: 'NotEntitled',
    });

    await services.entitlements.revoke(entitlementId, clock.now);
    await expect(services.guard.issueToken(userId, entitlementId)).rejects.toMatchObject({ kind: 'NotEntitled' });
  });
});

describe('DownloadAccessGuard.redeem', () => {
  it('spends one unit, logs the grant and returns a temporary URL', async () => {
    const { services, blobs, userId, entitlementId, clock } = await setup();
    const { token } = await services.guard.issueToken(userId, entitlementId);

    const redemption = await services.guard.redeem(token, CLIENT);

    expect(redemption.downloadUrl).toBe('https://blobs.test/products/ebook-1/file.zip?sig=fake');
    expect(redemption.expiresInSec).toBe(900);
    expect(redemption.entitlement).toMatchObject({ downloadsConsumed: 1, status: 'active', lastAccessedAt: clock.now });
    expect(blobs.requested).toEqual(['products/ebook-1/file.zip']);

    const events = await services.audit.listForEntitlement(entitlementId);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      entitlementId,
      outcome: 'granted',
      occurredAt: clock.now,
      clientRef: createHash('sha256').update('203.0.113.7').digest('hex'),
      userAgent: 'test-agent/1.0',
      reason: null,
    });
  });

  it('grants exactly the remaining quota under concurrent redemption', async () => {
    const { services, userId, entitlementId } = await setup();
    const tokens = await Promise.all(
      Array.from({ length: 6 }, () => services.guard.issueToken(userId, entitlementId).then((t) => t.token)),
    );

    const results = await Promise.allSettled(tokens.map((token) => services.guard.redeem(token, CLIENT)));

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(2);
    const events = await services.audit.listForEntitlement(entitlementId);
    expect(events.filter((e) => e.outcome === 'granted')).toHaveLength(2);
    expect(events.filter((e) => e.outcome === 'denied_exhausted')).toHaveLength(4);
  });

  it('denies an exhausted entitlement and logs it', async () => {
    const { services, userId, entitlementId } = await setup();
    const tokens: string[] = [];
    for (let i = 0; i < 3; i++) tokens.push((await services.guard.issueToken(userId, entitlementId)).token);

    await services.guard.redeem(tokens[0], CLIENT);
    await services.guard.redeem(tokens[1], CLIENT);

    await expect(services.guard.redeem(tokens[2], CLIENT)).rejects.toMatchObject({ kind: 'EntitlementExhausted' });
    const events = await services.audit.listForEntitlement(entitlementId);
    expect(events.map((e) => e.outcome)).toEqual(['granted', 'granted', 'denied_exhausted']);
    // Exhausted entitlements no longer get tokens at all.
    await expect(services.guard.issueToken(userId, entitlementId)).rejects.toMatchObject({ kind: 'NotEntitled' });
  });

  it('denies an expired entitlement even with quota left', async () => {
    const { services, userId, clock, buy } = await setup();
    const { entitlementIds } = await buy(userId, ['webinar-1']);
    const { token } = await services.guard.issueToken(userId, entitlementIds[0]);

    clock.advance(120_000);

    await expect(services.guard.redeem(token, CLIENT)).rejects.toMatchObject({ kind: 'EntitlementExpired' });
    const events = await services.audit.listForEntitlement(entitlementIds[0]);
    expect(events.map((e) => [e.outcome, e.reason])).toEqual([['denied_expired', 'expired']]);
  });

  it('denies downloads after a refund and logs the revocation', async () => {
    const { services, userId, entitlementId, order } = await setup();
    const { token } = await services.guard.issueToken(userId, entitlementId);

    await services.ledger.refund(order.id);

    await expect(services.guard.redeem(token, CLIENT)).rejects.toMatchObject({ kind: 'EntitlementRevoked' });
    const events = await services.audit.listForEntitlement(entitlementId);
    expect(events.map((e) => e.outcome)).toEqual(['denied_revoked']);
  });

  it('rejects an expired token and attributes the denial to its entitlement', async () => {
    const { services, userId, entitlementId, clock, stores } = await setup();
    const { token } = await services.guard.issueToken(userId, entitlementId);

    clock.advance(300_000);

    await expect(services.guard.redeem(token, CLIENT)).rejects.toMatchObject({
      kind: 'DownloadTokenInvalid',
      details: { reason: 'expired' },
    });
    await expect(stores.entitlements.findById(entitlementId)).resolves.toMatchObject({ downloadsConsumed: 0 });
    const events = await services.audit.listForEntitlement(entitlementId);
    expect(events.map((e) => [e.outcome, e.reason])).toEqual([['denied_token_invalid', 'expired']]);
  });

  it('logs forged tokens without an entitlement', async () => {
    const { services } = await setup();
    const appendSpy = vi.spyOn(services.audit, 'append');

    await expect(services.guard.redeem('v1.e30.' + '0'.repeat(64), CLIENT)).rejects.toMatchObject({
      kind: 'DownloadTokenInvalid',
    });
    expect(appendSpy).toHaveBeenCalledWith(
      expect.objectContaining({
        entitlementId: null,
        tokenId: null,
        outcome: 'denied_token_invalid',
        reason: 'bad_signature',
      }),
    );
  });

  it('honours a single-use token once', async () => {
    const { services, stores, userId, entitlementId } = await setup();
    const { token, singleUse } = await services.guard.issueToken(userId, entitlementId, { singleUse: true });
    expect(singleUse).toBe(true);

    const results = await Promise.allSettled([services.guard.redeem(token, CLIENT), services.guard.redeem(token, CLIENT)]);

    expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected']);
    await expect(stores.entitlements.findById(entitlementId)).resolves.toMatchObject({ downloadsConsumed: 1 });
    const events = await services.audit.listForEntitlement(entitlementId);
    expect(events.map((e) => [e.outcome, e.reason]).sort()).toEqual([
      ['denied_token_invalid', 'replayed'],
      ['granted', null],
    ]);
  });

  it('keeps the grant when the blob store fails afterwards', async () => {
    const { services, blobs, stores, userId, entitlementId } = await setup();
    const { token } = await services.guard.issueToken(userId, entitlementId);
    blobs.unavailable = true;

    await expect(services.guard.redeem(token, CLIENT)).rejects.toMatchObject({ kind: 'BlobStoreUnavailable' });
    await expect(stores.entitlements.findById(entitlementId)).resolves.toMatchObject({ downloadsConsumed: 1 });
  });

  it('fails closed when the audit log cannot be written', async () => {
    const { services, stores, userId, entitlementId } = await setup();
    const { token } = await services.guard.issueToken(userId, entitlementId);
    vi.spyOn(stores.audit, 'append').mockRejectedValue(new Error('disk full'));

    await expect(services.guard.redeem(token, CLIENT)).rejects.toMatchObject({ kind: 'AuditLogUnavailable' });
  });
});

describe('two-item orders', () => {
  async function twoItemOrder() {
    const world = createTestWorld([
      product({ productId: 'ebook-1', downloadLimit: 3 }),
      product({ productId: 'album-1', downloadLimit: 3 }),
    ]);
    const buyer = world.addBuyer();
    const { order, entitlementIds } = await world.buy(buyer.user.id, ['ebook-1', 'album-1']);
    const [ebookId, albumId] = entitlementIds;
    return { ...world, userId: buyer.user.id, order, ebookId, albumId };
  }

  it('exhausts one item after its limit without touching the other', async () => {
    const { services, stores, userId, ebookId, albumId } = await twoItemOrder();
    const tokens: string[] = [];
    for (let i = 0; i < 4; i++) tokens.push((await services.guard.issueToken(userId, ebookId)).token);

    for (const token of tokens.slice(0, 3)) await services.guard.redeem(token, CLIENT);
    await expect(services.guard.redeem(tokens[3], CLIENT)).rejects.toMatchObject({ kind: 'EntitlementExhausted' });

    await expect(stores.entitlements.findById(ebookId)).resolves.toMatchObject({
      downloadsConsumed: 3,
      status: 'exhausted',
    });
    await expect(stores.entitlements.findById(albumId)).resolves.toMatchObject({ downloadsConsumed: 0, status: 'active' });
    const events = await services.audit.listForEntitlement(ebookId);
    expect(events.map((e) => e.outcome)).toEqual(['granted', 'granted', 'granted', 'denied_exhausted']);
  });

  it('revokes every item on refund and logs later attempts as revoked', async () => {
    const { services, stores, userId, order, ebookId, albumId } = await twoItemOrder();
    const ebookToken = (await services.guard.issueToken(userId, ebookId)).token;
    const albumToken = (await services.guard.issueToken(userId, albumId)).token;

    const refund = await services.ledger.refund(order.id);

    expect(refund.entitlementsRevoked).toBe(2);
    for (const [id, token] of [
      [ebookId, ebookToken],
      [albumId, albumToken],
    ]) {
      await expect(stores.entitlements.findById(id)).resolves.toMatchObject({ status: 'revoked' });
      await expect(services.guard.redeem(token, CLIENT)).rejects.toMatchObject({ kind: 'EntitlementRevoked' });
      const events = await services.audit.listForEntitlement(id);
      expect(events.map((e) => e.outcome)).toEqual(['denied_revoked']);
    }
  });
});
