import { describe, expect, it } from 'vitest';

import { buildApp } from './app.js';
import { signPaymentWebhook } from './routes/paymentWebhooks.js';
import { buildTestApp, createTestWorld, product, testConfig, TEST_WEBHOOK_SECRET } from './testing/harness.js';

describe('app', () => {
  it('GET /health returns ok', async () => {
    const app = await buildApp({ logger: false, config: testConfig() });
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toContain('application/json');
    expect(res.json()).toEqual({ ok: true });
    await app.close();
  });

  it('routes download tokens longer than the default parameter limit', async () => {
    const app = await buildTestApp(createTestWorld());

    const res = await app.inject({ method: 'GET', url: `/downloads/v1.${'a'.repeat(600)}.${'0'.repeat(64)}` });

    expect(res.statusCode).toBe(401);
    expect(res.json().kind).toBe('DownloadTokenInvalid');
    await app.close();
  });

  it('takes checkout through payment to two downloads', async () => {
    const world = createTestWorld([
      product({ productId: 'ebook-1', price: 1200, downloadLimit: 1 }),
      product({ productId: 'album-1', price: 800 }),
    ]);
    const buyer = world.addBuyer();
    const app = await buildTestApp(world);
    const headers = { authorization: buyer.authorization };

    const created = await app.inject({
      method: 'POST',
      url: '/orders',
      headers,
      payload: { lineItems: [{ productId: 'ebook-1' }, { productId: 'album-1' }] },
    });
    expect(created.statusCode).toBe(201);
    const order = created.json().order;
    expect(order).toMatchObject({ status: 'pending_payment', total: 2000, currency: 'USD' });

    const confirmation = { orderId: order.id, paymentRef: 'pay_e2e', outcome: 'succeeded' as const };
    const webhook = () =>
      app.inject({
        method: 'POST',
        url: '/webhooks/payments',
        headers: { 'x-payment-signature': signPaymentWebhook(TEST_WEBHOOK_SECRET, confirmation) },
        payload: confirmation,
      });

    const paid = await webhook();
    const duplicate = await webhook();
    expect(paid.json()).toMatchObject({ ok: true, status: 'paid', transitioned: true, entitlementsCreated: 2 });
    expect(duplicate.json()).toMatchObject({ ok: true, status: 'paid', transitioned: false, entitlementsCreated: 0 });

    const detail = await app.inject({ method: 'GET', url: `/orders/${order.id}`, headers });
    const entitlementIds: string[] = detail.json().entitlementIds;
    expect(detail.json().order.status).toBe('paid');
    expect(entitlementIds).toHaveLength(2);

    const urls: string[] = [];
    for (const entitlementId of entitlementIds) {
      const issued = await app.inject({ method: 'POST', url: `/entitlements/${entitlementId}/download-token`, headers });
      const download = await app.inject({ method: 'GET', url: issued.json().downloadPath });
      expect(download.statusCode).toBe(200);
      urls.push(download.json().downloadUrl);
    }

    expect(urls.sort()).toEqual([
      'https://blobs.test/products/album-1/file.zip?sig=fake',
      'https://blobs.test/products/ebook-1/file.zip?sig=fake',
    ]);
    expect(world.blobs.requested).toHaveLength(2);
    await app.close();
  });
});
