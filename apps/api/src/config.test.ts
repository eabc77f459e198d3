import { describe, expect, it } from 'vitest';

import { loadConfig } from './config.js';

const base = { DOWNLOAD_TOKEN_SECRET: 'test-secret-0123456789', STORE_DRIVER: 'memory' };

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig(base)).toEqual({
      port: 8787,
      host: '127.0.0.1',
      logLevel: 'info',
      store: { driver: 'memory' },
      downloadToken: { secret: 'test-secret-0123456789', ttlSec: 300 },
      paymentWebhookSecret: null,
      opsApiToken: null,
      catalog: { baseUrl: null, fixturePath: null, timeoutMs: 2000 },
    });
  });

  it('coerces and trims values', () => {
    const config = loadConfig({
      ...base,
      PORT: '9000',
      DOWNLOAD_TOKEN_TTL_SEC: '60',
      PAYMENT_WEBHOOK_SECRET: '  test-secret  ',
      OPS_API_TOKEN: '',
      CATALOG_BASE_URL: 'http://catalog.internal:4000',
    });

    expect(config.port).toBe(9000);
    expect(config.downloadToken.ttlSec).toBe(60);
    expect(config.paymentWebhookSecret).toBe('test-secret');
    expect(config.opsApiToken).toBeNull();
    expect(config.catalog.baseUrl).toBe('http://catalog.internal:4000');
  });

  it('requires DATABASE_URL for the postgres driver', () => {
    expect(() => loadConfig({ DOWNLOAD_TOKEN_SECRET: 'test-secret-0123456789' })).toThrow(
      'Invalid configuration: DATABASE_URL: required when STORE_DRIVER=postgres',
    );
    expect(
      loadConfig({ DOWNLOAD_TOKEN_SECRET: 'test-secret-0123456789', DATABASE_URL: 'postgres://localhost/test' }).store,
    ).toEqual({ driver: 'postgres', databaseUrl: 'postgres://localhost/test' });
  });

  it('rejects a short token secret', () => {
    expect(() => loadConfig({ ...base, DOWNLOAD_TOKEN_SECRET: 'short' })).toThrow(
      'DOWNLOAD_TOKEN_SECRET must be at least 16 characters',
    );
  });
});
