import cookie from '@fastify/cookie';
import Fastify, { type FastifyBaseLogger } from 'fastify';

import { S3BlobStore } from './collaborators/blobStore.js';
import { type CatalogClient, HttpCatalogClient, StaticCatalog } from './collaborators/catalog.js';
import { type AppConfig, loadConfig } from './config.js';
import { createDb } from './db.js';
import { loggerOptions } from './logger.js';
import { registerDownloadRoutes } from './routes/downloads.js';
import { registerEntitlementRoutes } from './routes/entitlements.js';
import { registerMeRoutes } from './routes/me.js';
import { registerOpsRoutes } from './routes/ops.js';
import { registerOrderRoutes } from './routes/orders.js';
import { registerPaymentWebhookRoutes } from './routes/paymentWebhooks.js';
import { type AppServices, createServices } from './services.js';
import { createMemoryStores } from './store/memory.js';
import { createPgStores } from './store/pg/index.js';
import type { Stores } from './store/types.js';

export type BuildAppOptions = {
  logger?: boolean | { level: string };
  config?: AppConfig;
  /** Pre-built services (tests); otherwise built from config. */
  services?: AppServices;
};

async function buildCatalog(config: AppConfig): Promise<CatalogClient> {
  if (config.catalog.baseUrl) {
    return new HttpCatalogClient({ baseUrl: config.catalog.baseUrl, timeoutMs: config.catalog.timeoutMs });
  }
  if (config.catalog.fixturePath) return StaticCatalog.fromFile(config.catalog.fixturePath);
  return new StaticCatalog([]);
}

async function buildServices(
  config: AppConfig,
  log: FastifyBaseLogger,
): Promise<{ services: AppServices; close: () => Promise<void> }> {
  let stores: Stores;
  let close = async () => {};

  if (config.store.driver === 'postgres') {
    const db = createDb(config.store.databaseUrl);
    stores = createPgStores(db);
    close = () => db.close();
  } else {
    log.warn('STORE_DRIVER=memory: state is lost on restart');
    stores = createMemoryStores();
  }

  const services = createServices({
    stores,
    catalog: await buildCatalog(config),
    blobs: new S3BlobStore(),
    downloadToken: config.downloadToken,
    log,
  });
  return { services, close };
}

export async function buildApp(opts: BuildAppOptions = {}) {
  const config = opts.config ?? loadConfig();
  const app = Fastify({
    logger: opts.logger ?? loggerOptions(config.logLevel),
    // Download tokens travel as a path parameter.
    routerOptions: { maxParamLength: 2048 },
  });

  await app.register(cookie);

  let services = opts.services;
  if (!services) {
    const built = await buildServices(config, app.log);
    services = built.services;
    app.addHook('onClose', built.close);
  }

  app.get('/health', async () => ({ ok: true }));

  await registerOrderRoutes(app, services);
  await registerPaymentWebhookRoutes(app, { fulfillment: services.fulfillment, secret: config.paymentWebhookSecret });
  await registerOpsRoutes(app, { ledger: services.ledger, config });
  await registerEntitlementRoutes(app, services);
  await registerDownloadRoutes(app, services);
  await registerMeRoutes(app, services);

  return app;
}
