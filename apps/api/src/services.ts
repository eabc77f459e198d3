import type { FastifyBaseLogger } from 'fastify';

import { RoleTransitionManager } from './accounts/roleTransitions.js';
import { DownloadAuditLog } from './audit/downloadAuditLog.js';
import type { BlobStore } from './collaborators/blobStore.js';
import type { CatalogClient } from './collaborators/catalog.js';
import { DownloadAccessGuard } from './downloads/accessGuard.js';
import { Entitlements } from './entitlements/entitlements.js';
import { FulfillmentProcessor } from './fulfillment/fulfillmentProcessor.js';
import { OrderLedger } from './orders/orderLedger.js';
import type { Stores, UserStore } from './store/types.js';

export type AppServices = {
  users: UserStore;
  ledger: OrderLedger;
  fulfillment: FulfillmentProcessor;
  entitlements: Entitlements;
  audit: DownloadAuditLog;
  guard: DownloadAccessGuard;
  roles: RoleTransitionManager;
};

export type ServiceParts = {
  stores: Stores;
  catalog: CatalogClient;
  blobs: BlobStore;
  downloadToken: { secret: string; ttlSec: number };
  log: FastifyBaseLogger;
  clock?: () => Date;
};

export function createServices(parts: ServiceParts): AppServices {
  const { stores, catalog, blobs, log, clock } = parts;

  const ledger = new OrderLedger({
    orders: stores.orders,
    entitlements: stores.entitlements,
    catalog,
    log: log.child({ component: 'order-ledger' }),
    clock,
  });
  const entitlements = new Entitlements(stores.entitlements);
  const audit = new DownloadAuditLog(stores.audit);

  return {
    users: stores.users,
    ledger,
    entitlements,
    audit,
    fulfillment: new FulfillmentProcessor({
      ledger,
      entitlements: stores.entitlements,
      catalog,
      log: log.child({ component: 'fulfillment' }),
      clock,
    }),
    guard: new DownloadAccessGuard({
      entitlements,
      audit,
      blobs,
      tokenSecret: parts.downloadToken.secret,
      tokenTtlSec: parts.downloadToken.ttlSec,
      log: log.child({ component: 'access-guard' }),
      clock,
    }),
    roles: new RoleTransitionManager({
      users: stores.users,
      log: log.child({ component: 'role-transitions' }),
      clock,
    }),
  };
}
