import type { Db } from '../../db.js';
import type { Stores } from '../types.js';
import { PgDownloadAuditStore } from './audit.js';
import { PgEntitlementStore } from './entitlements.js';
import { PgOrderStore } from './orders.js';
import { PgUserStore } from './users.js';

export function createPgStores(db: Db): Stores {
  return {
    orders: new PgOrderStore(db),
    entitlements: new PgEntitlementStore(db),
    audit: new PgDownloadAuditStore(db),
    users: new PgUserStore(db),
  };
}
