import { randomUUID } from 'node:crypto';

import { nextAvailableSlug } from '../accounts/storeSlug.js';
import { consumeDenial } from '../entitlements/rules.js';
import type {
  CreatorCapabilityRecord,
  DownloadEvent,
  Entitlement,
  NewDownloadEvent,
  NewEntitlement,
  Order,
  Session,
  StoreMetadata,
  User,
  UserRole,
} from '../domain/types.js';
import type {
  ConsumeResult,
  DownloadAuditStore,
  EntitlementStore,
  OrderStore,
  OrderTransition,
  PromoteResult,
  Stores,
  UserStore,
} from './types.js';

// Every mutating method below runs its check and its write without an
// intervening await, so each one is atomic on the event loop.

function copyOrder(order: Order): Order {
  return { ...order, lineItems: order.lineItems.map((li) => ({ ...li })) };
}

export class MemoryOrderStore implements OrderStore {
  private readonly orders = new Map<string, Order>();

  async insert(order: Order): Promise<Order> {
    if (this.orders.has(order.id)) {
      throw new Error(`order ${order.id} already exists`);
    }
    this.orders.set(order.id, copyOrder(order));
    return copyOrder(order);
  }

  async findById(orderId: string): Promise<Order | null> {
    const order = this.orders.get(orderId);
    return order ? copyOrder(order) : null;
  }

  async listForUser(userId: string): Promise<Order[]> {
    return [...this.orders.values()]
      .filter((o) => o.userId === userId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(copyOrder);
  }

  async transition(args: OrderTransition): Promise<Order | null> {
    const current = this.orders.get(args.orderId);
    if (!current || current.status !== args.from) return null;

    const next: Order = {
      ...current,
      status: args.to,
      updatedAt: args.at,
      paymentRef: args.paymentRef ?? current.paymentRef,
      paymentSequence: args.paymentSequence ?? current.paymentSequence,
      paidAt: args.to === 'paid' ? args.at : current.paidAt,
      failedAt: args.to === 'failed' ? args.at : current.failedAt,
      refundedAt: args.to === 'refunded' ? args.at : current.refundedAt,
    };
    this.orders.set(next.id, next);
    return copyOrder(next);
  }
}

export class MemoryEntitlementStore implements EntitlementStore {
  private readonly entitlements = new Map<string, Entitlement>();

  async insertIfAbsent(input: NewEntitlement, at: Date): Promise<{ entitlement: Entitlement; created: boolean }> {
    const existing = [...this.entitlements.values()].find(
      (e) => e.orderId === input.orderId && e.lineItemId === input.lineItemId,
    );
    if (existing) return { entitlement: { ...existing }, created: false };

    const entitlement: Entitlement = {
      ...input,
      licenseKey: input.licenseKey ?? null,
      id: randomUUID(),
      downloadsConsumed: 0,
      status: 'active',
      lastAccessedAt: null,
      createdAt: at,
      revokedAt: null,
    };
    this.entitlements.set(entitlement.id, entitlement);
    return { entitlement: { ...entitlement }, created: true };
  }

  async findById(entitlementId: string): Promise<Entitlement | null> {
    const e = this.entitlements.get(entitlementId);
    return e ? { ...e } : null;
  }

  async findForUserProduct(userId: string, productId: string): Promise<Entitlement | null> {
    const matches = [...this.entitlements.values()].filter((e) => e.userId === userId && e.productId === productId);
    if (matches.length === 0) return null;

    const active = matches.filter((e) => e.status === 'active');
    const pool = active.length > 0 ? active : matches;
    const latest = pool.reduce((acc, e) => (e.createdAt.getTime() >= acc.createdAt.getTime() ? e : acc));
    return { ...latest };
  }

  async listForUser(userId: string): Promise<Entitlement[]> {
    return [...this.entitlements.values()].filter((e) => e.userId === userId).map((e) => ({ ...e }));
  }

  async listForOrder(orderId: string): Promise<Entitlement[]> {
    return [...this.entitlements.values()].filter((e) => e.orderId === orderId).map((e) => ({ ...e }));
  }

  async consume(entitlementId: string, now: Date): Promise<ConsumeResult> {
    const e = this.entitlements.get(entitlementId);
    if (!e) return { kind: 'not_found' };

    const denial = consumeDenial(e, now);
    if (denial) return { kind: denial, entitlement: { ...e } };

    const downloadsConsumed = e.downloadsConsumed + 1;
    const next: Entitlement = {
      ...e,
      downloadsConsumed,
      lastAccessedAt: now,
      status: e.downloadLimit !== null && downloadsConsumed >= e.downloadLimit ? 'exhausted' : 'active',
    };
    this.entitlements.set(next.id, next);
    return { kind: 'ok', entitlement: { ...next } };
  }

  async revoke(entitlementId: string, at: Date): Promise<Entitlement | null> {
    const e = this.entitlements.get(entitlementId);
    if (!e) return null;
    if (e.status === 'revoked') return { ...e };

    const next: Entitlement = { ...e, status: 'revoked', revokedAt: at };
    this.entitlements.set(next.id, next);
    return { ...next };
  }

  async revokeForOrder(orderId: string, at: Date): Promise<number> {
    let revoked = 0;
    for (const e of this.entitlements.values()) {
      if (e.orderId !== orderId || e.status === 'revoked') continue;
      this.entitlements.set(e.id, { ...e, status: 'revoked', revokedAt: at });
      revoked++;
    }
    return revoked;
  }
}

export class MemoryDownloadAuditStore implements DownloadAuditStore {
  private readonly events: DownloadEvent[] = [];
  private readonly claims = new Map<string, { entitlementId: string; claimedAt: Date }>();

  async append(event: NewDownloadEvent): Promise<DownloadEvent> {
    const stored: DownloadEvent = { ...event, id: randomUUID() };
    this.events.push(stored);
    return { ...stored };
  }

  async listForEntitlement(entitlementId: string): Promise<DownloadEvent[]> {
    // Array.prototype.sort is stable, so equal timestamps keep append order.
    return this.events
      .filter((e) => e.entitlementId === entitlementId)
      .sort((a, b) => a.occurredAt.getTime() - b.occurredAt.getTime())
      .map((e) => ({ ...e }));
  }

  async countDenialsSince(entitlementId: string, since: Date): Promise<number> {
    return this.events.filter(
      (e) => e.entitlementId === entitlementId && e.outcome !== 'granted' && e.occurredAt.getTime() >= since.getTime(),
    ).length;
  }

  async claimSingleUseToken(tokenId: string, entitlementId: string, at: Date): Promise<boolean> {
    if (this.claims.has(tokenId)) return false;
    this.claims.set(tokenId, { entitlementId, claimedAt: at });
    return true;
  }
}

export class MemoryUserStore implements UserStore {
  private readonly users = new Map<string, User>();
  private readonly sessions = new Map<string, Session>();
  private readonly creators = new Map<string, CreatorCapabilityRecord>();

  addUser(input: { id?: string; role?: UserRole; at?: Date } = {}): User {
    const at = input.at ?? new Date();
    const user: User = { id: input.id ?? randomUUID(), role: input.role ?? 'buyer', createdAt: at, updatedAt: at };
    this.users.set(user.id, user);
    return { ...user };
  }

  addSession(userId: string, expiresAt: Date, id: string = randomUUID()): Session {
    const session: Session = { id, userId, expiresAt };
    this.sessions.set(id, session);
    return { ...session };
  }

  async findById(userId: string): Promise<User | null> {
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  async findSession(sessionId: string): Promise<Session | null> {
    const session = this.sessions.get(sessionId);
    return session ? { ...session } : null;
  }

  async findCreatorRecord(userId: string): Promise<CreatorCapabilityRecord | null> {
    const record = this.creators.get(userId);
    return record ? { ...record } : null;
  }

  async promoteToCreator(
    userId: string,
    metadata: StoreMetadata & { slugBase: string },
    at: Date,
  ): Promise<PromoteResult> {
    const user = this.users.get(userId);
    if (!user) return { kind: 'unknown_user' };
    if (user.role === 'creator' || this.creators.has(userId)) return { kind: 'already_creator' };

    const records = [...this.creators.values()];
    const wanted = metadata.storeName.toLowerCase();
    if (records.some((r) => r.storeName.toLowerCase() === wanted)) return { kind: 'store_name_taken' };

    const record: CreatorCapabilityRecord = {
      id: randomUUID(),
      userId,
      storeName: metadata.storeName,
      storeSlug: nextAvailableSlug(
        metadata.slugBase,
        records.map((r) => r.storeSlug),
      ),
      storeDescription: metadata.storeDescription,
      category: metadata.category,
      status: 'active',
      createdAt: at,
    };

    this.users.set(userId, { ...user, role: 'creator', updatedAt: at });
    this.creators.set(userId, record);
    return { kind: 'ok', record: { ...record } };
  }
}

export type MemoryStores = {
  orders: MemoryOrderStore;
  entitlements: MemoryEntitlementStore;
  audit: MemoryDownloadAuditStore;
  users: MemoryUserStore;
};

export function createMemoryStores(): MemoryStores & Stores {
  return {
    orders: new MemoryOrderStore(),
    entitlements: new MemoryEntitlementStore(),
    audit: new MemoryDownloadAuditStore(),
    users: new MemoryUserStore(),
  };
}
