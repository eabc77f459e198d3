import type {
  CreatorCapabilityRecord,
  DownloadEvent,
  Entitlement,
  NewDownloadEvent,
  NewEntitlement,
  Order,
  OrderStatus,
  Session,
  StoreMetadata,
  User,
} from '../domain/types.js';

export type OrderTransition = {
  orderId: string;
  from: OrderStatus;
  to: OrderStatus;
  paymentRef?: string;
  paymentSequence?: number | null;
  at: Date;
};

export interface OrderStore {
  insert(order: Order): Promise<Order>;
  findById(orderId: string): Promise<Order | null>;
  listForUser(userId: string): Promise<Order[]>;
  /**
   * Conditional update: applies only while the order is still in `from`.
   * Returns null when the row was not in `from` (or does not exist).
   */
  transition(args: OrderTransition): Promise<Order | null>;
}

export type ConsumeResult =
  | { kind: 'ok'; entitlement: Entitlement }
  | { kind: 'not_found' }
  | { kind: 'revoked' | 'expired' | 'exhausted'; entitlement: Entitlement };

export interface EntitlementStore {
  /** Keyed by (orderId, lineItemId); an existing row is returned untouched. */
  insertIfAbsent(input: NewEntitlement, at: Date): Promise<{ entitlement: Entitlement; created: boolean }>;
  findById(entitlementId: string): Promise<Entitlement | null>;
  findForUserProduct(userId: string, productId: string): Promise<Entitlement | null>;
  listForUser(userId: string): Promise<Entitlement[]>;
  listForOrder(orderId: string): Promise<Entitlement[]>;
  /**
   * Spends one unit iff active, under limit and unexpired at `now`, in a
   * single atomic step. Failure precedence: revoked, expired, exhausted.
   */
  consume(entitlementId: string, now: Date): Promise<ConsumeResult>;
  revoke(entitlementId: string, at: Date): Promise<Entitlement | null>;
  revokeForOrder(orderId: string, at: Date): Promise<number>;
}

export interface DownloadAuditStore {
  append(event: NewDownloadEvent): Promise<DownloadEvent>;
  listForEntitlement(entitlementId: string): Promise<DownloadEvent[]>;
  countDenialsSince(entitlementId: string, since: Date): Promise<number>;
  /** Records first use of a single-use token; false when it was already claimed. */
  claimSingleUseToken(tokenId: string, entitlementId: string, at: Date): Promise<boolean>;
}

export type PromoteResult =
  | { kind: 'ok'; record: CreatorCapabilityRecord }
  | { kind: 'unknown_user' }
  | { kind: 'already_creator' }
  | { kind: 'store_name_taken' };

export interface UserStore {
  findById(userId: string): Promise<User | null>;
  findSession(sessionId: string): Promise<Session | null>;
  findCreatorRecord(userId: string): Promise<CreatorCapabilityRecord | null>;
  /**
   * buyer → creator plus the capability record, as one conditional step.
   * `slugBase` is suffixed when another store already holds the slug.
   */
  promoteToCreator(
    userId: string,
    metadata: StoreMetadata & { slugBase: string },
    at: Date,
  ): Promise<PromoteResult>;
}

export type Stores = {
  orders: OrderStore;
  entitlements: EntitlementStore;
  audit: DownloadAuditStore;
  users: UserStore;
};
