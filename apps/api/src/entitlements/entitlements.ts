import type { Entitlement } from '../domain/types.js';
import { DomainError } from '../errors.js';
import type { EntitlementStore } from '../store/types.js';

function denied(kind: 'EntitlementRevoked' | 'EntitlementExpired' | 'EntitlementExhausted', e: Entitlement) {
  return new DomainError(kind, `Entitlement ${e.id} cannot be used`, { entitlementId: e.id });
}

export class Entitlements {
  constructor(private readonly store: EntitlementStore) {}

  findById(entitlementId: string): Promise<Entitlement | null> {
    return this.store.findById(entitlementId);
  }

  /** Active entitlement for the pair if there is one, otherwise the most recent. */
  get(userId: string, productId: string): Promise<Entitlement | null> {
    return this.store.findForUserProduct(userId, productId);
  }

  listForUser(userId: string): Promise<Entitlement[]> {
    return this.store.listForUser(userId);
  }

  listForOrder(orderId: string): Promise<Entitlement[]> {
    return this.store.listForOrder(orderId);
  }

  async consume(entitlementId: string, now: Date): Promise<Entitlement> {
    const result = await this.store.consume(entitlementId, now);
    switch (result.kind) {
      case 'ok':
        return result.entitlement;
      case 'not_found':
        throw new DomainError('NotEntitled', `Entitlement ${entitlementId} not found`, { entitlementId });
      case 'revoked':
        throw denied('EntitlementRevoked', result.entitlement);
      case 'expired':
        throw denied('EntitlementExpired', result.entitlement);
      case 'exhausted':
        throw denied('EntitlementExhausted', result.entitlement);
    }
  }

  async revoke(entitlementId: string, at: Date): Promise<Entitlement> {
    const revoked = await this.store.revoke(entitlementId, at);
    if (!revoked) throw new DomainError('NotEntitled', `Entitlement ${entitlementId} not found`, { entitlementId });
    return revoked;
  }

  revokeForOrder(orderId: string, at: Date): Promise<number> {
    return this.store.revokeForOrder(orderId, at);
  }
}
