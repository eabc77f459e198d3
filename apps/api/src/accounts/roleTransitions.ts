import type { FastifyBaseLogger } from 'fastify';

import type { CreatorCapabilityRecord, StoreMetadata, UserRole } from '../domain/types.js';
import { DomainError } from '../errors.js';
import type { UserStore } from '../store/types.js';
import { slugifyStoreName } from './storeSlug.js';

export type RoleTransitionDeps = {
  users: UserStore;
  log: FastifyBaseLogger;
  clock?: () => Date;
};

export class RoleTransitionManager {
  private readonly clock: () => Date;

  constructor(private readonly deps: RoleTransitionDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * buyer → creator. Exactly one of any number of concurrent calls for the
   * same user succeeds; the rest see AlreadyCreator.
   */
  async promoteToCreator(userId: string, metadata: StoreMetadata): Promise<CreatorCapabilityRecord> {
    const result = await this.deps.users.promoteToCreator(
      userId,
      { ...metadata, slugBase: slugifyStoreName(metadata.storeName) },
      this.clock(),
    );

    switch (result.kind) {
      case 'ok':
        this.deps.log.info(
          { userId, storeSlug: result.record.storeSlug, category: result.record.category },
          'user promoted to creator',
        );
        return result.record;
      case 'unknown_user':
        throw new DomainError('UnknownUser', `User ${userId} not found`, { userId });
      case 'already_creator':
        throw new DomainError('AlreadyCreator', 'User is already a creator', { userId });
      case 'store_name_taken':
        throw new DomainError('StoreNameTaken', `Store name "${metadata.storeName}" is already taken`, {
          storeName: metadata.storeName,
        });
    }
  }

  // Read per call so a promotion is visible on the very next request.
  async getRole(userId: string): Promise<UserRole> {
    const user = await this.deps.users.findById(userId);
    if (!user) throw new DomainError('UnknownUser', `User ${userId} not found`, { userId });
    return user.role;
  }
}
