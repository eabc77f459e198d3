import { randomUUID } from 'node:crypto';

import { nextAvailableSlug } from '../../accounts/storeSlug.js';
import { isUniqueViolation, type Db } from '../../db.js';
import {
  creatorCategorySchema,
  userRoleSchema,
  type CreatorCapabilityRecord,
  type Session,
  type StoreMetadata,
  type User,
} from '../../domain/types.js';
import type { PromoteResult, UserStore } from '../types.js';

type UserRow = { id: string; role: string; created_at: Date; updated_at: Date };

type CreatorRow = {
  id: string;
  user_id: string;
  store_name: string;
  store_slug: string;
  store_description: string;
  category: string;
  created_at: Date;
};

const SLUG_ATTEMPTS = 3;

function mapCreatorRow(row: CreatorRow): CreatorCapabilityRecord {
  return {
    id: row.id,
    userId: row.user_id,
    storeName: row.store_name,
    storeSlug: row.store_slug,
    storeDescription: row.store_description,
    category: creatorCategorySchema.parse(row.category),
    status: 'active',
    createdAt: row.created_at,
  };
}

export class PgUserStore implements UserStore {
  constructor(private readonly db: Db) {}

  async findById(userId: string): Promise<User | null> {
    const res = await this.db.query<UserRow>('SELECT id, role, created_at, updated_at FROM users WHERE id = $1', [
      userId,
    ]);
    const row = res.rows[0];
    if (!row) return null;
    return { id: row.id, role: userRoleSchema.parse(row.role), createdAt: row.created_at, updatedAt: row.updated_at };
  }

  async findSession(sessionId: string): Promise<Session | null> {
    const res = await this.db.query<{ id: string; user_id: string; expires_at: Date }>(
      'SELECT id, user_id, expires_at FROM sessions WHERE id = $1',
      [sessionId],
    );
    const row = res.rows[0];
    return row ? { id: row.id, userId: row.user_id, expiresAt: row.expires_at } : null;
  }

  async findCreatorRecord(userId: string): Promise<CreatorCapabilityRecord | null> {
    const res = await this.db.query<CreatorRow>('SELECT * FROM creator_capabilities WHERE user_id = $1', [userId]);
    return res.rows[0] ? mapCreatorRow(res.rows[0]) : null;
  }

  async promoteToCreator(
    userId: string,
    metadata: StoreMetadata & { slugBase: string },
    at: Date,
  ): Promise<PromoteResult> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.promoteOnce(userId, metadata, at);
      } catch (e) {
        if (isUniqueViolation(e, 'creator_capabilities_store_name_key')) return { kind: 'store_name_taken' };
        if (isUniqueViolation(e, 'creator_capabilities_user_key')) return { kind: 'already_creator' };
        // Another store grabbed the same slug between our read and insert.
        if (isUniqueViolation(e, 'creator_capabilities_slug_key') && attempt < SLUG_ATTEMPTS) continue;
        throw e;
      }
    }
  }

  private promoteOnce(
    userId: string,
    metadata: StoreMetadata & { slugBase: string },
    at: Date,
  ): Promise<PromoteResult> {
    return this.db.transaction(async (tx) => {
      const current = await tx.query<{ role: string }>('SELECT role FROM users WHERE id = $1', [userId]);
      if (!current.rows[0]) return { kind: 'unknown_user' as const };
      if (current.rows[0].role === 'creator') return { kind: 'already_creator' as const };

      const nameTaken = await tx.query(
        'SELECT 1 FROM creator_capabilities WHERE lower(store_name) = lower($1) LIMIT 1',
        [metadata.storeName],
      );
      if ((nameTaken.rowCount ?? 0) > 0) return { kind: 'store_name_taken' as const };

      // The read above is advisory; this conditional set is the guard. Of several
      // concurrent upgrades only the first matches role = 'buyer'.
      const promoted = await tx.query(
        `UPDATE users SET role = 'creator', updated_at = $2 WHERE id = $1 AND role = 'buyer' RETURNING id`,
        [userId, at],
      );
      if (promoted.rowCount !== 1) return { kind: 'already_creator' as const };

      const slugs = await tx.query<{ store_slug: string }>(
        `SELECT store_slug FROM creator_capabilities WHERE store_slug = $1 OR store_slug LIKE $1 || '-%'`,
        [metadata.slugBase],
      );
      const storeSlug = nextAvailableSlug(
        metadata.slugBase,
        slugs.rows.map((r) => r.store_slug),
      );

      const inserted = await tx.query<CreatorRow>(
        `INSERT INTO creator_capabilities (id, user_id, store_name, store_slug, store_description, category, status,
           created_at)
         VALUES ($1, $2, $3, $4, $5, $6, 'active', $7)
         RETURNING *`,
        [randomUUID(), userId, metadata.storeName, storeSlug, metadata.storeDescription, metadata.category, at],
      );
      return { kind: 'ok' as const, record: mapCreatorRow(inserted.rows[0]) };
    });
  }
}
