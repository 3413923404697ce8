/**
 * Drizzle Seat Pack Repository
 * Postgres storage for the sync engine. Transactions map to drizzle
 * transactions, savepoints to nested ones.
 */

import { and, asc, count, eq, type SQL } from 'drizzle-orm';
import {
  IdentityCollisionError,
  found,
  notFound,
  type Lookup,
  type NewSeatPack,
  type PendingPackQuery,
  type SeatPack,
  type SeatPackPatch,
  type SeatPackRepository,
  type SeatPackStore,
  type SeatPackTransaction,
} from '@packsync/sync-engine';
import type { Database } from '../db/index.js';
import { seatPacks } from '../db/schema.js';
import { mapDatabaseError, newSeatPackRow, patchColumns, rowToSeatPack } from './seat-pack-row.js';

// ============================================================================
// Store (queries shared by the pool and transactions)
// ============================================================================

export class DrizzleSeatPackStore implements SeatPackStore {
  constructor(protected readonly db: Database) {}

  async findById(packId: string): Promise<Lookup<SeatPack>> {
    const [row] = await this.db
      .select()
      .from(seatPacks)
      .where(eq(seatPacks.internalPackId, packId))
      .limit(1);
    return row ? found(rowToSeatPack(row)) : notFound();
  }

  async findActiveByPerformance(performanceId: string): Promise<SeatPack[]> {
    const rows = await this.db
      .select()
      .from(seatPacks)
      .where(and(eq(seatPacks.performanceId, performanceId), eq(seatPacks.packStatus, 'active')))
      .orderBy(asc(seatPacks.internalPackId));
    return rows.map(rowToSeatPack);
  }

  async countByPerformance(performanceId: string): Promise<number> {
    const [result] = await this.db
      .select({ total: count() })
      .from(seatPacks)
      .where(eq(seatPacks.performanceId, performanceId));
    return result?.total ?? 0;
  }

  async idExists(packId: string): Promise<boolean> {
    const rows = await this.db
      .select({ id: seatPacks.internalPackId })
      .from(seatPacks)
      .where(eq(seatPacks.internalPackId, packId))
      .limit(1);
    return rows.length > 0;
  }

  async insert(pack: NewSeatPack, now: Date): Promise<SeatPack> {
    try {
      const [row] = await this.db.insert(seatPacks).values(newSeatPackRow(pack, now)).returning();
      if (!row) {
        throw new IdentityCollisionError(pack.internalPackId);
      }
      return rowToSeatPack(row);
    } catch (error) {
      if (error instanceof IdentityCollisionError) {
        throw error;
      }
      throw mapDatabaseError(error, pack.internalPackId);
    }
  }

  async update(packId: string, patch: SeatPackPatch): Promise<number> {
    try {
      const rows = await this.db
        .update(seatPacks)
        .set(patchColumns(patch))
        .where(eq(seatPacks.internalPackId, packId))
        .returning({ id: seatPacks.internalPackId });
      return rows.length;
    } catch (error) {
      throw mapDatabaseError(error, packId);
    }
  }
}

export class DrizzleSeatPackTransaction extends DrizzleSeatPackStore implements SeatPackTransaction {
  async savepoint<T>(fn: (store: SeatPackStore) => Promise<T>): Promise<T> {
    return this.db.transaction((savepoint) => fn(new DrizzleSeatPackStore(savepoint)));
  }
}

// ============================================================================
// Repository
// ============================================================================

export class DrizzleSeatPackRepository extends DrizzleSeatPackStore implements SeatPackRepository {
  async transaction<T>(fn: (tx: SeatPackTransaction) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(new DrizzleSeatPackTransaction(tx)));
  }

  async hasActivePacks(performanceId: string): Promise<boolean> {
    const rows = await this.db
      .select({ id: seatPacks.internalPackId })
      .from(seatPacks)
      .where(and(eq(seatPacks.performanceId, performanceId), eq(seatPacks.packStatus, 'active')))
      .limit(1);
    return rows.length > 0;
  }

  async findPendingCreation(query: PendingPackQuery): Promise<SeatPack[]> {
    const rows = await this.db
      .select()
      .from(seatPacks)
      .where(
        withPerformance(
          and(eq(seatPacks.packStatus, 'active'), eq(seatPacks.posStatus, 'pending')),
          query.performanceId
        )
      )
      .orderBy(asc(seatPacks.posSyncAttempts), asc(seatPacks.internalPackId))
      .limit(query.limit);
    return rows.map(rowToSeatPack);
  }

  async findPendingDeletion(query: PendingPackQuery): Promise<SeatPack[]> {
    const rows = await this.db
      .select()
      .from(seatPacks)
      .where(
        withPerformance(
          and(eq(seatPacks.posStatus, 'inactive'), eq(seatPacks.syncedToPos, false)),
          query.performanceId
        )
      )
      .orderBy(asc(seatPacks.updatedAt))
      .limit(query.limit);
    return rows.map(rowToSeatPack);
  }
}

function withPerformance(condition: SQL | undefined, performanceId: string | undefined): SQL | undefined {
  return performanceId ? and(condition, eq(seatPacks.performanceId, performanceId)) : condition;
}

export function createSeatPackRepository(db: Database): DrizzleSeatPackRepository {
  return new DrizzleSeatPackRepository(db);
}
