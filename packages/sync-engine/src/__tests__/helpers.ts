/**
 * In-memory stand-ins for the engine ports, shared by the test suites
 */

import { vi } from 'vitest';
import { ExternalServiceError, IdentityCollisionError } from '../errors.js';
import { owesVendorDeletion } from '../executor/pack-state.js';
import { found, notFound } from '../ports.js';
import type {
  Lookup,
  NewSeatPack,
  Notifier,
  PendingPackQuery,
  PerformanceDirectory,
  PosVendor,
  SeatPackPatch,
  SeatPackRepository,
  SeatPackStore,
  SeatPackTransaction,
} from '../ports.js';
import type {
  CandidatePack,
  PerformanceContext,
  PosSyncState,
  SeatPack,
  WorkflowNotification,
} from '../types.js';

export const PERF_ID = 'perf-1';
export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

// ============================================================================
// Builders
// ============================================================================

interface CandidateShape {
  zone?: string;
  row?: string;
  start: number;
  end: number;
  price?: number;
  /** Seat numbers actually in the pack, for interleaved packs */
  seats?: number[];
}

export function candidate(shape: CandidateShape): CandidatePack {
  const zone = shape.zone ?? 'orchestra';
  const row = shape.row ?? 'A';
  const price = shape.price ?? 50;
  const seats =
    shape.seats ?? Array.from({ length: shape.end - shape.start + 1 }, (_, i) => shape.start + i);

  return {
    zoneId: zone,
    levelId: null,
    sectionId: null,
    rowLabel: row,
    startSeatNumber: String(shape.start),
    endSeatNumber: String(shape.end),
    packSize: seats.length,
    packPrice: price,
    totalPrice: price * seats.length,
    seatKeys: seats.map((seat) => `${zone}:${row}:${seat}`),
  };
}

export function seatPack(
  id: string,
  shape: CandidateShape,
  overrides: Partial<SeatPack> = {}
): SeatPack {
  return {
    ...candidate(shape),
    internalPackId: id,
    performanceId: PERF_ID,
    sourcePackIds: [],
    existence: { status: 'active' },
    pos: { status: 'synced', vendorInventoryId: `INV-${id}` },
    packState: 'create',
    manualDelist: null,
    createdAt: FIXED_NOW,
    updatedAt: FIXED_NOW,
    ...overrides,
  };
}

export function performanceContext(
  performanceId = PERF_ID,
  posEnabled = true
): PerformanceContext {
  return {
    performance: {
      internalPerformanceId: performanceId,
      internalEventId: 'event-1',
      internalVenueId: 'venue-1',
      posEnabled,
      name: 'Evening show',
      startsAt: new Date('2026-04-01T19:30:00.000Z'),
    },
    event: { internalEventId: 'event-1', name: 'Test Event' },
    venue: {
      internalVenueId: 'venue-1',
      name: 'Test Hall',
      city: 'Springfield',
      stateProvince: 'IL',
      countryCode: 'US',
      timezone: 'America/Chicago',
    },
  };
}

// ============================================================================
// Repository
// ============================================================================

/**
 * Map-backed repository. Transactions and savepoints snapshot the rows and
 * restore them when their callback throws.
 */
export class MemorySeatPackRepository implements SeatPackRepository, SeatPackTransaction {
  rows = new Map<string, SeatPack>();
  /** Inserts that fail with IdentityCollisionError before one succeeds */
  insertCollisions = 0;
  /** When set, every update throws this error */
  failUpdatesWith: Error | null = null;

  constructor(packs: SeatPack[] = []) {
    for (const pack of packs) {
      this.rows.set(pack.internalPackId, pack);
    }
  }

  get(packId: string): SeatPack | undefined {
    return this.rows.get(packId);
  }

  all(): SeatPack[] {
    return [...this.rows.values()].sort((a, b) => a.internalPackId.localeCompare(b.internalPackId));
  }

  async transaction<T>(fn: (tx: SeatPackTransaction) => Promise<T>): Promise<T> {
    return this.withSnapshot(() => fn(this));
  }

  async savepoint<T>(fn: (store: SeatPackStore) => Promise<T>): Promise<T> {
    return this.withSnapshot(() => fn(this));
  }

  async findById(packId: string): Promise<Lookup<SeatPack>> {
    const pack = this.rows.get(packId);
    return pack ? found(pack) : notFound();
  }

  async findActiveByPerformance(performanceId: string): Promise<SeatPack[]> {
    return this.all().filter(
      (pack) => pack.performanceId === performanceId && pack.existence.status === 'active'
    );
  }

  async countByPerformance(performanceId: string): Promise<number> {
    return this.all().filter((pack) => pack.performanceId === performanceId).length;
  }

  async idExists(packId: string): Promise<boolean> {
    return this.rows.has(packId);
  }

  async hasActivePacks(performanceId: string): Promise<boolean> {
    return (await this.findActiveByPerformance(performanceId)).length > 0;
  }

  async insert(pack: NewSeatPack, now: Date): Promise<SeatPack> {
    if (this.insertCollisions > 0) {
      this.insertCollisions--;
      throw new IdentityCollisionError(pack.internalPackId);
    }
    if (this.rows.has(pack.internalPackId)) {
      throw new IdentityCollisionError(pack.internalPackId);
    }

    const { sourceWebsite: _sourceWebsite, ...structure } = pack;
    const row: SeatPack = {
      ...structure,
      existence: { status: 'active' },
      pos: { status: 'pending', attempts: 0, lastError: null },
      manualDelist: null,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(row.internalPackId, row);
    return row;
  }

  async update(packId: string, patch: SeatPackPatch): Promise<number> {
    if (this.failUpdatesWith) {
      throw this.failUpdatesWith;
    }
    const row = this.rows.get(packId);
    if (!row) {
      return 0;
    }
    this.rows.set(packId, { ...row, ...patch });
    return 1;
  }

  async findPendingCreation(query: PendingPackQuery): Promise<SeatPack[]> {
    const attempts = (pos: PosSyncState) => (pos.status === 'pending' ? pos.attempts : 0);
    return this.all()
      .filter(
        (pack) =>
          pack.existence.status === 'active' &&
          pack.pos.status === 'pending' &&
          (!query.performanceId || pack.performanceId === query.performanceId)
      )
      .sort((a, b) => attempts(a.pos) - attempts(b.pos))
      .slice(0, query.limit);
  }

  async findPendingDeletion(query: PendingPackQuery): Promise<SeatPack[]> {
    return this.all()
      .filter(
        (pack) =>
          owesVendorDeletion(pack) &&
          (!query.performanceId || pack.performanceId === query.performanceId)
      )
      .slice(0, query.limit);
  }

  private async withSnapshot<T>(fn: () => Promise<T>): Promise<T> {
    const snapshot = new Map(this.rows);
    try {
      return await fn();
    } catch (error) {
      this.rows = snapshot;
      throw error;
    }
  }
}

// ============================================================================
// Performance Directory
// ============================================================================

export class MemoryPerformanceDirectory implements PerformanceDirectory {
  private readonly contexts = new Map<string, PerformanceContext>();

  constructor(contexts: PerformanceContext[] = [performanceContext()]) {
    for (const context of contexts) {
      this.contexts.set(context.performance.internalPerformanceId, context);
    }
  }

  async getContext(performanceId: string): Promise<Lookup<PerformanceContext>> {
    const context = this.contexts.get(performanceId);
    return context ? found(context) : notFound();
  }
}

// ============================================================================
// POS Vendor
// ============================================================================

/**
 * Lists every pack as `INV-<packId>` unless told to fail it.
 */
export class FakePosVendor implements PosVendor {
  readonly failPushFor = new Set<string>();
  readonly failDeleteFor = new Set<string>();
  readonly pushed: string[] = [];
  readonly deleted: string[] = [];

  push = vi.fn(async (pack: SeatPack, _context: PerformanceContext, _signal: AbortSignal) => {
    if (this.failPushFor.has(pack.internalPackId)) {
      throw new ExternalServiceError('Vendor rejected listing', false);
    }
    this.pushed.push(pack.internalPackId);
    return { vendorInventoryId: `INV-${pack.internalPackId}` };
  });

  delist = vi.fn(async (pack: SeatPack, vendorInventoryId: string, _signal: AbortSignal) => {
    if (this.failDeleteFor.has(pack.internalPackId)) {
      throw new ExternalServiceError('Vendor unavailable');
    }
    this.deleted.push(vendorInventoryId);
  });
}

// ============================================================================
// Notifier
// ============================================================================

export class RecordingNotifier implements Notifier {
  readonly notifications: WorkflowNotification[] = [];
  failing = false;

  async notify(notification: WorkflowNotification): Promise<void> {
    if (this.failing) {
      throw new Error('Notification channel down');
    }
    this.notifications.push(notification);
  }
}
