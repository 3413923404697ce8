/**
 * Engine Ports
 * Interfaces the engine is given for storage, the POS vendor,
 * performance lookups and notifications.
 */

import type {
  CreationType,
  ManualDelist,
  PackExistence,
  PackState,
  PackStructure,
  PerformanceContext,
  PosSyncState,
  SeatPack,
  UpdatableField,
  WorkflowNotification,
} from './types.js';

// ============================================================================
// Lookup Result
// ============================================================================

/** Separates "no such record" from a failed read, which throws */
export type Lookup<T> = { found: true; value: T } | { found: false };

export function found<T>(value: T): Lookup<T> {
  return { found: true, value };
}

export function notFound<T>(): Lookup<T> {
  return { found: false };
}

// ============================================================================
// Storage
// ============================================================================

export interface NewSeatPack extends PackStructure {
  internalPackId: string;
  performanceId: string;
  sourceWebsite: string;
  sourcePackIds: string[];
  packState: CreationType;
}

/** Fields a write may touch on an existing pack; identity never changes */
export type SeatPackPatch = Partial<Pick<PackStructure, UpdatableField>> & {
  existence?: PackExistence;
  pos?: PosSyncState;
  packState?: PackState;
  manualDelist?: ManualDelist | null;
  updatedAt: Date;
};

export interface PendingPackQuery {
  performanceId?: string;
  limit: number;
}

/** Reads and writes available inside a transaction or savepoint */
export interface SeatPackStore {
  findById(packId: string): Promise<Lookup<SeatPack>>;
  findActiveByPerformance(performanceId: string): Promise<SeatPack[]>;
  /** Every pack ever created for the performance, active or not */
  countByPerformance(performanceId: string): Promise<number>;
  idExists(packId: string): Promise<boolean>;
  /** Throws IdentityCollisionError when the id is taken */
  insert(pack: NewSeatPack, now: Date): Promise<SeatPack>;
  /** Returns the number of rows written */
  update(packId: string, patch: SeatPackPatch): Promise<number>;
}

export interface SeatPackTransaction extends SeatPackStore {
  /** Runs fn in a nested savepoint; a throw rolls back only its writes */
  savepoint<T>(fn: (store: SeatPackStore) => Promise<T>): Promise<T>;
}

export interface SeatPackRepository extends SeatPackStore {
  /** Commits when fn resolves, rolls back every write when it throws */
  transaction<T>(fn: (tx: SeatPackTransaction) => Promise<T>): Promise<T>;
  hasActivePacks(performanceId: string): Promise<boolean>;
  /** Active packs never confirmed at the vendor, fewest attempts first */
  findPendingCreation(query: PendingPackQuery): Promise<SeatPack[]>;
  /** Inactive packs whose vendor listing still has to be deleted */
  findPendingDeletion(query: PendingPackQuery): Promise<SeatPack[]>;
}

// ============================================================================
// Performance Lookup
// ============================================================================

export interface PerformanceDirectory {
  getContext(performanceId: string): Promise<Lookup<PerformanceContext>>;
}

// ============================================================================
// POS Vendor
// ============================================================================

/** `signal` aborts once the pusher stops waiting; the request must be cancelled with it */
export interface PosVendor {
  push(
    pack: SeatPack,
    context: PerformanceContext,
    signal: AbortSignal
  ): Promise<{ vendorInventoryId: string }>;
  /** Deleting a listing the vendor no longer has resolves */
  delist(pack: SeatPack, vendorInventoryId: string, signal: AbortSignal): Promise<void>;
}

// ============================================================================
// Notifications
// ============================================================================

export interface Notifier {
  notify(notification: WorkflowNotification): Promise<void>;
}
