/**
 * Seat Pack Row Adapter
 * Converts between seat_packs rows and engine seat packs. The stored
 * pos_status / synced_to_pos pair is only ever read and written here.
 */

import { z } from 'zod';
import {
  CatastrophicError,
  ConstraintViolationError,
  IdentityCollisionError,
  type NewSeatPack,
  type PackExistence,
  type PosSyncState,
  type SeatPack,
  type SeatPackPatch,
} from '@packsync/sync-engine';
import type { NewSeatPackRow, SeatPackRow } from '../db/schema.js';

const delistReasonSchema = z.enum(['vanished', 'transformed', 'manual_delist', 'performance_disabled']);
const packStateSchema = z.enum(['create', 'split', 'merge', 'shrink', 'transformed', 'delist']);
const posStatusSchema = z.enum(['pending', 'active', 'inactive', 'synced']);

// ============================================================================
// Row -> Pack
// ============================================================================

function readExistence(row: SeatPackRow): PackExistence {
  if (row.packStatus === 'active') {
    return { status: 'active' };
  }
  const reason = delistReasonSchema.safeParse(row.delistReason);
  return {
    status: 'inactive',
    // Rows delisted before reasons were recorded count as vanished
    reason: reason.success ? reason.data : 'vanished',
    delistedAt: row.delistedAt ?? row.updatedAt,
  };
}

function readPosState(row: SeatPackRow): PosSyncState {
  const status = posStatusSchema.safeParse(row.posStatus);
  if (!status.success) {
    throw new ConstraintViolationError(
      `Pack ${row.internalPackId} has unknown pos_status '${row.posStatus}'`
    );
  }

  switch (status.data) {
    case 'pending':
      return { status: 'pending', attempts: row.posSyncAttempts, lastError: row.posLastError };
    // 'active' is the older spelling of a confirmed listing
    case 'active':
    case 'synced':
      return { status: 'synced', vendorInventoryId: row.posInventoryId };
    // synced_to_pos on an inactive row: the vendor side has caught up with the delist
    case 'inactive':
      return {
        status: 'inactive',
        vendorInventoryId: row.posInventoryId,
        deletion: row.syncedToPos ? 'settled' : 'owed',
      };
  }
}

export function rowToSeatPack(row: SeatPackRow): SeatPack {
  const packState = packStateSchema.safeParse(row.packState);

  return {
    internalPackId: row.internalPackId,
    performanceId: row.performanceId,
    zoneId: row.zoneId,
    levelId: row.levelId,
    sectionId: row.sectionId,
    rowLabel: row.rowLabel,
    startSeatNumber: row.startSeatNumber,
    endSeatNumber: row.endSeatNumber,
    packSize: row.packSize,
    packPrice: Number(row.packPrice),
    totalPrice: Number(row.totalPrice),
    seatKeys: row.seatKeys,
    sourcePackIds: row.sourcePackIds,
    existence: readExistence(row),
    pos: readPosState(row),
    packState: packState.success ? packState.data : 'create',
    manualDelist:
      row.manualDelistedBy !== null && row.manualDelistedAt !== null
        ? { by: row.manualDelistedBy, at: row.manualDelistedAt }
        : null,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

// ============================================================================
// Pack -> Row
// ============================================================================

type PosColumns = Pick<
  NewSeatPackRow,
  'posStatus' | 'syncedToPos' | 'posInventoryId' | 'posSyncAttempts' | 'posLastError'
>;

type ExistenceColumns = Pick<NewSeatPackRow, 'packStatus' | 'delistReason' | 'delistedAt'>;

export function posColumns(pos: PosSyncState): PosColumns {
  switch (pos.status) {
    case 'pending':
      return {
        posStatus: 'pending',
        syncedToPos: false,
        posInventoryId: null,
        posSyncAttempts: pos.attempts,
        posLastError: pos.lastError,
      };
    case 'synced':
      return {
        posStatus: 'synced',
        syncedToPos: true,
        posInventoryId: pos.vendorInventoryId,
        posLastError: null,
      };
    case 'inactive':
      return {
        posStatus: 'inactive',
        syncedToPos: pos.deletion === 'settled',
        posInventoryId: pos.vendorInventoryId,
      };
  }
}

export function existenceColumns(existence: PackExistence): ExistenceColumns {
  if (existence.status === 'active') {
    return { packStatus: 'active', delistReason: null, delistedAt: null };
  }
  return {
    packStatus: 'inactive',
    delistReason: existence.reason,
    delistedAt: existence.delistedAt,
  };
}

export function newSeatPackRow(pack: NewSeatPack, now: Date): NewSeatPackRow {
  return {
    internalPackId: pack.internalPackId,
    performanceId: pack.performanceId,
    sourceWebsite: pack.sourceWebsite,
    zoneId: pack.zoneId,
    levelId: pack.levelId,
    sectionId: pack.sectionId,
    rowLabel: pack.rowLabel,
    startSeatNumber: pack.startSeatNumber,
    endSeatNumber: pack.endSeatNumber,
    packSize: pack.packSize,
    packPrice: pack.packPrice.toFixed(2),
    totalPrice: pack.totalPrice.toFixed(2),
    seatKeys: pack.seatKeys,
    sourcePackIds: pack.sourcePackIds,
    packState: pack.packState,
    ...existenceColumns({ status: 'active' }),
    ...posColumns({ status: 'pending', attempts: 0, lastError: null }),
    createdAt: now,
    updatedAt: now,
  };
}

export function patchColumns(patch: SeatPackPatch): Partial<NewSeatPackRow> {
  const columns: Partial<NewSeatPackRow> = { updatedAt: patch.updatedAt };

  if (patch.packSize !== undefined) columns.packSize = patch.packSize;
  if (patch.packPrice !== undefined) columns.packPrice = patch.packPrice.toFixed(2);
  if (patch.totalPrice !== undefined) columns.totalPrice = patch.totalPrice.toFixed(2);
  if (patch.packState !== undefined) columns.packState = patch.packState;
  if (patch.existence) Object.assign(columns, existenceColumns(patch.existence));
  if (patch.pos) Object.assign(columns, posColumns(patch.pos));
  if (patch.manualDelist !== undefined) {
    columns.manualDelistedBy = patch.manualDelist?.by ?? null;
    columns.manualDelistedAt = patch.manualDelist?.at ?? null;
  }

  return columns;
}

// ============================================================================
// Database Errors
// ============================================================================

/** SQLSTATE of a pg error, looked up through wrapping causes */
export function sqlState(error: unknown): string | null {
  let current: unknown = error;
  for (let depth = 0; depth < 3; depth++) {
    if (typeof current !== 'object' || current === null) {
      return null;
    }
    if ('code' in current && typeof current.code === 'string' && /^[0-9A-Z]{5}$/.test(current.code)) {
      return current.code;
    }
    current = 'cause' in current ? current.cause : null;
  }
  return null;
}

/**
 * Maps a failed statement to the engine's error taxonomy.
 * Unique violations on insert are id collisions; other integrity
 * violations fail only the action; anything else aborts the pass.
 */
export function mapDatabaseError(error: unknown, packId: string): Error {
  const state = sqlState(error);
  const message = error instanceof Error ? error.message : String(error);

  if (state === '23505') {
    return new IdentityCollisionError(packId);
  }
  if (state !== null && state.startsWith('23')) {
    return new ConstraintViolationError(`Pack ${packId}: ${message}`);
  }
  return new CatastrophicError(`Database failure on pack ${packId}: ${message}`, { cause: error });
}
