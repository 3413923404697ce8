/**
 * Lifecycle transitions of a seat pack.
 * Every change to existence, POS state or pack state goes through here.
 */

import type { DelistReason, PackState, PosSyncState, SeatPack } from '../types.js';

export function packStateForReason(reason: DelistReason): PackState {
  return reason === 'transformed' ? 'transformed' : 'delist';
}

/**
 * A listed pack owes the vendor a deletion; a pack that was never
 * listed is already consistent.
 */
export function posStateAfterDelist(pos: PosSyncState): PosSyncState {
  switch (pos.status) {
    case 'pending':
      return { status: 'inactive', vendorInventoryId: null, deletion: 'settled' };
    case 'synced':
      return { status: 'inactive', vendorInventoryId: pos.vendorInventoryId, deletion: 'owed' };
    case 'inactive':
      return pos;
  }
}

/** The pack as it reads after a delist */
export function delistedPack(
  pack: SeatPack,
  reason: DelistReason,
  now: Date,
  actor?: string
): SeatPack {
  return {
    ...pack,
    existence: { status: 'inactive', reason, delistedAt: now },
    pos: posStateAfterDelist(pack.pos),
    packState: packStateForReason(reason),
    manualDelist: reason === 'manual_delist' ? { by: actor ?? 'unknown', at: now } : pack.manualDelist,
    updatedAt: now,
  };
}

export function isActive(pack: SeatPack): boolean {
  return pack.existence.status === 'active';
}

/** Active and never confirmed at the vendor */
export function awaitsVendorPush(pack: SeatPack): boolean {
  return isActive(pack) && pack.pos.status === 'pending';
}

export function owesVendorDeletion(pack: SeatPack): boolean {
  return pack.pos.status === 'inactive' && pack.pos.deletion === 'owed';
}

export function pushAttempts(pack: SeatPack): number {
  return pack.pos.status === 'pending' ? pack.pos.attempts : 0;
}

/** Synced with this vendor id already: re-applying changes nothing */
export function isSyncedAs(pack: SeatPack, vendorInventoryId: string): boolean {
  return pack.pos.status === 'synced' && pack.pos.vendorInventoryId === vendorInventoryId;
}

export function failedPushState(pos: PosSyncState, message: string): PosSyncState {
  if (pos.status !== 'pending') {
    return pos;
  }
  return { status: 'pending', attempts: pos.attempts + 1, lastError: message };
}

export function settledDeletionState(pos: PosSyncState): PosSyncState {
  if (pos.status !== 'inactive') {
    return pos;
  }
  return { ...pos, deletion: 'settled' };
}
