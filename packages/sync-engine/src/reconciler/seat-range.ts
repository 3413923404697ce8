/**
 * Seat range helpers shared by the comparator and the reconciler.
 * Ranges are half-open: seats 1-4 are [1, 5).
 */

import { ValidationError } from '../errors.js';
import type { PackStructure } from '../types.js';

export interface SeatRange {
  start: number;
  end: number;
}

type RangeFields = Pick<PackStructure, 'startSeatNumber' | 'endSeatNumber'>;
type LocationFields = Pick<PackStructure, 'zoneId' | 'rowLabel'>;

const NUMERIC_SEAT = /^\d+$/;

function parseSeatNumber(value: string): number {
  const trimmed = value.trim();
  if (!NUMERIC_SEAT.test(trimmed)) {
    throw new ValidationError(`Seat number is not numeric: "${value}"`);
  }
  return Number(trimmed);
}

/**
 * Parse the seat range of a pack. Throws ValidationError for non-numeric
 * seats or a start after the end.
 */
export function parseSeatRange(pack: RangeFields): SeatRange {
  const start = parseSeatNumber(pack.startSeatNumber);
  const end = parseSeatNumber(pack.endSeatNumber);
  if (end < start) {
    throw new ValidationError(
      `Seat range ends before it starts: ${pack.startSeatNumber}-${pack.endSeatNumber}`
    );
  }
  return { start, end: end + 1 };
}

export function rangesOverlap(a: SeatRange, b: SeatRange): boolean {
  return a.start < b.end && b.start < a.end;
}

export function rangeContains(outer: SeatRange, inner: SeatRange): boolean {
  return outer.start <= inner.start && inner.end <= outer.end;
}

/** True when the union of parts leaves no seat of target uncovered */
export function rangeUnionCovers(target: SeatRange, parts: SeatRange[]): boolean {
  const sorted = [...parts].sort((a, b) => a.start - b.start);
  let cursor = target.start;
  for (const part of sorted) {
    if (part.start > cursor) {
      break;
    }
    cursor = Math.max(cursor, part.end);
    if (cursor >= target.end) {
      return true;
    }
  }
  return cursor >= target.end;
}

function normalizeSeat(value: string): string {
  const trimmed = value.trim();
  return NUMERIC_SEAT.test(trimmed) ? String(Number(trimmed)) : trimmed;
}

/** Zone and row of a pack */
export function locationKey(pack: LocationFields): string {
  return `${pack.zoneId}:${pack.rowLabel.trim()}`;
}

/** Zone, row and seat range: the structural identity of a pack */
export function rangeKey(pack: LocationFields & RangeFields): string {
  return `${locationKey(pack)}:${normalizeSeat(pack.startSeatNumber)}:${normalizeSeat(pack.endSeatNumber)}`;
}

function compareSeat(a: string, b: string): number {
  const left = normalizeSeat(a);
  const right = normalizeSeat(b);
  if (NUMERIC_SEAT.test(left) && NUMERIC_SEAT.test(right)) {
    return Number(left) - Number(right);
  }
  return left < right ? -1 : left > right ? 1 : 0;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Deterministic order: zone, row, first seat, last seat, price */
export function comparePackStructure(a: PackStructure, b: PackStructure): number {
  return (
    compareText(a.zoneId, b.zoneId) ||
    compareText(a.rowLabel.trim(), b.rowLabel.trim()) ||
    compareSeat(a.startSeatNumber, b.startSeatNumber) ||
    compareSeat(a.endSeatNumber, b.endSeatNumber) ||
    a.packPrice - b.packPrice
  );
}
