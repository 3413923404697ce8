/**
 * POS Listing Transformer
 * Builds marketplace inventory payloads from seat packs
 */

import { PosValidationError } from './errors.js';
import type { ListingContext, ListingPack, PosInventoryPayload } from './types.js';

const CURRENCY_CODE = 'USD';
const DEFAULT_COUNTRY_CODE = 'US';

// ============================================================================
// Date Formatting
// ============================================================================

function formatUtc(date: Date): string {
  return date.toISOString().slice(0, 19);
}

/**
 * Formats an instant as wall-clock time in the given IANA zone.
 * Unknown zones fall back to UTC.
 */
export function formatLocalDateTime(date: Date, timezone: string | null): string {
  if (!timezone) {
    return formatUtc(date);
  }

  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
  } catch (error) {
    if (error instanceof RangeError) {
      return formatUtc(date);
    }
    throw error;
  }

  const parts = new Map(formatter.formatToParts(date).map((part) => [part.type, part.value]));
  const get = (type: Intl.DateTimeFormatPartTypes): string => parts.get(type) ?? '00';
  return `${get('year')}-${get('month')}-${get('day')}T${get('hour')}:${get('minute')}:${get('second')}`;
}

/** `YYYY-MM-DD HH:mm` in UTC */
function formatStamp(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

// ============================================================================
// Payload Building
// ============================================================================

export function buildInventoryPayload(
  pack: ListingPack,
  context: ListingContext,
  now: Date = new Date()
): PosInventoryPayload {
  const startsAt = context.performance.startsAt;
  if (!startsAt) {
    throw new PosValidationError(`Performance for pack ${pack.internalPackId} has no start time`);
  }

  const localTime = formatLocalDateTime(startsAt, context.venue.timezone);
  const { venue } = context;

  return {
    currencyCode: CURRENCY_CODE,
    unitCost: pack.packPrice > 0 ? pack.packPrice : 0,
    deliveryType: 'InApp',
    inHandAt: localTime,
    seating: {
      section: pack.levelId ?? pack.zoneId,
      row: pack.rowLabel,
    },
    eventMapping: {
      eventName: context.event.name,
      eventDate: localTime,
      venueName: venue.name,
      isEventDateConfirmed: true,
      city: venue.city ?? '',
      stateProvince: venue.stateProvince ?? '',
      countryCode: venue.countryCode || DEFAULT_COUNTRY_CODE,
    },
    externalId: pack.internalPackId,
    ticketCount: pack.packSize,
    autoBroadcast: true,
    internalNotes: `Auto-created via database sync. Generated on ${formatStamp(now)}`,
    zoneFill: true,
  };
}

/**
 * Issues that may stop the marketplace from broadcasting a listing.
 * The listing is still sent; callers log these.
 */
export function broadcastWarnings(payload: PosInventoryPayload): string[] {
  const warnings: string[] = [];

  if (payload.unitCost <= 0) {
    warnings.push('Zero or negative unit cost might prevent broadcasting');
  }
  if (payload.ticketCount <= 0) {
    warnings.push('Zero ticket count might prevent broadcasting');
  }
  if (!payload.seating.section || !payload.seating.row) {
    warnings.push('Missing seating information might prevent broadcasting');
  }

  return warnings;
}
