/**
 * POS Transformer Tests
 * Tests listing payloads built from packs and performance context
 */

import { describe, it, expect } from 'vitest';
import { PosValidationError } from '../pos/errors.js';
import {
  broadcastWarnings,
  buildInventoryPayload,
  formatLocalDateTime,
} from '../pos/transformer.js';
import type { ListingContext, ListingPack } from '../pos/types.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');
const STARTS_AT = new Date('2026-05-02T00:30:00.000Z');

const pack: ListingPack = {
  internalPackId: 'TM_PACK_perf-1_0001',
  zoneId: 'orchestra',
  levelId: 'Mezzanine',
  rowLabel: 'A',
  packSize: 4,
  packPrice: 75,
};

function context(overrides: Partial<ListingContext['venue']> = {}, startsAt: Date | null = STARTS_AT): ListingContext {
  return {
    performance: { name: 'Evening show', startsAt },
    event: { name: 'Test Musical' },
    venue: {
      name: 'Test Theatre',
      city: 'New York',
      stateProvince: 'NY',
      countryCode: 'US',
      timezone: 'America/New_York',
      ...overrides,
    },
  };
}

describe('formatLocalDateTime', () => {
  it('renders wall-clock time in the venue timezone', () => {
    expect(formatLocalDateTime(STARTS_AT, 'America/New_York')).toBe('2026-05-01T20:30:00');
  });

  it('falls back to UTC without a timezone', () => {
    expect(formatLocalDateTime(STARTS_AT, null)).toBe('2026-05-02T00:30:00');
  });

  it('falls back to UTC for unknown timezones', () => {
    expect(formatLocalDateTime(STARTS_AT, 'Nowhere/Unknown')).toBe('2026-05-02T00:30:00');
  });
});

describe('buildInventoryPayload', () => {
  it('maps a pack to a marketplace listing', () => {
    expect(buildInventoryPayload(pack, context(), NOW)).toEqual({
      currencyCode: 'USD',
      unitCost: 75,
      deliveryType: 'InApp',
      inHandAt: '2026-05-01T20:30:00',
      seating: { section: 'Mezzanine', row: 'A' },
      eventMapping: {
        eventName: 'Test Musical',
        eventDate: '2026-05-01T20:30:00',
        venueName: 'Test Theatre',
        isEventDateConfirmed: true,
        city: 'New York',
        stateProvince: 'NY',
        countryCode: 'US',
      },
      externalId: 'TM_PACK_perf-1_0001',
      ticketCount: 4,
      autoBroadcast: true,
      internalNotes: 'Auto-created via database sync. Generated on 2026-03-01 12:00',
      zoneFill: true,
    });
  });

  it('uses the zone as section when the pack has no level', () => {
    const payload = buildInventoryPayload({ ...pack, levelId: null }, context(), NOW);

    expect(payload.seating).toEqual({ section: 'orchestra', row: 'A' });
  });

  it('fills in missing venue location fields', () => {
    const payload = buildInventoryPayload(
      pack,
      context({ city: null, stateProvince: null, countryCode: null }),
      NOW
    );

    expect(payload.eventMapping).toMatchObject({ city: '', stateProvince: '', countryCode: 'US' });
  });

  it('rejects performances without a start time', () => {
    expect(() => buildInventoryPayload(pack, context({}, null), NOW)).toThrow(PosValidationError);
  });
});

describe('broadcastWarnings', () => {
  it('is empty for a complete listing', () => {
    expect(broadcastWarnings(buildInventoryPayload(pack, context(), NOW))).toEqual([]);
  });

  it('flags free listings', () => {
    const payload = buildInventoryPayload({ ...pack, packPrice: 0 }, context(), NOW);

    expect(broadcastWarnings(payload)).toEqual([
      'Zero or negative unit cost might prevent broadcasting',
    ]);
  });
});
