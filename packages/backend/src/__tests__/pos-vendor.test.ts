/**
 * Marketplace POS Vendor Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ExternalServiceError,
  type PerformanceContext,
  type SeatPack,
} from '@packsync/sync-engine';
import {
  PosAuthError,
  PosServerError,
  type PosInventoryPayload,
  type PosRequestOptions,
} from '@packsync/integrations';
import { MarketplacePosVendor } from '../services/pos-vendor.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

const pack: SeatPack = {
  internalPackId: 'SRC_PACK_perf-1_0001',
  performanceId: 'perf-1',
  zoneId: 'orchestra',
  levelId: null,
  sectionId: null,
  rowLabel: 'C',
  startSeatNumber: '5',
  endSeatNumber: '6',
  packSize: 2,
  packPrice: 30,
  totalPrice: 60,
  seatKeys: ['orchestra:C:5', 'orchestra:C:6'],
  sourcePackIds: [],
  existence: { status: 'active' },
  pos: { status: 'pending', attempts: 0, lastError: null },
  packState: 'create',
  manualDelist: null,
  createdAt: NOW,
  updatedAt: NOW,
};

const context: PerformanceContext = {
  performance: {
    internalPerformanceId: 'perf-1',
    internalEventId: 'event-1',
    internalVenueId: 'venue-1',
    posEnabled: true,
    name: null,
    startsAt: new Date('2026-04-01T19:30:00.000Z'),
  },
  event: { internalEventId: 'event-1', name: 'Test Event' },
  venue: {
    internalVenueId: 'venue-1',
    name: 'Test Hall',
    city: 'Springfield',
    stateProvince: 'IL',
    countryCode: 'US',
    timezone: 'UTC',
  },
};

function client() {
  return {
    createInventory: vi.fn(async (_payload: PosInventoryPayload, _options?: PosRequestOptions) => '501'),
    deleteInventory: vi.fn(async (_id: string, _options?: PosRequestOptions) => true),
  };
}

const signal = new AbortController().signal;

describe('MarketplacePosVendor', () => {
  it('lists a pack and returns the vendor id', async () => {
    const api = client();
    const vendor = new MarketplacePosVendor(api, () => NOW);

    const result = await vendor.push(pack, context, signal);

    expect(result).toEqual({ vendorInventoryId: '501' });
    expect(api.createInventory).toHaveBeenCalledWith(
      expect.objectContaining({
        externalId: 'SRC_PACK_perf-1_0001',
        ticketCount: 2,
        unitCost: 30,
        inHandAt: '2026-04-01T19:30:00',
        seating: { section: 'orchestra', row: 'C' },
      }),
      { signal }
    );
  });

  it('deletes by vendor inventory id', async () => {
    const api = client();

    await new MarketplacePosVendor(api).delist(pack, '501', signal);

    expect(api.deleteInventory).toHaveBeenCalledWith('501', { signal });
  });

  it('marks server errors retryable', async () => {
    const api = client();
    api.createInventory.mockRejectedValueOnce(new PosServerError('Bad gateway', 502));

    const failure = new MarketplacePosVendor(api, () => NOW).push(pack, context, signal);

    await expect(failure).rejects.toBeInstanceOf(ExternalServiceError);
    await expect(failure).rejects.toMatchObject({
      message: 'Bad gateway (HTTP 502)',
      retryable: true,
    });
  });

  it('marks rejected credentials as not retryable', async () => {
    const api = client();
    api.deleteInventory.mockRejectedValueOnce(new PosAuthError('Invalid token'));

    await expect(new MarketplacePosVendor(api).delist(pack, '501', signal)).rejects.toMatchObject({
      message: 'Invalid token (HTTP 401)',
      retryable: false,
    });
  });

  it('fails packs whose performance has no start time', async () => {
    const api = client();
    const undated = { ...context, performance: { ...context.performance, startsAt: null } };

    await expect(new MarketplacePosVendor(api, () => NOW).push(pack, undated, signal)).rejects.toMatchObject({
      message: 'Performance for pack SRC_PACK_perf-1_0001 has no start time',
      retryable: false,
    });
    expect(api.createInventory).not.toHaveBeenCalled();
  });
});
