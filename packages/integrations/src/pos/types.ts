/**
 * POS Marketplace Types
 * Listing payloads and the pack/performance shapes they are built from
 */

// ============================================================================
// Client Configuration
// ============================================================================

export interface PosClientConfig {
  baseUrl: string;
  apiToken: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  retryAttempts?: number;
  /** Concurrent requests allowed through the rate limiter */
  concurrency?: number;
  /** Requests allowed per minute */
  requestsPerMinute?: number;
  debug?: boolean;
}

// ============================================================================
// Listing Sources
// ============================================================================

/** Pack fields a listing is built from; a persisted seat pack satisfies it */
export interface ListingPack {
  internalPackId: string;
  zoneId: string;
  levelId: string | null;
  rowLabel: string;
  packSize: number;
  /** Price per seat */
  packPrice: number;
}

/** Performance, event and venue fields a listing is built from */
export interface ListingContext {
  performance: {
    name: string | null;
    startsAt: Date | null;
  };
  event: {
    name: string;
  };
  venue: {
    name: string;
    city: string | null;
    stateProvince: string | null;
    countryCode: string | null;
    timezone: string | null;
  };
}

// ============================================================================
// Inventory Payloads
// ============================================================================

export interface PosSeating {
  section: string;
  row: string;
}

export interface PosEventMapping {
  eventName: string;
  eventDate: string;
  venueName: string;
  isEventDateConfirmed: boolean;
  city: string;
  stateProvince: string;
  countryCode: string;
}

export interface PosInventoryPayload {
  currencyCode: string;
  unitCost: number;
  deliveryType: 'InApp';
  /** Local performance time, `YYYY-MM-DDTHH:mm:ss` */
  inHandAt: string;
  seating: PosSeating;
  eventMapping: PosEventMapping;
  externalId: string;
  ticketCount: number;
  autoBroadcast: boolean;
  internalNotes: string;
  zoneFill: boolean;
}

export interface PosInventoryCreated {
  id: string | number;
}
