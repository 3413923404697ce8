/**
 * Drizzle Performance Directory
 * Looks up a performance with its event and venue
 */

import { eq } from 'drizzle-orm';
import {
  found,
  notFound,
  type Lookup,
  type PerformanceContext,
  type PerformanceDirectory,
} from '@packsync/sync-engine';
import type { Database } from '../db/index.js';
import { events, performances, venues } from '../db/schema.js';

export class DrizzlePerformanceDirectory implements PerformanceDirectory {
  constructor(private readonly db: Database) {}

  async getContext(performanceId: string): Promise<Lookup<PerformanceContext>> {
    const [row] = await this.db
      .select({ performance: performances, event: events, venue: venues })
      .from(performances)
      .innerJoin(events, eq(performances.eventId, events.internalEventId))
      .innerJoin(venues, eq(performances.venueId, venues.internalVenueId))
      .where(eq(performances.internalPerformanceId, performanceId))
      .limit(1);

    if (!row) {
      return notFound();
    }

    const { performance, event, venue } = row;
    return found({
      performance: {
        internalPerformanceId: performance.internalPerformanceId,
        internalEventId: performance.eventId,
        internalVenueId: performance.venueId,
        posEnabled: performance.posEnabled,
        name: performance.name,
        startsAt: performance.performanceDatetimeUtc,
      },
      event: {
        internalEventId: event.internalEventId,
        name: event.name,
      },
      venue: {
        internalVenueId: venue.internalVenueId,
        name: venue.name,
        city: venue.city,
        stateProvince: venue.stateProvince,
        countryCode: venue.countryCode,
        timezone: venue.timezone,
      },
    });
  }
}
