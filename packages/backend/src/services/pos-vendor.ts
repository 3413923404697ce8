/**
 * POS Vendor Adapter
 * Lists and withdraws seat packs through the marketplace API client
 */

import {
  ExternalServiceError,
  type PerformanceContext,
  type PosVendor,
  type SeatPack,
} from '@packsync/sync-engine';
import {
  PosApiError,
  buildInventoryPayload,
  isRetryablePosError,
  type PosApiClient,
} from '@packsync/integrations';

export class MarketplacePosVendor implements PosVendor {
  constructor(
    private readonly client: Pick<PosApiClient, 'createInventory' | 'deleteInventory'>,
    private readonly now: () => Date = () => new Date()
  ) {}

  async push(
    pack: SeatPack,
    context: PerformanceContext,
    signal: AbortSignal
  ): Promise<{ vendorInventoryId: string }> {
    try {
      const payload = buildInventoryPayload(pack, context, this.now());
      const vendorInventoryId = await this.client.createInventory(payload, { signal });
      return { vendorInventoryId };
    } catch (error) {
      throw toExternalServiceError(error);
    }
  }

  async delist(_pack: SeatPack, vendorInventoryId: string, signal: AbortSignal): Promise<void> {
    try {
      await this.client.deleteInventory(vendorInventoryId, { signal });
    } catch (error) {
      throw toExternalServiceError(error);
    }
  }
}

function toExternalServiceError(error: unknown): ExternalServiceError {
  if (error instanceof PosApiError) {
    const status = error.statusCode !== undefined ? ` (HTTP ${error.statusCode})` : '';
    return new ExternalServiceError(`${error.message}${status}`, isRetryablePosError(error));
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ExternalServiceError(message);
}
