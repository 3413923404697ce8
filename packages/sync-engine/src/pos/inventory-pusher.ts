/**
 * Inventory Pusher
 * Lists newly created packs at the POS vendor, withdraws delisted ones and
 * sweeps packs a previous pass left unconfirmed. Vendor failures are
 * recorded per pack and never thrown for the batch.
 */

import PQueue from 'p-queue';
import { ExternalServiceError, errorMessage } from '../errors.js';
import type { PackSyncEventBus } from '../events.js';
import { owesVendorDeletion, pushAttempts } from '../executor/pack-state.js';
import type { SyncExecutor } from '../executor/sync-executor.js';
import type { PerformanceDirectory, PosVendor, SeatPackRepository } from '../ports.js';
import type {
  BulkInventoryResult,
  DelistResult,
  InventoryPusherConfig,
  PerformanceContext,
  PushFailure,
  SeatPack,
  SweepOptions,
  SweepResult,
  SyncAction,
} from '../types.js';
import { DEFAULT_PUSHER_CONFIG } from '../types.js';

// ============================================================================
// Inventory Pusher Dependencies
// ============================================================================

export interface InventoryPusherDependencies {
  vendor: PosVendor;
  executor: SyncExecutor;
  repository: SeatPackRepository;
  directory: PerformanceDirectory;
  eventBus?: PackSyncEventBus;
  config?: Partial<InventoryPusherConfig>;
}

type PushOutcome =
  | { ok: true; pack: SeatPack; vendorInventoryId: string }
  | { ok: false; failure: PushFailure };

/** Reasons a pack cannot be listed, checked before any vendor call */
function pushBlocker(pack: SeatPack): string | null {
  if (pack.existence.status !== 'active') {
    return 'Pack is not active';
  }
  if (pack.manualDelist) {
    return 'Pack was manually delisted';
  }
  if (pack.pos.status !== 'pending') {
    return `Pack is already ${pack.pos.status} at the vendor`;
  }
  if (pack.packSize <= 0 || pack.packPrice <= 0) {
    return `Invalid size or price (size=${pack.packSize}, price=${pack.packPrice})`;
  }
  if (!pack.rowLabel.trim() || !pack.startSeatNumber.trim() || !pack.endSeatNumber.trim()) {
    return 'Pack is missing row or seat numbers';
  }
  return null;
}

// ============================================================================
// Inventory Pusher Class
// ============================================================================

export class InventoryPusher {
  private readonly vendor: PosVendor;
  private readonly executor: SyncExecutor;
  private readonly repository: SeatPackRepository;
  private readonly directory: PerformanceDirectory;
  private readonly eventBus: PackSyncEventBus | undefined;
  private readonly config: InventoryPusherConfig;
  private readonly queue: PQueue;

  constructor(deps: InventoryPusherDependencies) {
    this.vendor = deps.vendor;
    this.executor = deps.executor;
    this.repository = deps.repository;
    this.directory = deps.directory;
    this.eventBus = deps.eventBus;
    this.config = { ...DEFAULT_PUSHER_CONFIG, ...deps.config };
    this.queue = new PQueue({ concurrency: this.config.concurrency });
  }

  /**
   * Push packs to the vendor, one call per pack. Confirmed pushes mark the
   * pack synced; failed ones stay pending with the attempt recorded.
   */
  async createBulkInventory(
    packs: SeatPack[],
    context: PerformanceContext
  ): Promise<BulkInventoryResult> {
    const performanceId = context.performance.internalPerformanceId;
    const result: BulkInventoryResult = {
      attempted: packs.length,
      successfulCreations: 0,
      failedCreations: 0,
      vendorInventoryIds: {},
      failures: [],
      errors: [],
    };

    if (packs.length === 0) {
      return result;
    }

    this.log(`Pushing ${packs.length} packs for performance ${performanceId}`);
    const outcomes = await Promise.all(packs.map((pack) => this.pushOne(pack, context)));

    const confirmations: SyncAction[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        result.successfulCreations++;
        result.vendorInventoryIds[outcome.pack.internalPackId] = outcome.vendorInventoryId;
        confirmations.push({
          kind: 'sync',
          packId: outcome.pack.internalPackId,
          packData: outcome.pack,
          confirmation: { vendorInventoryId: outcome.vendorInventoryId, confirmedAt: new Date() },
        });
      } else {
        result.failedCreations++;
        result.failures.push(outcome.failure);
        result.errors.push(`${outcome.failure.packId}: ${outcome.failure.message}`);
      }
    }

    // Confirmations are written only after every vendor call settled
    if (confirmations.length > 0) {
      const summary = await this.executor.confirmSyncs(performanceId, confirmations);
      for (const error of summary.errors) {
        this.log(`Vendor listing created but not recorded: ${error}`, 'error');
        result.errors.push(error);
      }
    }

    for (const failure of result.failures) {
      await this.executor.recordPushFailure(failure.packId, failure.message);
      this.eventBus?.emitPushFailed(failure);
    }

    this.log(
      `Pushed ${result.successfulCreations}/${packs.length} packs for performance ${performanceId}`,
      result.failedCreations > 0 ? 'warn' : 'info'
    );
    return result;
  }

  /**
   * Delete vendor listings of delisted packs. The local records stay
   * inactive whatever the vendor answers; a failed deletion stays owed.
   */
  async delistSeatPacks(packs: SeatPack[]): Promise<DelistResult> {
    const result: DelistResult = { delistedCount: 0, failedCount: 0, errors: [] };
    const owed = packs.filter(owesVendorDeletion);

    await Promise.all(
      owed.map(async (pack) => {
        const vendorInventoryId = pack.pos.status === 'inactive' ? pack.pos.vendorInventoryId : null;
        try {
          if (vendorInventoryId) {
            await this.queue.add(
              () => this.withDeadline((signal) => this.vendor.delist(pack, vendorInventoryId, signal)),
              { throwOnTimeout: true }
            );
          } else {
            this.log(`Pack ${pack.internalPackId} has no vendor listing id, marking deletion settled`, 'warn');
          }
          await this.executor.settleDeletion(pack.internalPackId);
          result.delistedCount++;
        } catch (error) {
          result.failedCount++;
          result.errors.push(`${pack.internalPackId}: ${errorMessage(error)}`);
          this.log(`Vendor delete failed for ${pack.internalPackId}: ${errorMessage(error)}`, 'warn');
        }
      })
    );

    return result;
  }

  /**
   * Periodic sweep over packs never confirmed at the vendor and vendor
   * deletions still owed.
   */
  async syncPendingPacks(options: SweepOptions = {}): Promise<SweepResult> {
    const excluded = options.excludePackIds ?? new Set<string>();
    const query = { performanceId: options.performanceId, limit: this.config.sweepBatchSize };
    const result: SweepResult = { created: 0, deleted: 0, failed: 0, skipped: 0, errors: [] };

    const pendingCreation = (await this.repository.findPendingCreation(query)).filter(
      (pack) => !excluded.has(pack.internalPackId)
    );
    const pendingDeletion = (await this.repository.findPendingDeletion(query)).filter(
      (pack) => !excluded.has(pack.internalPackId)
    );

    const byPerformance = new Map<string, { creations: SeatPack[]; deletions: SeatPack[] }>();
    const bucket = (performanceId: string) => {
      let entry = byPerformance.get(performanceId);
      if (!entry) {
        entry = { creations: [], deletions: [] };
        byPerformance.set(performanceId, entry);
      }
      return entry;
    };

    for (const pack of pendingCreation) {
      if (pushAttempts(pack) >= this.config.maxPushAttempts) {
        result.skipped++;
        continue;
      }
      bucket(pack.performanceId).creations.push(pack);
    }
    for (const pack of pendingDeletion) {
      bucket(pack.performanceId).deletions.push(pack);
    }

    for (const [performanceId, { creations, deletions }] of byPerformance) {
      const total = creations.length + deletions.length;
      const lookup = await this.directory.getContext(performanceId);
      if (!lookup.found) {
        this.log(`Performance ${performanceId} not found, skipping ${total} packs`, 'warn');
        result.skipped += total;
        continue;
      }
      // Listings made before POS was switched off are still withdrawn
      if (!lookup.value.performance.posEnabled) {
        result.skipped += creations.length;
      } else {
        const pushed = await this.createBulkInventory(creations, lookup.value);
        result.created += pushed.successfulCreations;
        result.failed += pushed.failedCreations;
        result.errors.push(...pushed.errors);
      }

      const deleted = await this.delistSeatPacks(deletions);
      result.deleted += deleted.delistedCount;
      result.failed += deleted.failedCount;
      result.errors.push(...deleted.errors);
    }

    this.log(
      `Sweep${options.performanceId ? ` of ${options.performanceId}` : ''}: created=${result.created}, ` +
        `deleted=${result.deleted}, failed=${result.failed}, skipped=${result.skipped}`
    );
    this.eventBus?.emitSweepCompleted(result);
    return result;
  }

  private async pushOne(pack: SeatPack, context: PerformanceContext): Promise<PushOutcome> {
    const blocker = pushBlocker(pack);
    if (blocker) {
      return { ok: false, failure: { packId: pack.internalPackId, message: blocker, retryable: false } };
    }

    try {
      const { vendorInventoryId } = await this.queue.add(
        () => this.withDeadline((signal) => this.vendor.push(pack, context, signal)),
        { throwOnTimeout: true }
      );
      return { ok: true, pack, vendorInventoryId };
    } catch (error) {
      return {
        ok: false,
        failure: {
          packId: pack.internalPackId,
          message: errorMessage(error),
          retryable: error instanceof ExternalServiceError ? error.retryable : true,
        },
      };
    }
  }

  /**
   * Runs one vendor call under pushTimeoutMs. On expiry the call's signal is
   * aborted so the vendor request is cancelled rather than left to land later.
   */
  private async withDeadline<T>(call: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const timeoutMs = this.config.pushTimeoutMs;
    const timer = setTimeout(() => {
      controller.abort(new ExternalServiceError(`Vendor call timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    const expired = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });

    try {
      return await Promise.race([call(controller.signal), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private log(message: string, level: 'info' | 'warn' | 'error' = 'info'): void {
    const prefix = `[InventoryPusher]`;
    const timestamp = new Date().toISOString();

    switch (level) {
      case 'error':
        console.error(`${timestamp} ${prefix} ERROR: ${message}`);
        break;
      case 'warn':
        console.warn(`${timestamp} ${prefix} WARN: ${message}`);
        break;
      default:
        if (this.config.debug) {
          console.log(`${timestamp} ${prefix} ${message}`);
        }
    }
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createInventoryPusher(deps: InventoryPusherDependencies): InventoryPusher {
  return new InventoryPusher(deps);
}
