/**
 * Sync Executor
 * Applies a SyncPlan to storage inside one transaction. Each action runs in
 * its own savepoint: a failed action is recorded and its siblings proceed,
 * while a CatastrophicError rolls the whole plan back.
 */

import {
  CatastrophicError,
  IdentityCollisionError,
  ValidationError,
  errorMessage,
  isActionRecoverable,
} from '../errors.js';
import type { SeatPackRepository, SeatPackStore, SeatPackTransaction } from '../ports.js';
import type {
  CandidatePack,
  CreationAction,
  DelistAction,
  ExecutionActionType,
  ExecutionResult,
  PerformanceContext,
  SeatPack,
  SyncAction,
  SyncExecutionSummary,
  SyncExecutorConfig,
  SyncPlan,
  UpdateAction,
} from '../types.js';
import { DEFAULT_EXECUTOR_CONFIG } from '../types.js';
import {
  delistedPack,
  failedPushState,
  isActive,
  isSyncedAs,
  owesVendorDeletion,
  settledDeletionState,
} from './pack-state.js';

// ============================================================================
// Pack Id Allocation
// ============================================================================

export function formatPackId(prefix: string, performanceId: string, seq: number): string {
  return `${prefix}_PACK_${performanceId}_${String(seq).padStart(4, '0')}`;
}

/**
 * Hands out sequence numbers for one performance, starting after the
 * number of packs it ever had and skipping ids already taken.
 */
class PackIdAllocator {
  private nextSeq: number | null = null;

  constructor(
    private readonly prefix: string,
    private readonly performanceId: string,
    private readonly retryLimit: number
  ) {}

  async next(store: SeatPackStore): Promise<string> {
    if (this.nextSeq === null) {
      this.nextSeq = (await store.countByPerformance(this.performanceId)) + 1;
    }

    let candidate = '';
    for (let attempt = 0; attempt < this.retryLimit; attempt++) {
      candidate = formatPackId(this.prefix, this.performanceId, this.nextSeq);
      this.nextSeq++;
      if (!(await store.idExists(candidate))) {
        return candidate;
      }
    }
    throw new IdentityCollisionError(candidate);
  }
}

// ============================================================================
// Executor Types
// ============================================================================

export interface SyncExecutorDependencies {
  repository: SeatPackRepository;
  config?: Partial<SyncExecutorConfig>;
  /** Clock, injectable for tests */
  now?: () => Date;
}

interface ActionOutcome {
  affectedRows?: number;
  createdPackId?: string;
  note?: string;
}

interface ExecutionState {
  results: ExecutionResult[];
  createdPacks: SeatPack[];
  delistedPacks: SeatPack[];
  deferredSyncPackIds: string[];
  syncedCount: number;
}

function validateCandidate(pack: CandidatePack): void {
  if (!pack.zoneId.trim() || !pack.rowLabel.trim()) {
    throw new ValidationError('Pack is missing its zone or row');
  }
  if (!Number.isInteger(pack.packSize) || pack.packSize <= 0) {
    throw new ValidationError(`Invalid pack size: ${pack.packSize}`);
  }
  if (!Number.isFinite(pack.packPrice) || pack.packPrice < 0) {
    throw new ValidationError(`Invalid pack price: ${pack.packPrice}`);
  }
  if (!Number.isFinite(pack.totalPrice) || pack.totalPrice < 0) {
    throw new ValidationError(`Invalid total price: ${pack.totalPrice}`);
  }
}

// ============================================================================
// Sync Executor Class
// ============================================================================

export class SyncExecutor {
  private readonly repository: SeatPackRepository;
  private readonly config: SyncExecutorConfig;
  private readonly now: () => Date;

  constructor(deps: SyncExecutorDependencies) {
    this.repository = deps.repository;
    this.config = { ...DEFAULT_EXECUTOR_CONFIG, ...deps.config };
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Apply a plan. On an initial scrape every delist is skipped.
   */
  async execute(
    plan: SyncPlan,
    context: PerformanceContext,
    isInitialScrape: boolean
  ): Promise<SyncExecutionSummary> {
    const startedAt = Date.now();
    const performanceId = context.performance.internalPerformanceId;

    if (plan.performanceId !== performanceId) {
      throw new ValidationError(
        `Plan for ${plan.performanceId} cannot be applied to performance ${performanceId}`
      );
    }

    const skippedDelists = isInitialScrape ? plan.delists.length : 0;
    if (skippedDelists > 0) {
      this.log(`Initial scrape of ${performanceId}: skipping ${skippedDelists} delists`, 'warn');
    }

    const state = await this.inTransaction(performanceId, async (tx) => {
      const state = this.emptyState();
      const allocator = new PackIdAllocator(
        this.config.sourcePrefix,
        performanceId,
        this.config.idRetryLimit
      );

      for (const action of plan.creations) {
        state.results.push(await this.applyCreation(tx, performanceId, action, allocator, state));
      }
      for (const action of plan.updates) {
        state.results.push(await this.applyUpdate(tx, action));
      }
      if (!isInitialScrape) {
        for (const action of plan.delists) {
          state.results.push(await this.applyDelist(tx, action, state));
        }
      }
      for (const action of plan.syncs) {
        state.results.push(await this.applySync(tx, action, state));
      }
      return state;
    });

    const summary = this.summarize(performanceId, state, skippedDelists, startedAt);
    this.log(
      `Executed plan for ${performanceId}: ${summary.successfulActions}/${summary.totalActions} actions succeeded ` +
        `(created=${summary.createdCount}, updated=${summary.updatedCount}, delisted=${summary.delistedCount}, ` +
        `synced=${summary.syncedCount}, deferred=${summary.deferredSyncs})`
    );
    return summary;
  }

  /**
   * Mark packs synced after the vendor confirmed their push, in a short
   * transaction of its own. Safe to re-apply.
   */
  async confirmSyncs(performanceId: string, actions: SyncAction[]): Promise<SyncExecutionSummary> {
    const startedAt = Date.now();
    const state = await this.inTransaction(performanceId, async (tx) => {
      const state = this.emptyState();
      for (const action of actions) {
        state.results.push(await this.applySync(tx, action, state));
      }
      return state;
    });
    return this.summarize(performanceId, state, 0, startedAt);
  }

  /**
   * Record a failed vendor push; the pack stays pending for the sweep.
   */
  async recordPushFailure(packId: string, message: string): Promise<void> {
    await this.repository.transaction(async (tx) => {
      const lookup = await tx.findById(packId);
      if (!lookup.found) {
        this.log(`Cannot record push failure: pack ${packId} not found`, 'warn');
        return;
      }
      await tx.update(packId, {
        pos: failedPushState(lookup.value.pos, message),
        updatedAt: this.now(),
      });
    });
  }

  /**
   * Record that the vendor no longer lists a delisted pack.
   */
  async settleDeletion(packId: string): Promise<void> {
    await this.repository.transaction(async (tx) => {
      const lookup = await tx.findById(packId);
      if (!lookup.found || !owesVendorDeletion(lookup.value)) {
        return;
      }
      await tx.update(packId, {
        pos: settledDeletionState(lookup.value.pos),
        updatedAt: this.now(),
      });
    });
  }

  // ==========================================================================
  // Actions
  // ==========================================================================

  private async applyCreation(
    tx: SeatPackTransaction,
    performanceId: string,
    action: CreationAction,
    allocator: PackIdAllocator,
    state: ExecutionState
  ): Promise<ExecutionResult> {
    return this.runAction(action.actionType, null, async () => {
      validateCandidate(action.packData);

      for (let attempt = 1; ; attempt++) {
        const packId = await allocator.next(tx);
        try {
          const pack = await tx.savepoint((store) =>
            store.insert(
              {
                ...action.packData,
                internalPackId: packId,
                performanceId,
                sourceWebsite: this.config.sourceWebsite,
                sourcePackIds: [...action.sourcePackIds],
                packState: action.actionType,
              },
              this.now()
            )
          );
          state.createdPacks.push(pack);
          return { affectedRows: 1, createdPackId: pack.internalPackId };
        } catch (error) {
          if (error instanceof IdentityCollisionError && attempt < this.config.idRetryLimit) {
            this.log(`Pack id ${packId} taken at insert, regenerating`, 'warn');
            continue;
          }
          throw error;
        }
      }
    });
  }

  private async applyUpdate(tx: SeatPackTransaction, action: UpdateAction): Promise<ExecutionResult> {
    return this.runAction('update', action.packId, () =>
      tx.savepoint(async (store) => {
        const lookup = await store.findById(action.packId);
        if (!lookup.found) {
          throw new ValidationError(`Pack ${action.packId} not found`);
        }
        if (!isActive(lookup.value)) {
          throw new ValidationError(`Pack ${action.packId} is inactive and cannot be updated`);
        }
        validateCandidate({ ...lookup.value, ...action.updatedData });

        const affectedRows = await store.update(action.packId, {
          ...action.updatedData,
          updatedAt: this.now(),
        });
        return { affectedRows };
      })
    );
  }

  private async applyDelist(
    tx: SeatPackTransaction,
    action: DelistAction,
    state: ExecutionState
  ): Promise<ExecutionResult> {
    return this.runAction('delist', action.packId, () =>
      tx.savepoint(async (store) => {
        const lookup = await store.findById(action.packId);
        if (!lookup.found) {
          return { note: 'Pack not found, nothing to delist' };
        }
        if (!isActive(lookup.value)) {
          return { note: 'Pack already inactive' };
        }

        const next = delistedPack(lookup.value, action.reason, this.now(), action.actor);
        const affectedRows = await store.update(action.packId, {
          existence: next.existence,
          pos: next.pos,
          packState: next.packState,
          manualDelist: next.manualDelist,
          updatedAt: next.updatedAt,
        });
        state.delistedPacks.push(next);
        return { affectedRows };
      })
    );
  }

  private async applySync(
    tx: SeatPackTransaction,
    action: SyncAction,
    state: ExecutionState
  ): Promise<ExecutionResult> {
    const confirmation = action.confirmation;
    if (!confirmation) {
      return this.runAction('sync', action.packId, async () => {
        state.deferredSyncPackIds.push(action.packId);
        return { note: 'Awaiting vendor push' };
      });
    }

    return this.runAction('sync', action.packId, () =>
      tx.savepoint(async (store) => {
        const lookup = await store.findById(action.packId);
        if (!lookup.found) {
          throw new ValidationError(`Pack ${action.packId} not found`);
        }
        if (!isActive(lookup.value)) {
          throw new ValidationError(`Pack ${action.packId} is inactive and cannot be marked synced`);
        }
        if (isSyncedAs(lookup.value, confirmation.vendorInventoryId)) {
          return { note: 'Already synced' };
        }

        const affectedRows = await store.update(action.packId, {
          pos: { status: 'synced', vendorInventoryId: confirmation.vendorInventoryId },
          updatedAt: confirmation.confirmedAt,
        });
        state.syncedCount += affectedRows > 0 ? 1 : 0;
        return { affectedRows };
      })
    );
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /**
   * Run one action, recording recoverable failures. Anything else is
   * escalated so the enclosing transaction rolls back.
   */
  private async runAction(
    actionType: ExecutionActionType,
    packId: string | null,
    apply: () => Promise<ActionOutcome>
  ): Promise<ExecutionResult> {
    try {
      const outcome = await apply();
      return {
        success: true,
        actionType,
        packId: packId ?? outcome.createdPackId ?? null,
        errorMessage: null,
        createdPackId: outcome.createdPackId ?? null,
        affectedRows: outcome.affectedRows ?? 0,
        note: outcome.note ?? null,
      };
    } catch (error) {
      if (isActionRecoverable(error)) {
        this.log(`${actionType} ${packId ?? '(new pack)'} failed: ${error.message}`, 'warn');
        return {
          success: false,
          actionType,
          packId,
          errorMessage: error.message,
          createdPackId: null,
          affectedRows: 0,
          note: null,
        };
      }
      if (error instanceof CatastrophicError) {
        throw error;
      }
      throw new CatastrophicError(
        `Unexpected failure applying ${actionType} to ${packId ?? 'new pack'}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private async inTransaction<T>(
    performanceId: string,
    fn: (tx: SeatPackTransaction) => Promise<T>
  ): Promise<T> {
    try {
      return await this.repository.transaction(fn);
    } catch (error) {
      this.log(`Transaction for ${performanceId} rolled back: ${errorMessage(error)}`, 'error');
      if (error instanceof CatastrophicError) {
        throw error;
      }
      throw new CatastrophicError(
        `Transaction for performance ${performanceId} failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private emptyState(): ExecutionState {
    return {
      results: [],
      createdPacks: [],
      delistedPacks: [],
      deferredSyncPackIds: [],
      syncedCount: 0,
    };
  }

  private summarize(
    performanceId: string,
    state: ExecutionState,
    skippedDelists: number,
    startedAt: number
  ): SyncExecutionSummary {
    const failed = state.results.filter((r) => !r.success);
    const updatedCount = state.results.filter(
      (r) => r.success && r.actionType === 'update' && r.affectedRows > 0
    ).length;

    return {
      performanceId,
      success: failed.length === 0,
      totalActions: state.results.length,
      successfulActions: state.results.length - failed.length,
      failedActions: failed.length,
      createdCount: state.createdPacks.length,
      updatedCount,
      delistedCount: state.delistedPacks.length,
      syncedCount: state.syncedCount,
      deferredSyncs: state.deferredSyncPackIds.length,
      skippedDelists,
      results: state.results,
      createdPacks: state.createdPacks,
      delistedPacks: state.delistedPacks,
      deferredSyncPackIds: state.deferredSyncPackIds,
      errors: failed.map((r) => `${r.actionType} ${r.packId ?? '(new pack)'}: ${r.errorMessage ?? 'failed'}`),
      executionTimeMs: Date.now() - startedAt,
    };
  }

  private log(message: string, level: 'info' | 'warn' | 'error' = 'info'): void {
    const prefix = `[SyncExecutor]`;
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

export function createSyncExecutor(deps: SyncExecutorDependencies): SyncExecutor {
  return new SyncExecutor(deps);
}
