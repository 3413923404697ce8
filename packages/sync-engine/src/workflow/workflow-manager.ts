/**
 * Workflow Manager
 * Runs one reconcile-and-sync pass for a performance:
 *
 *   START → RECONCILE → EXECUTE → PUSH_POS → SWEEP_PENDING → DONE
 *
 * Any stage may fail the pass. EXECUTE is atomic; vendor calls happen only
 * after it committed and are reported, never rolled back.
 */

import { randomUUID } from 'crypto';
import { CatastrophicError, LockUnavailableError, errorMessage } from '../errors.js';
import type { PackSyncEventBus } from '../events.js';
import { awaitsVendorPush } from '../executor/pack-state.js';
import type { SyncExecutor } from '../executor/sync-executor.js';
import type { InventoryPusher } from '../pos/inventory-pusher.js';
import type { Notifier, PerformanceDirectory, SeatPackRepository } from '../ports.js';
import { PackReconciler } from '../reconciler/reconciler.js';
import type {
  CandidatePack,
  DelistAction,
  DelistReason,
  PerformanceContext,
  SeatPack,
  SweepResult,
  SyncExecutionSummary,
  SyncPlan,
  WorkflowErrorCode,
  WorkflowNotification,
  WorkflowResult,
  WorkflowScenario,
  WorkflowStage,
} from '../types.js';
import type { PerformanceLock } from './performance-lock.js';

// ============================================================================
// Stage Machine
// ============================================================================

const TRANSITIONS: Record<WorkflowStage, WorkflowStage[]> = {
  START: ['RECONCILE', 'EXECUTE', 'FAILED'],
  RECONCILE: ['EXECUTE', 'FAILED'],
  EXECUTE: ['PUSH_POS', 'FAILED'],
  PUSH_POS: ['SWEEP_PENDING', 'DONE', 'FAILED'],
  SWEEP_PENDING: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

export class WorkflowStageMachine {
  private current: WorkflowStage = 'START';
  private readonly history: WorkflowStage[] = ['START'];

  get stage(): WorkflowStage {
    return this.current;
  }

  get stages(): WorkflowStage[] {
    return [...this.history];
  }

  advance(next: WorkflowStage): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal workflow transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.history.push(next);
  }

  fail(): void {
    if (this.current !== 'FAILED') {
      this.advance('FAILED');
    }
  }
}

// ============================================================================
// Workflow Manager Dependencies
// ============================================================================

export interface WorkflowManagerDependencies {
  repository: SeatPackRepository;
  directory: PerformanceDirectory;
  executor: SyncExecutor;
  pusher: InventoryPusher;
  notifier: Notifier;
  lock: PerformanceLock;
  reconciler?: PackReconciler;
  eventBus?: PackSyncEventBus;
  /** Packs examined when looking for performances to sweep */
  sweepBatchSize?: number;
  debug?: boolean;
}

/** Running totals of one pass */
interface Tally {
  totalPacksProcessed: number;
  packsCreated: number;
  packsUpdated: number;
  packsDelisted: number;
  packsSynced: number;
  posInventoriesCreated: number;
  posInventoriesDeleted: number;
  failedActions: number;
  posFailures: number;
  warnings: string[];
  errorMessages: string[];
  errorCode: WorkflowErrorCode | null;
  /** Packs a vendor call was made for in this pass; the sweep leaves them alone */
  attempted: Set<string>;
}

type Pipeline = (context: PerformanceContext, machine: WorkflowStageMachine, tally: Tally) => Promise<void>;

class PerformanceNotFoundError extends Error {
  constructor(performanceId: string) {
    super(`Performance ${performanceId} not found`);
    this.name = 'PerformanceNotFoundError';
  }
}

// ============================================================================
// Workflow Manager Class
// ============================================================================

export class WorkflowManager {
  private readonly repository: SeatPackRepository;
  private readonly directory: PerformanceDirectory;
  private readonly executor: SyncExecutor;
  private readonly pusher: InventoryPusher;
  private readonly notifier: Notifier;
  private readonly lock: PerformanceLock;
  private readonly reconciler: PackReconciler;
  private readonly eventBus: PackSyncEventBus | undefined;
  private readonly sweepBatchSize: number;
  private readonly debug: boolean;

  constructor(deps: WorkflowManagerDependencies) {
    this.repository = deps.repository;
    this.directory = deps.directory;
    this.executor = deps.executor;
    this.pusher = deps.pusher;
    this.notifier = deps.notifier;
    this.lock = deps.lock;
    this.debug = deps.debug ?? false;
    this.reconciler = deps.reconciler ?? new PackReconciler({ debug: this.debug });
    this.eventBus = deps.eventBus;
    this.sweepBatchSize = deps.sweepBatchSize ?? 200;
  }

  // ==========================================================================
  // Entry Points
  // ==========================================================================

  /**
   * First scrape of a performance: every candidate becomes a pack.
   */
  async processInitialScrape(performanceId: string, candidates: CandidatePack[]): Promise<WorkflowResult> {
    return this.lock.withLock(performanceId, () => this.runInitial(performanceId, candidates));
  }

  /**
   * Later scrape: reconcile against the active packs and apply the diff.
   */
  async processSubsequentScrape(
    performanceId: string,
    candidates: CandidatePack[]
  ): Promise<WorkflowResult> {
    return this.lock.withLock(performanceId, () => this.runSubsequent(performanceId, candidates));
  }

  /**
   * Pick the initial or subsequent scenario from whether active packs exist.
   */
  async processAutoDetectScenario(
    performanceId: string,
    candidates: CandidatePack[]
  ): Promise<WorkflowResult> {
    return this.lock.withLock(performanceId, async () => {
      const hasActive = await this.repository.hasActivePacks(performanceId);
      this.log(
        `Performance ${performanceId} has ${hasActive ? 'active packs: subsequent' : 'no active packs: initial'} scenario`
      );
      return hasActive
        ? this.runSubsequent(performanceId, candidates)
        : this.runInitial(performanceId, candidates);
    });
  }

  /**
   * Delist packs on an operator's request and withdraw their listings.
   */
  async processManualDelist(
    performanceId: string,
    packIds: string[],
    actor: string
  ): Promise<WorkflowResult> {
    return this.lock.withLock(performanceId, () =>
      this.runDelistAll(performanceId, 'manual_delist', packIds, actor)
    );
  }

  /**
   * Retire every active pack of a performance that was switched off.
   */
  async processPerformanceDisabled(performanceId: string): Promise<WorkflowResult> {
    return this.lock.withLock(performanceId, () =>
      this.runDelistAll(performanceId, 'performance_disabled', null)
    );
  }

  /**
   * Sweep pending packs. Without a performance id every performance with
   * pending work is swept in turn, each under its own lock.
   */
  async runSweep(performanceId?: string): Promise<SweepResult> {
    if (performanceId) {
      return this.lock.withLock(performanceId, () => this.pusher.syncPendingPacks({ performanceId }));
    }

    const query = { limit: this.sweepBatchSize };
    const pending = [
      ...(await this.repository.findPendingCreation(query)),
      ...(await this.repository.findPendingDeletion(query)),
    ];
    const performanceIds = [...new Set(pending.map((pack) => pack.performanceId))].sort();

    const total: SweepResult = { created: 0, deleted: 0, failed: 0, skipped: 0, errors: [] };
    for (const id of performanceIds) {
      try {
        const result = await this.lock.withLock(id, () =>
          this.pusher.syncPendingPacks({ performanceId: id })
        );
        total.created += result.created;
        total.deleted += result.deleted;
        total.failed += result.failed;
        total.skipped += result.skipped;
        total.errors.push(...result.errors);
      } catch (error) {
        if (!(error instanceof LockUnavailableError)) {
          throw error;
        }
        // A pass holding the lock sweeps this performance itself
        this.log(`Skipping sweep of ${id}: ${error.message}`);
      }
    }
    return total;
  }

  // ==========================================================================
  // Scenarios
  // ==========================================================================

  private runInitial(performanceId: string, candidates: CandidatePack[]): Promise<WorkflowResult> {
    return this.run('initial', performanceId, async (context, machine, tally) => {
      const posEnabled = context.performance.posEnabled;
      tally.totalPacksProcessed = candidates.length;

      machine.advance('EXECUTE');
      const plan = this.reconciler.planCreations(candidates, posEnabled, performanceId);
      const summary = await this.execute(plan, context, true, tally);

      machine.advance('PUSH_POS');
      if (posEnabled) {
        await this.pushCreations(summary.createdPacks, context, tally);
      }

      machine.advance('SWEEP_PENDING');
      if (posEnabled) {
        await this.sweep(performanceId, tally);
      }
    });
  }

  private runSubsequent(performanceId: string, candidates: CandidatePack[]): Promise<WorkflowResult> {
    return this.run('subsequent', performanceId, async (context, machine, tally) => {
      const posEnabled = context.performance.posEnabled;
      tally.totalPacksProcessed = candidates.length;

      machine.advance('RECONCILE');
      const existing = await this.repository.findActiveByPerformance(performanceId);
      const plan = this.reconciler.diff(existing, candidates, posEnabled, performanceId);

      machine.advance('EXECUTE');
      const summary = await this.execute(plan, context, false, tally);

      machine.advance('PUSH_POS');
      if (posEnabled) {
        const deferred = await this.packsAwaitingPush(performanceId, summary.deferredSyncPackIds);
        await this.pushCreations([...summary.createdPacks, ...deferred], context, tally);
        await this.withdrawListings(summary.delistedPacks, tally);
      }

      machine.advance('SWEEP_PENDING');
      if (posEnabled) {
        await this.sweep(performanceId, tally);
      }
    });
  }

  private runDelistAll(
    performanceId: string,
    reason: Extract<DelistReason, 'manual_delist' | 'performance_disabled'>,
    packIds: string[] | null,
    actor?: string
  ): Promise<WorkflowResult> {
    return this.run(reason, performanceId, async (context, machine, tally) => {
      machine.advance('RECONCILE');
      const active = await this.repository.findActiveByPerformance(performanceId);
      const activeIds = new Set(active.map((pack) => pack.internalPackId));
      const targets = packIds ?? [...activeIds];
      tally.totalPacksProcessed = targets.length;

      const missing = targets.filter((id) => !activeIds.has(id));
      if (missing.length > 0) {
        tally.warnings.push(`${missing.length} packs are not active and were not delisted`);
      }

      const plan: SyncPlan = {
        performanceId,
        posEnabled: context.performance.posEnabled,
        creations: [],
        updates: [],
        delists: targets
          .filter((id) => activeIds.has(id))
          .map((packId): DelistAction => ({ kind: 'delist', packId, reason, actor })),
        syncs: [],
        warnings: [],
        suspectEmptyScrape: false,
      };

      machine.advance('EXECUTE');
      const summary = await this.execute(plan, context, false, tally);

      // Packs listed while POS was enabled still owe their deletion
      machine.advance('PUSH_POS');
      await this.withdrawListings(summary.delistedPacks, tally);
    });
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  private async execute(
    plan: SyncPlan,
    context: PerformanceContext,
    isInitialScrape: boolean,
    tally: Tally
  ): Promise<SyncExecutionSummary> {
    tally.warnings.push(...plan.warnings);
    const summary = await this.executor.execute(plan, context, isInitialScrape);

    tally.packsCreated += summary.createdCount;
    tally.packsUpdated += summary.updatedCount;
    tally.packsDelisted += summary.delistedCount;
    tally.packsSynced += summary.syncedCount;
    tally.failedActions += summary.failedActions;
    tally.errorMessages.push(...summary.errors);
    return summary;
  }

  private async pushCreations(packs: SeatPack[], context: PerformanceContext, tally: Tally): Promise<void> {
    if (packs.length === 0) {
      return;
    }
    packs.forEach((pack) => tally.attempted.add(pack.internalPackId));

    const result = await this.pusher.createBulkInventory(packs, context);
    tally.posInventoriesCreated += result.successfulCreations;
    tally.packsSynced += result.successfulCreations;
    if (result.failedCreations > 0) {
      tally.posFailures += result.failedCreations;
      tally.warnings.push(`${result.failedCreations} new pack inventory creations failed`);
      tally.errorMessages.push(...result.errors);
    }
  }

  private async withdrawListings(packs: SeatPack[], tally: Tally): Promise<void> {
    if (packs.length === 0) {
      return;
    }
    packs.forEach((pack) => tally.attempted.add(pack.internalPackId));

    const result = await this.pusher.delistSeatPacks(packs);
    tally.posInventoriesDeleted += result.delistedCount;
    if (result.failedCount > 0) {
      tally.posFailures += result.failedCount;
      tally.warnings.push(`${result.failedCount} pack inventory deletions failed`);
      tally.errorMessages.push(...result.errors);
    }
  }

  private async sweep(performanceId: string, tally: Tally): Promise<void> {
    const result = await this.pusher.syncPendingPacks({
      performanceId,
      excludePackIds: tally.attempted,
    });
    tally.posInventoriesCreated += result.created;
    tally.packsSynced += result.created;
    tally.posInventoriesDeleted += result.deleted;
    if (result.failed > 0) {
      tally.posFailures += result.failed;
      tally.warnings.push(`${result.failed} pending pack syncs failed`);
      tally.errorMessages.push(...result.errors);
    }
  }

  private async packsAwaitingPush(performanceId: string, packIds: string[]): Promise<SeatPack[]> {
    if (packIds.length === 0) {
      return [];
    }
    const wanted = new Set(packIds);
    const active = await this.repository.findActiveByPerformance(performanceId);
    return active.filter((pack) => wanted.has(pack.internalPackId) && awaitsVendorPush(pack));
  }

  // ==========================================================================
  // Pass Lifecycle
  // ==========================================================================

  private async run(
    scenario: WorkflowScenario,
    performanceId: string,
    pipeline: Pipeline
  ): Promise<WorkflowResult> {
    const startedAt = Date.now();
    const operationId = randomUUID();
    const machine = new WorkflowStageMachine();
    const tally: Tally = {
      totalPacksProcessed: 0,
      packsCreated: 0,
      packsUpdated: 0,
      packsDelisted: 0,
      packsSynced: 0,
      posInventoriesCreated: 0,
      posInventoriesDeleted: 0,
      failedActions: 0,
      posFailures: 0,
      warnings: [],
      errorMessages: [],
      errorCode: null,
      attempted: new Set(),
    };

    this.log(`Starting ${scenario} workflow ${operationId} for performance ${performanceId}`);
    this.eventBus?.emitWorkflowStarted({ operationId, performanceId, scenario });
    this.notify({ type: 'sync-started', operationId, performanceId, scenario, timestamp: new Date() });

    try {
      const lookup = await this.directory.getContext(performanceId);
      if (!lookup.found) {
        throw new PerformanceNotFoundError(performanceId);
      }
      await pipeline(lookup.value, machine, tally);
      machine.advance('DONE');
    } catch (error) {
      const failedAt = machine.stage;
      machine.fail();
      tally.errorCode =
        error instanceof PerformanceNotFoundError
          ? 'PERFORMANCE_NOT_FOUND'
          : error instanceof CatastrophicError
            ? 'EXECUTION_FAILED'
            : 'STAGE_FAILED';
      tally.errorMessages.push(errorMessage(error));
      this.log(`Workflow ${operationId} failed at ${failedAt}: ${errorMessage(error)}`, 'error');
      this.notify({
        type: 'error',
        operationId,
        performanceId,
        scenario,
        message: errorMessage(error),
        timestamp: new Date(),
      });
    }

    const result: WorkflowResult = {
      success:
        machine.stage === 'DONE' && tally.failedActions === 0 && tally.posFailures === 0,
      scenario,
      performanceId,
      operationId,
      stages: machine.stages,
      totalPacksProcessed: tally.totalPacksProcessed,
      packsCreated: tally.packsCreated,
      packsUpdated: tally.packsUpdated,
      packsDelisted: tally.packsDelisted,
      packsSynced: tally.packsSynced,
      posInventoriesCreated: tally.posInventoriesCreated,
      posInventoriesDeleted: tally.posInventoriesDeleted,
      executionTimeMs: Date.now() - startedAt,
      warnings: tally.warnings,
      errorMessages: tally.errorMessages,
      errorCode: tally.errorCode,
    };

    this.log(
      `Workflow ${operationId} ${result.success ? 'succeeded' : 'finished with failures'}: ` +
        `created=${result.packsCreated}, updated=${result.packsUpdated}, delisted=${result.packsDelisted}, ` +
        `pos created=${result.posInventoriesCreated}, pos deleted=${result.posInventoriesDeleted}`,
      result.success ? 'info' : 'warn'
    );
    this.eventBus?.emitWorkflowFinished(result);
    this.notify({
      type: 'sync-completed',
      operationId,
      performanceId,
      scenario,
      success: result.success,
      counts: {
        created: result.packsCreated,
        updated: result.packsUpdated,
        delisted: result.packsDelisted,
        synced: result.packsSynced,
        posCreated: result.posInventoriesCreated,
        posDeleted: result.posInventoriesDeleted,
      },
      warnings: result.warnings,
      timestamp: new Date(),
    });
    return result;
  }

  /**
   * Fire-and-forget: a failing notifier is logged and never reaches the result.
   */
  private notify(notification: WorkflowNotification): void {
    try {
      void this.notifier.notify(notification).catch((error: unknown) => {
        this.log(`Notification ${notification.type} failed: ${errorMessage(error)}`, 'warn');
      });
    } catch (error) {
      this.log(`Notification ${notification.type} failed: ${errorMessage(error)}`, 'warn');
    }
  }

  private log(message: string, level: 'info' | 'warn' | 'error' = 'info'): void {
    const prefix = `[WorkflowManager]`;
    const timestamp = new Date().toISOString();

    switch (level) {
      case 'error':
        console.error(`${timestamp} ${prefix} ERROR: ${message}`);
        break;
      case 'warn':
        console.warn(`${timestamp} ${prefix} WARN: ${message}`);
        break;
      default:
        if (this.debug) {
          console.log(`${timestamp} ${prefix} ${message}`);
        }
    }
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createWorkflowManager(deps: WorkflowManagerDependencies): WorkflowManager {
  return new WorkflowManager(deps);
}
