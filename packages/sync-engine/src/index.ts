/**
 * PackSync - Sync Engine
 * Reconciles scraped seat packs against stored inventory and keeps the
 * POS vendor's listings in step.
 *
 * Components:
 * - PackComparator: relates vanished packs to new ones (split, merge, shrink)
 * - PackReconciler: diffs active packs against a scrape into a SyncPlan
 * - SyncExecutor: applies a plan atomically, one savepoint per action
 * - InventoryPusher: vendor pushes, deletions and the pending sweep
 * - WorkflowManager: runs one locked pass per performance
 *
 * @packageDocumentation
 */

// ============================================================================
// Main Engine
// ============================================================================

export {
  ReconciliationEngine,
  createReconciliationEngine,
  type ReconciliationEngineDependencies,
} from './engine.js';

// ============================================================================
// Agents
// ============================================================================

export {
  ReconcileAgent,
  createReconcileAgent,
  SCRAPE_COMPLETED_QUEUE,
  type ReconcileAgentDependencies,
  SweepAgent,
  createSweepAgent,
  SWEEP_QUEUE,
  type SweepAgentDependencies,
} from './agents/index.js';

// ============================================================================
// Components
// ============================================================================

export { PackComparator, type PackComparatorOptions } from './reconciler/comparator.js';
export {
  PackReconciler,
  PackClassification,
  type PackReconcilerOptions,
} from './reconciler/reconciler.js';
export {
  parseSeatRange,
  rangeKey,
  locationKey,
  comparePackStructure,
  type SeatRange,
} from './reconciler/seat-range.js';

export {
  SyncExecutor,
  createSyncExecutor,
  formatPackId,
  type SyncExecutorDependencies,
} from './executor/sync-executor.js';
export { delistedPack, posStateAfterDelist, isActive, owesVendorDeletion } from './executor/pack-state.js';

export {
  InventoryPusher,
  createInventoryPusher,
  type InventoryPusherDependencies,
} from './pos/inventory-pusher.js';

export {
  WorkflowManager,
  WorkflowStageMachine,
  createWorkflowManager,
  type WorkflowManagerDependencies,
} from './workflow/workflow-manager.js';

export {
  DistributedPerformanceLock,
  InProcessPerformanceLock,
  createRedisLockStore,
  createRedisPerformanceLock,
  type LockStore,
  type PerformanceLock,
} from './workflow/performance-lock.js';

// ============================================================================
// Event Bus
// ============================================================================

export { PackSyncEventBus, createEventBus } from './events.js';

// ============================================================================
// Ports and Errors
// ============================================================================

export * from './ports.js';
export * from './errors.js';

// ============================================================================
// Types
// ============================================================================

export * from './types.js';
