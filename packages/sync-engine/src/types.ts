/**
 * Sync Engine Types
 * Seat packs, their lifecycle dimensions, sync plans and execution reports
 */

// ============================================================================
// Lifecycle Dimensions
// ============================================================================

export type DelistReason = 'vanished' | 'transformed' | 'manual_delist' | 'performance_disabled';

export type TransformationType = 'split' | 'merge' | 'shrink' | 'transformed';

/** Kind of creation: organic, or the product of a transformation */
export type CreationType = 'create' | TransformationType;

/** Cause of the most recent transition of a pack */
export type PackState = CreationType | 'delist';

/** Whether our system currently offers the pack */
export type PackExistence =
  | { status: 'active' }
  | { status: 'inactive'; reason: DelistReason; delistedAt: Date };

/**
 * Sync state against the POS vendor.
 * `pending` packs were never confirmed listed, `synced` ones are listed,
 * `inactive` ones were withdrawn and may still owe a vendor-side deletion.
 */
export type PosSyncState =
  | { status: 'pending'; attempts: number; lastError: string | null }
  | { status: 'synced'; vendorInventoryId: string | null }
  | { status: 'inactive'; vendorInventoryId: string | null; deletion: 'owed' | 'settled' };

export interface ManualDelist {
  by: string;
  at: Date;
}

// ============================================================================
// Seat Pack Types
// ============================================================================

/** Structural attributes shared by persisted packs and scrape candidates */
export interface PackStructure {
  zoneId: string;
  levelId: string | null;
  sectionId: string | null;
  rowLabel: string;
  startSeatNumber: string;
  endSeatNumber: string;
  packSize: number;
  /** Price per seat */
  packPrice: number;
  totalPrice: number;
  /** Opaque identities of the underlying seats */
  seatKeys: string[];
}

/** A pack produced by the latest scrape, without identity */
export type CandidatePack = PackStructure;

export interface SeatPack extends PackStructure {
  internalPackId: string;
  performanceId: string;
  sourcePackIds: string[];
  existence: PackExistence;
  pos: PosSyncState;
  packState: PackState;
  manualDelist: ManualDelist | null;
  createdAt: Date;
  updatedAt: Date;
}

export type UpdatableField = 'packSize' | 'packPrice' | 'totalPrice';

export interface FieldChange {
  from: number;
  to: number;
}

export type PackChanges = Partial<Record<UpdatableField, FieldChange>>;

// ============================================================================
// Sync Plan Types
// ============================================================================

export interface CreationAction {
  kind: 'create';
  packData: CandidatePack;
  actionType: CreationType;
  sourcePackIds: string[];
}

export interface UpdateAction {
  kind: 'update';
  packId: string;
  updatedData: Partial<Pick<PackStructure, UpdatableField>>;
  changes: PackChanges;
}

export interface DelistAction {
  kind: 'delist';
  packId: string;
  reason: DelistReason;
  /** Operator responsible for a manual delist */
  actor?: string;
}

export interface SyncConfirmation {
  vendorInventoryId: string;
  confirmedAt: Date;
}

/**
 * Marks a pack synced once the vendor confirmed the push.
 * Without a confirmation the pack is only known to still need pushing.
 */
export interface SyncAction {
  kind: 'sync';
  packId: string;
  packData: PackStructure;
  confirmation: SyncConfirmation | null;
}

export type PlanAction = CreationAction | UpdateAction | DelistAction | SyncAction;

export interface SyncPlan {
  performanceId: string;
  posEnabled: boolean;
  creations: CreationAction[];
  updates: UpdateAction[];
  delists: DelistAction[];
  syncs: SyncAction[];
  warnings: string[];
  /** Set when an empty scrape met existing inventory and delists were withheld */
  suspectEmptyScrape: boolean;
}

export interface PackTransformation {
  transformationType: TransformationType;
  consumedPackIds: string[];
  resultingPacks: CandidatePack[];
}

// ============================================================================
// Performance Context Types
// ============================================================================

export interface PerformanceRecord {
  internalPerformanceId: string;
  internalEventId: string;
  internalVenueId: string;
  posEnabled: boolean;
  name: string | null;
  startsAt: Date | null;
}

export interface EventRecord {
  internalEventId: string;
  name: string;
}

export interface VenueRecord {
  internalVenueId: string;
  name: string;
  city: string | null;
  stateProvince: string | null;
  countryCode: string | null;
  timezone: string | null;
}

export interface PerformanceContext {
  performance: PerformanceRecord;
  event: EventRecord;
  venue: VenueRecord;
}

// ============================================================================
// Execution Report Types
// ============================================================================

export type ExecutionActionType = CreationType | 'update' | 'delist' | 'sync';

export interface ExecutionResult {
  success: boolean;
  actionType: ExecutionActionType;
  /** Target pack, or null for a creation that never got an id */
  packId: string | null;
  errorMessage: string | null;
  createdPackId: string | null;
  affectedRows: number;
  note: string | null;
}

export interface SyncExecutionSummary {
  performanceId: string;
  success: boolean;
  totalActions: number;
  successfulActions: number;
  failedActions: number;
  createdCount: number;
  updatedCount: number;
  delistedCount: number;
  syncedCount: number;
  /** Sync actions left for the push stage */
  deferredSyncs: number;
  /** Delists suppressed on an initial scrape */
  skippedDelists: number;
  results: ExecutionResult[];
  createdPacks: SeatPack[];
  delistedPacks: SeatPack[];
  deferredSyncPackIds: string[];
  errors: string[];
  executionTimeMs: number;
}

// ============================================================================
// Vendor Push Types
// ============================================================================

export interface PushFailure {
  packId: string;
  message: string;
  retryable: boolean;
}

export interface BulkInventoryResult {
  attempted: number;
  successfulCreations: number;
  failedCreations: number;
  vendorInventoryIds: Record<string, string>;
  failures: PushFailure[];
  errors: string[];
}

export interface DelistResult {
  delistedCount: number;
  failedCount: number;
  errors: string[];
}

export interface SweepOptions {
  performanceId?: string;
  /** Packs already attempted by the calling pass */
  excludePackIds?: ReadonlySet<string>;
}

export interface SweepResult {
  created: number;
  deleted: number;
  failed: number;
  skipped: number;
  errors: string[];
}

// ============================================================================
// Workflow Types
// ============================================================================

export type WorkflowScenario =
  | 'initial'
  | 'subsequent'
  | 'manual_delist'
  | 'performance_disabled';

export type WorkflowStage =
  | 'START'
  | 'RECONCILE'
  | 'EXECUTE'
  | 'PUSH_POS'
  | 'SWEEP_PENDING'
  | 'DONE'
  | 'FAILED';

export type WorkflowErrorCode = 'PERFORMANCE_NOT_FOUND' | 'EXECUTION_FAILED' | 'STAGE_FAILED';

export interface WorkflowResult {
  success: boolean;
  scenario: WorkflowScenario;
  performanceId: string;
  operationId: string;
  stages: WorkflowStage[];
  totalPacksProcessed: number;
  packsCreated: number;
  packsUpdated: number;
  packsDelisted: number;
  packsSynced: number;
  posInventoriesCreated: number;
  posInventoriesDeleted: number;
  executionTimeMs: number;
  warnings: string[];
  errorMessages: string[];
  errorCode: WorkflowErrorCode | null;
}

export type WorkflowNotification =
  | {
      type: 'sync-started';
      operationId: string;
      performanceId: string;
      scenario: WorkflowScenario;
      timestamp: Date;
    }
  | {
      type: 'sync-completed';
      operationId: string;
      performanceId: string;
      scenario: WorkflowScenario;
      success: boolean;
      counts: {
        created: number;
        updated: number;
        delisted: number;
        synced: number;
        posCreated: number;
        posDeleted: number;
      };
      warnings: string[];
      timestamp: Date;
    }
  | {
      type: 'error';
      operationId: string;
      performanceId: string;
      scenario: WorkflowScenario;
      message: string;
      timestamp: Date;
    };

// ============================================================================
// Job Types
// ============================================================================

export interface ScrapeCompletedJobData {
  performanceId: string;
  candidates: CandidatePack[];
  scrapedAt: string;
}

export interface SweepJobData {
  performanceId?: string;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface SyncExecutorConfig {
  /** Prefix of generated pack ids */
  sourcePrefix: string;
  /** Source website recorded with each pack */
  sourceWebsite: string;
  /** Attempts at a unique pack id before the creation fails */
  idRetryLimit: number;
  debug?: boolean;
}

export const DEFAULT_EXECUTOR_CONFIG: SyncExecutorConfig = {
  sourcePrefix: 'SRC',
  sourceWebsite: 'unknown',
  idRetryLimit: 10,
  debug: false,
};

export interface InventoryPusherConfig {
  /** Concurrent vendor calls */
  concurrency: number;
  /** Timeout of one vendor call in milliseconds */
  pushTimeoutMs: number;
  /** Maximum packs examined by one sweep */
  sweepBatchSize: number;
  /** Pending packs stop being swept after this many failed pushes */
  maxPushAttempts: number;
  debug?: boolean;
}

export const DEFAULT_PUSHER_CONFIG: InventoryPusherConfig = {
  concurrency: 5,
  pushTimeoutMs: 15000,
  sweepBatchSize: 200,
  maxPushAttempts: 10,
  debug: false,
};

export interface PerformanceLockConfig {
  /** Lock lifetime in milliseconds */
  ttlMs: number;
  /** Acquisition attempts before giving up */
  retries: number;
  /** First backoff delay in milliseconds */
  minRetryDelayMs: number;
  maxRetryDelayMs: number;
}

export const DEFAULT_LOCK_CONFIG: PerformanceLockConfig = {
  ttlMs: 5 * 60 * 1000,
  retries: 5,
  minRetryDelayMs: 200,
  maxRetryDelayMs: 5000,
};

export interface EngineConfig {
  /** Redis connection URL */
  redisUrl: string;
  /** Concurrent scrape-completed jobs */
  workerConcurrency: number;
  /** Attempts for a scrape-completed job */
  maxRetries: number;
  /** Interval of the pending-pack sweep in milliseconds */
  sweepIntervalMs: number;
  /** Enable debug logging */
  debug?: boolean;
}

export const DEFAULT_ENGINE_CONFIG: Partial<EngineConfig> = {
  workerConcurrency: 4,
  maxRetries: 5,
  sweepIntervalMs: 5 * 60 * 1000, // 5 minutes
  debug: false,
};

// ============================================================================
// Engine Status Types
// ============================================================================

export type AgentState = 'stopped' | 'starting' | 'running' | 'stopping' | 'error';

export interface AgentStatus {
  name: string;
  state: AgentState;
  lastActivity: Date | null;
  processedCount: number;
  errorCount: number;
  error?: string;
}

export interface EngineStats {
  workflowsCompleted: number;
  workflowsFailed: number;
  packsCreated: number;
  packsDelisted: number;
  posInventoriesCreated: number;
  posFailures: number;
  sweepsCompleted: number;
}

export interface EngineStatus {
  state: AgentState;
  startedAt: Date | null;
  uptime: number;
  agents: {
    reconcile: AgentStatus;
    sweep: AgentStatus;
  };
  stats: EngineStats;
}

// ============================================================================
// Event Types
// ============================================================================

export type EngineEventType =
  | 'workflow:started'
  | 'workflow:completed'
  | 'workflow:failed'
  | 'pos:push-failed'
  | 'sweep:completed';

export interface BaseEvent<T extends EngineEventType, P> {
  type: T;
  payload: P;
  timestamp: Date;
}

export type WorkflowStartedEvent = BaseEvent<
  'workflow:started',
  { operationId: string; performanceId: string; scenario: WorkflowScenario }
>;
export type WorkflowCompletedEvent = BaseEvent<'workflow:completed', WorkflowResult>;
export type WorkflowFailedEvent = BaseEvent<'workflow:failed', WorkflowResult>;
export type PosPushFailedEvent = BaseEvent<'pos:push-failed', PushFailure>;
export type SweepCompletedEvent = BaseEvent<'sweep:completed', SweepResult>;

export type EngineEvent =
  | WorkflowStartedEvent
  | WorkflowCompletedEvent
  | WorkflowFailedEvent
  | PosPushFailedEvent
  | SweepCompletedEvent;
