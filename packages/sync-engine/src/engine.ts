/**
 * Reconciliation Engine
 * Wires reconciler, executor, pusher and workflow manager to their ports,
 * and runs the reconcile and sweep agents on a shared Redis connection.
 */

import { Redis } from 'ioredis';
import { PackSyncEventBus, createEventBus } from './events.js';
import { ReconcileAgent, SweepAgent, createReconcileAgent, createSweepAgent } from './agents/index.js';
import { SyncExecutor } from './executor/sync-executor.js';
import { InventoryPusher } from './pos/inventory-pusher.js';
import type { Notifier, PerformanceDirectory, PosVendor, SeatPackRepository } from './ports.js';
import { PackReconciler } from './reconciler/reconciler.js';
import type {
  AgentState,
  AgentStatus,
  EngineConfig,
  EngineStats,
  EngineStatus,
  InventoryPusherConfig,
  PerformanceLockConfig,
  ScrapeCompletedJobData,
  SyncExecutorConfig,
} from './types.js';
import { DEFAULT_ENGINE_CONFIG } from './types.js';
import { createRedisPerformanceLock, type PerformanceLock } from './workflow/performance-lock.js';
import { WorkflowManager } from './workflow/workflow-manager.js';

// ============================================================================
// Engine Dependencies Interface
// ============================================================================

export interface ReconciliationEngineDependencies {
  repository: SeatPackRepository;
  directory: PerformanceDirectory;
  vendor: PosVendor;
  notifier: Notifier;
  executor?: Partial<SyncExecutorConfig>;
  pusher?: Partial<InventoryPusherConfig>;
  lock?: Partial<PerformanceLockConfig>;
  /** Overrides the Redis lock, e.g. with an in-process one */
  performanceLock?: PerformanceLock;
}

// ============================================================================
// Reconciliation Engine Class
// ============================================================================

export class ReconciliationEngine {
  private readonly config: EngineConfig;
  private readonly redis: Redis;
  private readonly eventBus: PackSyncEventBus;
  private readonly workflow: WorkflowManager;

  private reconcileAgent: ReconcileAgent | null = null;
  private sweepAgent: SweepAgent | null = null;

  private state: AgentState = 'stopped';
  private startedAt: Date | null = null;
  private stats: EngineStats = {
    workflowsCompleted: 0,
    workflowsFailed: 0,
    packsCreated: 0,
    packsDelisted: 0,
    posInventoriesCreated: 0,
    posFailures: 0,
    sweepsCompleted: 0,
  };

  constructor(config: EngineConfig, deps: ReconciliationEngineDependencies) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };

    this.redis = new Redis(this.config.redisUrl, {
      maxRetriesPerRequest: null,
      enableReadyCheck: false,
    });

    this.redis.on('error', (err: Error) => {
      console.error('[ReconciliationEngine] Redis error:', err);
    });

    this.redis.on('connect', () => {
      this.log('Redis connected');
    });

    this.eventBus = createEventBus(this.config.debug);

    const debug = this.config.debug ?? false;
    const executor = new SyncExecutor({
      repository: deps.repository,
      config: { debug, ...deps.executor },
    });
    const pusher = new InventoryPusher({
      vendor: deps.vendor,
      executor,
      repository: deps.repository,
      directory: deps.directory,
      eventBus: this.eventBus,
      config: { debug, ...deps.pusher },
    });

    this.workflow = new WorkflowManager({
      repository: deps.repository,
      directory: deps.directory,
      executor,
      pusher,
      notifier: deps.notifier,
      lock: deps.performanceLock ?? createRedisPerformanceLock(this.redis, deps.lock),
      reconciler: new PackReconciler({ debug }),
      eventBus: this.eventBus,
      sweepBatchSize: deps.pusher?.sweepBatchSize,
      debug,
    });

    this.setupStatsTracking();
  }

  /**
   * Start the engine and both agents
   */
  async start(): Promise<void> {
    if (this.state === 'running') {
      this.log('Engine already running');
      return;
    }

    this.state = 'starting';
    this.log('Starting Reconciliation Engine...');

    try {
      this.reconcileAgent = createReconcileAgent({
        redis: this.redis,
        config: this.config,
        workflow: this.workflow,
      });
      await this.reconcileAgent.start();

      this.sweepAgent = createSweepAgent({
        redis: this.redis,
        config: this.config,
        workflow: this.workflow,
      });
      await this.sweepAgent.start();

      this.state = 'running';
      this.startedAt = new Date();
      this.log('Reconciliation Engine started');
    } catch (error) {
      this.state = 'error';
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.log(`Failed to start engine: ${errorMessage}`, 'error');

      await this.stop();
      throw error;
    }
  }

  /**
   * Stop both agents and close the Redis connection
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') {
      // Never started: the connection opened in the constructor still needs closing
      if (this.redis.status !== 'end') {
        await this.redis.quit();
      }
      return;
    }

    this.state = 'stopping';
    this.log('Stopping Reconciliation Engine...');

    try {
      if (this.sweepAgent) {
        await this.sweepAgent.stop();
        this.sweepAgent = null;
      }

      if (this.reconcileAgent) {
        await this.reconcileAgent.stop();
        this.reconcileAgent = null;
      }

      await this.redis.quit();
      this.eventBus.removeAllListenersFor();

      this.state = 'stopped';
      this.log('Reconciliation Engine stopped');
    } catch (error) {
      this.state = 'error';
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.log(`Error stopping engine: ${errorMessage}`, 'error');
      throw error;
    }
  }

  /**
   * Queue a completed scrape for reconciliation
   */
  async submitScrape(data: ScrapeCompletedJobData): Promise<string> {
    if (this.state !== 'running' || !this.reconcileAgent) {
      throw new Error('Reconciliation Engine not running');
    }
    return this.reconcileAgent.addScrapeCompletedJob(data);
  }

  /**
   * Queue an immediate sweep
   */
  async triggerSweep(performanceId?: string): Promise<string> {
    if (this.state !== 'running' || !this.sweepAgent) {
      throw new Error('Reconciliation Engine not running');
    }
    return this.sweepAgent.triggerSweep(performanceId);
  }

  getStatus(): EngineStatus {
    const uptime = this.startedAt ? Date.now() - this.startedAt.getTime() : 0;

    return {
      state: this.state,
      startedAt: this.startedAt,
      uptime,
      agents: {
        reconcile: this.reconcileAgent?.getStatus() ?? this.getStoppedAgentStatus('reconcile'),
        sweep: this.sweepAgent?.getStatus() ?? this.getStoppedAgentStatus('sweep'),
      },
      stats: { ...this.stats },
    };
  }

  /**
   * Direct access for callers that run passes outside the queue
   */
  getWorkflowManager(): WorkflowManager {
    return this.workflow;
  }

  getEventBus(): PackSyncEventBus {
    return this.eventBus;
  }

  private setupStatsTracking(): void {
    this.eventBus.onWorkflowCompleted((event) => {
      this.stats.workflowsCompleted++;
      this.stats.packsCreated += event.payload.packsCreated;
      this.stats.packsDelisted += event.payload.packsDelisted;
      this.stats.posInventoriesCreated += event.payload.posInventoriesCreated;
    });

    this.eventBus.onWorkflowFailed((event) => {
      this.stats.workflowsFailed++;
      this.stats.packsCreated += event.payload.packsCreated;
      this.stats.packsDelisted += event.payload.packsDelisted;
      this.stats.posInventoriesCreated += event.payload.posInventoriesCreated;
    });

    this.eventBus.onPushFailed(() => {
      this.stats.posFailures++;
    });

    this.eventBus.onSweepCompleted(() => {
      this.stats.sweepsCompleted++;
    });
  }

  private getStoppedAgentStatus(name: string): AgentStatus {
    return {
      name,
      state: 'stopped',
      lastActivity: null,
      processedCount: 0,
      errorCount: 0,
    };
  }

  private log(message: string, level: 'info' | 'warn' | 'error' = 'info'): void {
    const prefix = `[ReconciliationEngine]`;
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

export function createReconciliationEngine(
  config: EngineConfig,
  deps: ReconciliationEngineDependencies
): ReconciliationEngine {
  return new ReconciliationEngine(config, deps);
}
