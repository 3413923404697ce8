/**
 * Reconcile Agent
 * Consumes scrape-completed jobs and runs one workflow pass per job.
 * A busy performance lock fails the job so BullMQ retries it with backoff;
 * an unknown performance fails it for good.
 */

import { Queue, UnrecoverableError, Worker, type Job } from 'bullmq';
import type { Redis } from 'ioredis';
import { LockUnavailableError } from '../errors.js';
import type { WorkflowManager } from '../workflow/workflow-manager.js';
import type {
  AgentState,
  AgentStatus,
  EngineConfig,
  ScrapeCompletedJobData,
  WorkflowResult,
} from '../types.js';

// ============================================================================
// Constants
// ============================================================================

export const SCRAPE_COMPLETED_QUEUE = 'packsync-scrape-completed';
const AGENT_NAME = 'reconcile';

// ============================================================================
// Reconcile Agent Dependencies
// ============================================================================

export interface ReconcileAgentDependencies {
  redis: Redis;
  config: EngineConfig;
  workflow: WorkflowManager;
}

// ============================================================================
// Reconcile Agent Class
// ============================================================================

export class ReconcileAgent {
  private readonly redis: Redis;
  private readonly config: EngineConfig;
  private readonly workflow: WorkflowManager;

  private queue: Queue<ScrapeCompletedJobData> | null = null;
  private worker: Worker<ScrapeCompletedJobData, WorkflowResult> | null = null;
  private state: AgentState = 'stopped';
  private processedCount = 0;
  private errorCount = 0;
  private lastActivity: Date | null = null;
  private lastError: string | undefined;

  constructor(deps: ReconcileAgentDependencies) {
    this.redis = deps.redis;
    this.config = deps.config;
    this.workflow = deps.workflow;
  }

  /**
   * Start the Reconcile Agent
   */
  async start(): Promise<void> {
    if (this.state === 'running') {
      return;
    }

    this.state = 'starting';
    this.log('Starting Reconcile Agent...');

    try {
      this.queue = new Queue<ScrapeCompletedJobData>(SCRAPE_COMPLETED_QUEUE, {
        connection: this.redis,
        defaultJobOptions: {
          attempts: this.config.maxRetries,
          backoff: {
            type: 'exponential',
            delay: 2000,
          },
          removeOnComplete: {
            age: 24 * 3600,
            count: 1000,
          },
          removeOnFail: {
            age: 7 * 24 * 3600,
          },
        },
      });

      this.worker = new Worker<ScrapeCompletedJobData, WorkflowResult>(
        SCRAPE_COMPLETED_QUEUE,
        this.processJob.bind(this),
        {
          connection: this.redis,
          concurrency: this.config.workerConcurrency,
        }
      );

      this.worker.on('completed', (job) => {
        this.processedCount++;
        this.lastActivity = new Date();
        this.log(`Job ${job.id} completed`);
      });

      this.worker.on('failed', (job, err) => {
        this.errorCount++;
        this.lastActivity = new Date();
        this.lastError = err.message;
        this.log(`Job ${job?.id} failed: ${err.message}`, 'error');
      });

      this.worker.on('error', (err) => {
        this.errorCount++;
        this.lastError = err.message;
        this.log(`Worker error: ${err.message}`, 'error');
      });

      this.state = 'running';
      this.log(`Reconcile Agent started with concurrency ${this.config.workerConcurrency}`);
    } catch (error) {
      this.state = 'error';
      this.lastError = error instanceof Error ? error.message : 'Unknown error';
      throw error;
    }
  }

  /**
   * Stop the Reconcile Agent
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') {
      return;
    }

    this.state = 'stopping';
    this.log('Stopping Reconcile Agent...');

    try {
      if (this.worker) {
        await this.worker.close();
        this.worker = null;
      }

      if (this.queue) {
        await this.queue.close();
        this.queue = null;
      }

      this.state = 'stopped';
      this.log('Reconcile Agent stopped');
    } catch (error) {
      this.state = 'error';
      this.lastError = error instanceof Error ? error.message : 'Unknown error';
      throw error;
    }
  }

  getStatus(): AgentStatus {
    return {
      name: AGENT_NAME,
      state: this.state,
      lastActivity: this.lastActivity,
      processedCount: this.processedCount,
      errorCount: this.errorCount,
      error: this.lastError,
    };
  }

  /**
   * Queue a completed scrape for reconciliation
   */
  async addScrapeCompletedJob(data: ScrapeCompletedJobData): Promise<string> {
    if (!this.queue) {
      throw new Error('Reconcile Agent not started');
    }

    const job = await this.queue.add('scrape-completed', data);
    return job.id || '';
  }

  /**
   * Process one scrape-completed job
   */
  async processJob(job: Pick<Job<ScrapeCompletedJobData>, 'id' | 'data'>): Promise<WorkflowResult> {
    const { performanceId, candidates, scrapedAt } = job.data;
    this.log(`Reconciling performance ${performanceId}: ${candidates.length} candidates scraped at ${scrapedAt}`);

    let result: WorkflowResult;
    try {
      result = await this.workflow.processAutoDetectScenario(performanceId, candidates);
    } catch (error) {
      if (error instanceof LockUnavailableError) {
        this.log(`Performance ${performanceId} busy, job ${job.id} will be retried`, 'warn');
      }
      throw error;
    }

    if (result.errorCode === 'PERFORMANCE_NOT_FOUND') {
      throw new UnrecoverableError(result.errorMessages.join('; '));
    }

    for (const warning of result.warnings) {
      this.log(`Performance ${performanceId}: ${warning}`, 'warn');
    }
    return result;
  }

  private log(message: string, level: 'info' | 'warn' | 'error' = 'info'): void {
    const prefix = `[ReconcileAgent]`;
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

export function createReconcileAgent(deps: ReconcileAgentDependencies): ReconcileAgent {
  return new ReconcileAgent(deps);
}
