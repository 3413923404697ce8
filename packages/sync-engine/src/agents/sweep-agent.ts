/**
 * Sweep Agent
 * Runs the pending-pack sweep on a repeatable BullMQ job: packs whose
 * vendor push failed or never happened, and vendor deletions still owed.
 */

import { Queue, Worker, type Job } from 'bullmq';
import type { Redis } from 'ioredis';
import type { WorkflowManager } from '../workflow/workflow-manager.js';
import type { AgentState, AgentStatus, EngineConfig, SweepJobData, SweepResult } from '../types.js';

// ============================================================================
// Constants
// ============================================================================

export const SWEEP_QUEUE = 'packsync-pending-sweep';
const AGENT_NAME = 'sweep';
const SCHEDULED_JOB_NAME = 'scheduled-sweep';
const SCHEDULED_JOB_ID = 'sweep-scheduled';

// ============================================================================
// Sweep Agent Dependencies
// ============================================================================

export interface SweepAgentDependencies {
  redis: Redis;
  config: EngineConfig;
  workflow: WorkflowManager;
}

// ============================================================================
// Sweep Agent Class
// ============================================================================

export class SweepAgent {
  private readonly redis: Redis;
  private readonly config: EngineConfig;
  private readonly workflow: WorkflowManager;

  private queue: Queue<SweepJobData> | null = null;
  private worker: Worker<SweepJobData, SweepResult> | null = null;
  private state: AgentState = 'stopped';
  private processedCount = 0;
  private errorCount = 0;
  private lastActivity: Date | null = null;
  private lastError: string | undefined;

  constructor(deps: SweepAgentDependencies) {
    this.redis = deps.redis;
    this.config = deps.config;
    this.workflow = deps.workflow;
  }

  /**
   * Start the Sweep Agent
   */
  async start(): Promise<void> {
    if (this.state === 'running') {
      return;
    }

    this.state = 'starting';
    this.log('Starting Sweep Agent...');

    try {
      this.queue = new Queue<SweepJobData>(SWEEP_QUEUE, {
        connection: this.redis,
        defaultJobOptions: {
          attempts: 1,
          removeOnComplete: {
            age: 24 * 3600,
            count: 100,
          },
          removeOnFail: {
            age: 7 * 24 * 3600,
          },
        },
      });

      this.worker = new Worker<SweepJobData, SweepResult>(SWEEP_QUEUE, this.processSweep.bind(this), {
        connection: this.redis,
        concurrency: 1, // Sweeps run serially
      });

      this.worker.on('completed', (job) => {
        this.processedCount++;
        this.lastActivity = new Date();
        this.log(`Sweep job ${job.id} completed`);
      });

      this.worker.on('failed', (job, err) => {
        this.errorCount++;
        this.lastActivity = new Date();
        this.lastError = err.message;
        this.log(`Sweep job ${job?.id} failed: ${err.message}`, 'error');
      });

      this.worker.on('error', (err) => {
        this.errorCount++;
        this.lastError = err.message;
        this.log(`Worker error: ${err.message}`, 'error');
      });

      await this.queue.add(
        SCHEDULED_JOB_NAME,
        {},
        {
          repeat: {
            every: this.config.sweepIntervalMs,
          },
          jobId: SCHEDULED_JOB_ID,
        }
      );

      this.state = 'running';
      this.log(`Sweep Agent started - sweeping every ${this.config.sweepIntervalMs / 1000} seconds`);
    } catch (error) {
      this.state = 'error';
      this.lastError = error instanceof Error ? error.message : 'Unknown error';
      throw error;
    }
  }

  /**
   * Stop the Sweep Agent
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') {
      return;
    }

    this.state = 'stopping';
    this.log('Stopping Sweep Agent...');

    try {
      if (this.queue) {
        await this.queue.removeRepeatable(
          SCHEDULED_JOB_NAME,
          { every: this.config.sweepIntervalMs },
          SCHEDULED_JOB_ID
        );
      }

      if (this.worker) {
        await this.worker.close();
        this.worker = null;
      }

      if (this.queue) {
        await this.queue.close();
        this.queue = null;
      }

      this.state = 'stopped';
      this.log('Sweep Agent stopped');
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
   * Trigger an immediate sweep, optionally of one performance
   */
  async triggerSweep(performanceId?: string): Promise<string> {
    if (!this.queue) {
      throw new Error('Sweep Agent not started');
    }

    const job = await this.queue.add('manual-sweep', { performanceId });
    return job.id || '';
  }

  /**
   * Process a sweep job
   */
  async processSweep(job: Pick<Job<SweepJobData>, 'id' | 'data'>): Promise<SweepResult> {
    const result = await this.workflow.runSweep(job.data.performanceId);
    this.log(
      `Sweep ${job.id}: created=${result.created}, deleted=${result.deleted}, failed=${result.failed}, skipped=${result.skipped}`,
      result.failed > 0 ? 'warn' : 'info'
    );
    return result;
  }

  private log(message: string, level: 'info' | 'warn' | 'error' = 'info'): void {
    const prefix = `[SweepAgent]`;
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

export function createSweepAgent(deps: SweepAgentDependencies): SweepAgent {
  return new SweepAgent(deps);
}
