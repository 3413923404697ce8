/**
 * Sync Engine Integration
 * Wires the sync-engine package to the backend, connecting:
 * - Postgres storage and performance lookups
 * - The POS marketplace client
 * - Redis notifications
 */

import { Redis } from 'ioredis';
import {
  createReconciliationEngine,
  type ReconciliationEngine,
  type PerformanceLock,
} from '@packsync/sync-engine';
import { createPosApiClient } from '@packsync/integrations';
import { toEngineSettings, type Config } from './config/index.js';
import type { Database } from './db/index.js';
import { DrizzlePerformanceDirectory } from './repositories/performance-directory.js';
import { DrizzleSeatPackRepository } from './repositories/seat-pack-repository.js';
import { MarketplacePosVendor } from './services/pos-vendor.js';
import { RedisNotifier } from './services/redis-notifier.js';

// ============================================================================
// Types
// ============================================================================

export interface SyncIntegrationDependencies {
  config: Config;
  db: Database;
  /** Overrides the Redis-backed lock, e.g. for a single-process setup */
  performanceLock?: PerformanceLock;
}

export interface SyncIntegration {
  engine: ReconciliationEngine;
  /** Connection used for notifications and health checks */
  redis: Redis;
}

// ============================================================================
// Lifecycle
// ============================================================================

let integration: SyncIntegration | null = null;

export function initializeSyncEngineIntegration(deps: SyncIntegrationDependencies): SyncIntegration {
  if (integration) {
    return integration;
  }

  const { config, db } = deps;
  const settings = toEngineSettings(config);

  if (!config.POS_API_TOKEN) {
    console.warn('POS_API_TOKEN is not set; marketplace requests will be rejected');
  }

  const redis = new Redis(config.REDIS_URL, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
  });
  redis.on('error', (err) => {
    console.error('Redis connection error:', err);
  });

  const posClient = createPosApiClient({
    baseUrl: config.POS_API_URL,
    apiToken: config.POS_API_TOKEN,
    timeout: config.POS_PUSH_TIMEOUT_MS,
    retryAttempts: config.POS_RETRY_ATTEMPTS,
    concurrency: config.POS_CONCURRENCY,
    requestsPerMinute: config.POS_REQUESTS_PER_MINUTE,
    debug: config.DEBUG,
  });

  const engine = createReconciliationEngine(settings.engine, {
    repository: new DrizzleSeatPackRepository(db),
    directory: new DrizzlePerformanceDirectory(db),
    vendor: new MarketplacePosVendor(posClient),
    notifier: new RedisNotifier(redis, config.NOTIFICATION_CHANNEL),
    executor: settings.executor,
    pusher: settings.pusher,
    lock: settings.lock,
    performanceLock: deps.performanceLock,
  });

  integration = { engine, redis };
  return integration;
}

export async function checkRedisConnection(): Promise<boolean> {
  if (!integration) {
    return false;
  }
  try {
    return (await integration.redis.ping()) === 'PONG';
  } catch (error) {
    console.error('Redis connection check failed:', error);
    return false;
  }
}

export async function cleanupSyncEngineIntegration(): Promise<void> {
  if (!integration) {
    return;
  }
  const { engine, redis } = integration;
  integration = null;

  await engine.stop();
  await redis.quit();
}
