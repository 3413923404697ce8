import type { EngineStatus } from '@packsync/sync-engine';

// ============================================================================
// API Response Types
// ============================================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}

// ============================================================================
// Health Types
// ============================================================================

export type ComponentStatus = 'up' | 'down';

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    database: {
      status: ComponentStatus;
      latency: number;
    };
    redis: {
      status: ComponentStatus;
      latency: number;
    };
  };
}

/** Probes the health routes run; each resolves false when its dependency is down */
export type HealthChecks = {
  checkDatabase: () => Promise<boolean>;
  checkRedis: () => Promise<boolean>;
  getEngineStatus: () => EngineStatus;
};
