import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { EngineStatus } from '@packsync/sync-engine';
import type { ApiResponse, HealthChecks, HealthStatus } from '../types/index.js';

async function timed(check: () => Promise<boolean>): Promise<{ up: boolean; latency: number }> {
  const startTime = Date.now();
  const up = await check();
  return { up, latency: Date.now() - startTime };
}

export async function healthRoutes(app: FastifyInstance, checks: HealthChecks): Promise<void> {
  // GET /health - Database, Redis and engine state
  app.get('/', async (_request: FastifyRequest, reply: FastifyReply) => {
    const [database, redis] = await Promise.all([timed(checks.checkDatabase), timed(checks.checkRedis)]);
    const engineRunning = checks.getEngineStatus().state === 'running';

    // Without the database nothing can be reconciled; the rest only degrades
    let status: HealthStatus['status'] = 'healthy';
    if (!database.up) {
      status = 'unhealthy';
    } else if (!redis.up || !engineRunning) {
      status = 'degraded';
    }

    const healthStatus: HealthStatus = {
      status,
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0',
      uptime: process.uptime(),
      checks: {
        database: { status: database.up ? 'up' : 'down', latency: database.latency },
        redis: { status: redis.up ? 'up' : 'down', latency: redis.latency },
      },
    };

    return reply.code(status === 'unhealthy' ? 503 : 200).send({
      success: status !== 'unhealthy',
      data: healthStatus,
    } satisfies ApiResponse<HealthStatus>);
  });

  // GET /health/ready - Readiness probe (for Kubernetes)
  app.get('/ready', async (_request: FastifyRequest, reply: FastifyReply) => {
    const [dbHealthy, redisHealthy] = await Promise.all([checks.checkDatabase(), checks.checkRedis()]);

    if (dbHealthy && redisHealthy) {
      return reply.code(200).send({
        success: true,
        message: 'Service is ready',
      } satisfies ApiResponse);
    }

    return reply.code(503).send({
      success: false,
      error: 'Service not ready',
      message: dbHealthy ? 'Redis connection not available' : 'Database connection not available',
    } satisfies ApiResponse);
  });

  // GET /health/live - Liveness probe (for Kubernetes)
  app.get('/live', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({
      success: true,
      message: 'Service is alive',
    } satisfies ApiResponse);
  });

  // GET /health/engine - Agent states and reconciliation counters
  app.get('/engine', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({
      success: true,
      data: checks.getEngineStatus(),
    } satisfies ApiResponse<EngineStatus>);
  });
}

export default healthRoutes;
