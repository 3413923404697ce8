import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import { healthRoutes } from './routes/health.js';
import type { ApiResponse, HealthChecks } from './types/index.js';

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
  /** Hide error details from responses */
  production?: boolean;
}

// The worker serves only health and status routes
export async function buildApp(checks: HealthChecks, options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? false });

  await app.register(healthRoutes, { prefix: '/health', ...checks });

  // Root route
  app.get('/', async () => {
    return {
      name: 'PackSync Worker',
      version: '1.0.0',
      status: 'running',
      endpoints: {
        health: '/health',
        ready: '/health/ready',
        live: '/health/live',
        engine: '/health/engine',
      },
    };
  });

  // Global error handler
  app.setErrorHandler((error, _request, reply) => {
    app.log.error(error);

    const statusCode = error.statusCode ?? 500;
    return reply.code(statusCode).send({
      success: false,
      error: error.name || 'Internal Server Error',
      message: options.production ? 'An error occurred' : error.message,
    } satisfies ApiResponse);
  });

  return app;
}
