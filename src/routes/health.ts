import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

import type { DeploymentEngine } from '../backends/types.js';

// Read version once at startup (not on every request)
const APP_VERSION = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(process.cwd(), 'package.json'), 'utf-8'))).version;

interface DependencyStatus {
  status: 'up' | 'down';
  latency?: number;
  error?: string;
}

interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  backends: number;
  dependencies: Record<string, DependencyStatus>;
}

async function checkEngine(engine: DeploymentEngine): Promise<DependencyStatus> {
  const start = Date.now();
  try {
    const healthy = await engine.healthy();
    return {
      status: healthy ? 'up' : 'down',
      latency: Date.now() - start,
    };
  } catch (err) {
    return {
      status: 'down',
      latency: Date.now() - start,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}

const healthRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    { schema: { description: 'Service and deployment engine health', tags: ['Health'] } },
    async (_request, reply) => {
      const engineStatus = await checkEngine(fastify.deploymentEngine);
      const status: HealthResponse['status'] = engineStatus.status === 'up' ? 'healthy' : 'unhealthy';

      const response: HealthResponse = {
        status,
        timestamp: new Date().toISOString(),
        version: APP_VERSION,
        uptime: process.uptime(),
        backends: fastify.backends.size,
        dependencies: { deploymentEngine: engineStatus },
      };

      return reply.status(status === 'healthy' ? 200 : 503).send(response);
    }
  );

  done();
};

export const healthRoutesPlugin = fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
