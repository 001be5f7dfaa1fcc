import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';

import { createServer } from '@/server.js';

import { testConfig } from '../helpers/fixtures.js';

vi.mock('@sentry/node', () => ({
  init: vi.fn(),
  captureException: vi.fn(),
  onUnhandledRejectionIntegration: vi.fn(),
}));

describe('Health Endpoint', () => {
  let server: FastifyInstance;

  beforeAll(async () => {
    server = await createServer({ config: testConfig });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
  });

  it('should report healthy with the number of registered backends', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('healthy');
    expect(body.backends).toBe(4);
    expect(body.dependencies.deploymentEngine.status).toBe('up');
  });
});
