import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';

import { MemoryDeploymentEngine } from '@/deploy/memory-engine.js';
import { createServer } from '@/server.js';

import { testConfig } from '../helpers/fixtures.js';

vi.mock('@sentry/node', () => ({
  init: vi.fn(),
  captureException: vi.fn(),
  onUnhandledRejectionIntegration: vi.fn(),
}));

describe('Server Integration', () => {
  let server: FastifyInstance;
  let engine: MemoryDeploymentEngine;

  beforeAll(async () => {
    engine = new MemoryDeploymentEngine();
    server = await createServer({ config: testConfig, engine });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
  });

  it('should register a deployment plan for every built-in backend', () => {
    for (const backendType of ['hitachi', 'purestorage', 'dellsc', 'dellpowerstore']) {
      expect(engine.plan(`storage-backend-${backendType}`)?.deployableUnit.name).toBe(
        `cinder-volume-${backendType}`
      );
    }
  });

  it('should bind endpoints to the configured network spaces', () => {
    expect(server.networkSpaces).toEqual({ management: 'mgmt', storage: 'san' });
  });

  it('should have security headers from helmet', async () => {
    const response = await server.inject({ method: 'GET', url: '/nonexistent' });

    expect(response.headers['x-dns-prefetch-control']).toBe('off');
    expect(response.headers['x-frame-options']).toBe('SAMEORIGIN');
    expect(response.headers['x-content-type-options']).toBe('nosniff');
  });

  it('should return request ID in error responses', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/nonexistent',
      headers: { 'x-request-id': 'test-request-123' },
    });

    expect(response.statusCode).toBe(404);
    expect(response.json().requestId).toBe('test-request-123');
  });

  it('should generate request ID if not provided', async () => {
    const response = await server.inject({ method: 'GET', url: '/nonexistent' });

    expect(response.json().requestId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should publish the OpenAPI document', async () => {
    const response = await server.inject({ method: 'GET', url: '/docs/json' });

    expect(response.statusCode).toBe(200);
    const doc = response.json();
    expect(doc.info.title).toBe('Storage Backend Manager');
    expect(Object.keys(doc.paths)).toEqual(
      expect.arrayContaining([
        '/health',
        '/backends',
        '/backends/{backendType}',
        '/backends/{backendType}/validate',
        '/backends/{backendType}/instances/{instanceName}',
      ])
    );
  });
});

describe('Server startup', () => {
  it('should fail when a deployment plan cannot be registered', async () => {
    const failure = new Error('plan directory not writable');
    const engine = new MemoryDeploymentEngine();
    vi.spyOn(engine, 'registerPlan').mockRejectedValue(failure);

    await expect(createServer({ config: testConfig, engine })).rejects.toBe(failure);
  });
});
