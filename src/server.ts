import { randomUUID } from 'node:crypto';

import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

import type { BackendRegistry } from './backends/registry.js';
import { createBackendRegistry } from './backends/index.js';
import type { DeploymentEngine, LifecycleContext, SecretStore } from './backends/types.js';
import type { Config } from './config/index.js';
import { createDeploymentEngine, MemorySecretStore } from './deploy/index.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { requestLoggerPlugin } from './plugins/request-logger.js';
import { backendRoutesPlugin } from './routes/backends.js';
import { healthRoutesPlugin } from './routes/health.js';
import { instanceRoutesPlugin } from './routes/instances.js';
import { validateRoutesPlugin } from './routes/validate.js';

// Import types to ensure augmentation is loaded
import './types/index.js';

export interface CreateServerOptions {
  config: Config;
  /** Defaults to the engine selected by `config.deployment` */
  engine?: DeploymentEngine;
  /** Defaults to a process-local MemorySecretStore */
  secretStore?: SecretStore;
  /** Defaults to a registry holding every built-in backend */
  registry?: BackendRegistry;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const isDev = config.env === 'development';

  const server = fastify({
    logger: {
      level: config.logging.level,
      transport: config.logging.pretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    },
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
    // Request logging is handled by requestLoggerPlugin (bodies carry credentials)
    disableRequestLogging: true,
    bodyLimit: 65536,
  });

  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);

  server.decorate('config', config);

  await server.register(helmet, {
    global: true,
    contentSecurityPolicy: isDev ? false : undefined,
  });

  await server.register(rateLimit, {
    max: config.rateLimit.global,
    timeWindow: config.rateLimit.windowMs,
  });

  await server.register(cors, {
    origin: isDev ? true : false,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  });

  await server.register(errorHandlerPlugin, { isDev });
  await server.register(requestLoggerPlugin);

  // ---- OpenAPI documentation ----
  await server.register(swagger, {
    openapi: {
      openapi: '3.0.3',
      info: {
        title: 'Storage Backend Manager',
        description:
          'Registry, configuration validation and lifecycle of cinder-volume storage backends.',
        version: '1.0.0',
        license: { name: 'Apache-2.0', url: 'https://www.apache.org/licenses/LICENSE-2.0' },
      },
      servers: [{ url: 'http://localhost:3000', description: 'Development' }],
      tags: [
        { name: 'Health', description: 'Server health' },
        { name: 'Backends', description: 'Backend registry and configuration schemas' },
        { name: 'Instances', description: 'Backend instance lifecycle' },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await server.register(swaggerUi, {
    routePrefix: '/docs',
  });

  // ---- Backend layer initialization ----
  const registry = options.registry ?? createBackendRegistry(server.log);
  const engine = options.engine ?? createDeploymentEngine(config.deployment);
  const secretStore = options.secretStore ?? new MemorySecretStore();

  server.decorate('backends', registry);
  server.decorate('deploymentEngine', engine);
  server.decorate('secretStore', secretStore);
  server.decorate('networkSpaces', {
    management: config.network.managementSpace,
    storage: config.network.storageSpace,
  });

  const ctx: LifecycleContext = {
    engine,
    secrets: secretStore,
    log: server.log,
    spaces: server.networkSpaces,
  };

  try {
    for (const backend of registry.all()) {
      await backend.registerDeploymentPlan(ctx);
    }
    server.log.info(
      { backends: registry.all().map((b) => b.backendType), engine: config.deployment.engine },
      'Backend layer initialized'
    );
  } catch (error) {
    server.log.error(
      { err: error instanceof Error ? error.message : 'Unknown error' },
      'Deployment plan registration failed'
    );
    throw error;
  }

  // Routes
  await server.register(healthRoutesPlugin);
  await server.register(backendRoutesPlugin);
  await server.register(validateRoutesPlugin);
  await server.register(instanceRoutesPlugin);

  return server;
}
