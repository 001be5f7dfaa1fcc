// PUT/DELETE /backends/:backendType/instances/:instanceName -- lifecycle.
//
// PUT validates the raw config (422 with every issue on failure), stores the
// secret fields through the secret store and applies the resulting variables
// through the deployment engine. Collaborator failures surface unchanged
// through the error handler.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';

import type { LifecycleContext } from '../backends/types.js';

import { InstanceParamsSchema, InstanceResponseSchema, RawConfigBodySchema } from './schemas.js';

const instanceRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  const lifecycle = (): LifecycleContext => ({
    engine: fastify.deploymentEngine,
    secrets: fastify.secretStore,
    log: fastify.log,
    spaces: fastify.networkSpaces,
  });

  app.put(
    '/backends/:backendType/instances/:instanceName',
    {
      schema: {
        description: 'Validate a configuration and apply it as a backend instance',
        tags: ['Instances'],
        params: InstanceParamsSchema,
        body: RawConfigBodySchema,
        response: { 201: InstanceResponseSchema },
      },
    },
    async (request, reply) => {
      const { backendType, instanceName } = request.params;
      const backend = fastify.backends.get(backendType);
      const config = backend.configSchema().validate(request.body);

      const variables = await backend.addBackendInstance(lifecycle(), instanceName, config);

      return reply.status(201).send({ backendType, instanceName, variables });
    }
  );

  app.delete(
    '/backends/:backendType/instances/:instanceName',
    {
      schema: {
        description: 'Remove a backend instance and its stored secret',
        tags: ['Instances'],
        params: InstanceParamsSchema,
      },
    },
    async (request, reply) => {
      const { backendType, instanceName } = request.params;
      await fastify.backends.get(backendType).removeBackend(lifecycle(), instanceName);
      return reply.status(204).send();
    }
  );

  done();
};

export const instanceRoutesPlugin = fp(instanceRoutes, {
  name: 'instance-routes',
  fastify: '5.x',
});
