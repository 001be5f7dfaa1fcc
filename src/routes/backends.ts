// GET /backends and GET /backends/:backendType -- registry introspection.
//
// Lists the registered backends with their deployable units, and renders one
// backend's configuration schema so tooling can build help or forms from it.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod';

import type { StorageBackend } from '../backends/types.js';

import { BackendDetailSchema, BackendParamsSchema, BackendSummarySchema } from './schemas.js';
import type { BackendSummary } from './schemas.js';

function summarize(backend: StorageBackend): BackendSummary {
  return {
    backendType: backend.backendType,
    displayName: backend.displayName,
    deployableUnit: { ...backend.deployableUnit },
  };
}

const backendRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.get(
    '/backends',
    {
      schema: {
        description: 'List registered storage backends',
        tags: ['Backends'],
        response: { 200: z.object({ backends: z.array(BackendSummarySchema) }) },
      },
    },
    async () => ({ backends: fastify.backends.all().map(summarize) })
  );

  app.get(
    '/backends/:backendType',
    {
      schema: {
        description: 'Describe a backend and its configuration fields',
        tags: ['Backends'],
        params: BackendParamsSchema,
        response: { 200: BackendDetailSchema },
      },
    },
    async (request) => {
      const backend = fastify.backends.get(request.params.backendType);
      const fields = backend
        .configSchema()
        .fields()
        .map((f) => ({ ...f, allowedValues: f.allowedValues ? [...f.allowedValues] : null }));
      return { ...summarize(backend), fields };
    }
  );

  done();
};

export const backendRoutesPlugin = fp(backendRoutes, {
  name: 'backend-routes',
  fastify: '5.x',
});
