// POST /backends/:backendType/validate -- dry-run validation of a raw config.
//
// Reports every problem at once. A valid config is echoed back keyed by wire
// key with secret values masked.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';

import { BackendParamsSchema, RawConfigBodySchema, ValidateResponseSchema } from './schemas.js';

const validateRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.post(
    '/backends/:backendType/validate',
    {
      schema: {
        description: 'Validate a backend configuration without applying it',
        tags: ['Backends'],
        params: BackendParamsSchema,
        body: RawConfigBodySchema,
        response: { 200: ValidateResponseSchema, 422: ValidateResponseSchema },
      },
    },
    async (request, reply) => {
      const schema = fastify.backends.get(request.params.backendType).configSchema();
      const result = schema.safeValidate(request.body);

      if (!result.success) {
        request.log.info(
          {
            backendType: request.params.backendType,
            fields: result.error.issues.map((issue) => issue.field),
          },
          'Backend configuration rejected'
        );
        return reply.status(422).send({ valid: false, issues: [...result.error.issues] });
      }

      return reply.status(200).send({ valid: true, config: schema.redact(result.data) });
    }
  );

  done();
};

export const validateRoutesPlugin = fp(validateRoutes, {
  name: 'validate-routes',
  fastify: '5.x',
});
