import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

// Request bodies are never logged: backend configurations carry SAN
// credentials and API tokens.
const requestLogger: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.addHook('onRequest', async (request) => {
    request.log.info(
      {
        method: request.method,
        url: request.url,
        requestId: request.id,
        userAgent: request.headers['user-agent'],
      },
      'Incoming request'
    );
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      route: request.routeOptions.url,
      params: request.params,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
      requestId: request.id,
    };

    if (reply.statusCode >= 500) {
      request.log.error(logData, 'Request completed with server error');
    } else if (reply.statusCode >= 400) {
      request.log.warn(logData, 'Request completed with client error');
    } else {
      request.log.info(logData, 'Request completed');
    }
  });

  done();
};

export const requestLoggerPlugin = fp(requestLogger, {
  name: 'request-logger',
  fastify: '5.x',
});
