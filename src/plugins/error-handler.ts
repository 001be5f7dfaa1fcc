import type { FastifyPluginCallback, FastifyError } from 'fastify';
import fp from 'fastify-plugin';

import { Sentry } from '../instrument.js';
import { ConfigValidationError } from '../schema/errors.js';
import type { ValidationIssue } from '../schema/types.js';

interface ErrorHandlerOptions {
  isDev: boolean;
}

interface ErrorResponse {
  error: {
    code: string;
    message: string;
    statusCode: number;
    issues?: readonly ValidationIssue[];
    stack?: string;
  };
  requestId: string;
  timestamp: string;
}

const errorHandler: FastifyPluginCallback<ErrorHandlerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    const code = error.code ?? 'INTERNAL_ERROR';

    request.log.error(
      {
        err: error,
        code,
        statusCode,
      },
      'Request error'
    );

    // Capture server errors in Sentry
    if (statusCode >= 500) {
      Sentry.captureException(error, {
        extra: {
          requestId: request.id,
          url: request.url,
          method: request.method,
        },
      });
    }

    const response: ErrorResponse = {
      error: {
        code,
        message: isDev ? error.message : sanitizeMessage(error.message, code, statusCode),
        statusCode,
        // Field-level problems, so clients can show every one of them at once
        ...(error instanceof ConfigValidationError && { issues: error.issues }),
        ...(isDev && error.stack && { stack: error.stack }),
      },
      requestId: request.id,
      timestamp: new Date().toISOString(),
    };

    reply.status(statusCode).send(response);
  });

  fastify.setNotFoundHandler((request, reply) => {
    const response: ErrorResponse = {
      error: {
        code: 'NOT_FOUND',
        message: `Route ${request.method}:${request.url} not found`,
        statusCode: 404,
      },
      requestId: request.id,
      timestamp: new Date().toISOString(),
    };

    request.log.warn(
      {
        method: request.method,
        url: request.url,
        requestId: request.id,
      },
      'Route not found'
    );

    reply.status(404).send(response);
  });

  done();
};

function sanitizeMessage(message: string, code: string, statusCode: number): string {
  // Rate limit messages carry the retry hint
  if (statusCode === 429) {
    return message;
  }
  // Collaborator failures and internal errors may carry infrastructure details
  if (code === 'INTERNAL_ERROR' || code.startsWith('SERVER_') || code.startsWith('DEPLOY_')) {
    return statusCode >= 500 ? 'An internal error occurred' : message;
  }
  // Config and backend errors describe the request or startup problem
  if (code.startsWith('CONFIG_') || code.startsWith('BACKEND_')) {
    return message;
  }
  if (statusCode >= 500) {
    return 'An internal error occurred';
  }
  return message;
}

export const errorHandlerPlugin = fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
