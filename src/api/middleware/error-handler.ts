import type { FastifyInstance } from 'fastify';
import { KennelError, ValidationError } from '../../common/errors/index.js';

/**
 * Global error handler.
 * Maps KennelError subclasses to their HTTP status. Fastify's own 4xx errors
 * (malformed JSON, unknown content type) keep their status. Anything else
 * returns 500 with a generic message and is logged in full.
 */
export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof KennelError) {
      reply.code(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          ...(error instanceof ValidationError ? { issues: error.issues } : {}),
        },
      });
      return;
    }

    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      reply.code(error.statusCode).send({
        error: { code: error.code ?? 'BAD_REQUEST', message: error.message },
      });
      return;
    }

    request.log.error({ err: error }, 'Unhandled error');
    reply.code(500).send({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      },
    });
  });

  app.setNotFoundHandler((request, reply) => {
    reply.code(404).send({
      error: { code: 'ROUTE_NOT_FOUND', message: `Route not found: ${request.method} ${request.url}` },
    });
  });
}
