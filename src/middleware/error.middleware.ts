import { FastifyRequest, FastifyReply, FastifyError } from 'fastify';
import { BaseError, ValidationError, isOperationalError } from '../errors';
import { createLoggerWithContext } from '../utils/logger';

export const errorHandler = (
  error: FastifyError | BaseError,
  request: FastifyRequest,
  reply: FastifyReply
): void => {
  const log = createLoggerWithContext(request.id);

  if (error instanceof BaseError) {
    if (error.statusCode >= 500 || !isOperationalError(error)) {
      log.error('Request failed', { url: request.url, code: error.code, error: error.message });
    } else {
      log.warn('Request rejected', { url: request.url, code: error.code, error: error.message });
    }

    reply.status(error.statusCode).send({
      success: false,
      error: {
        code: error.code,
        message: error.message,
        ...(error instanceof ValidationError && error.violations.length > 0 ? { details: error.violations } : {}),
      },
    });
    return;
  }

  // Fastify's own request errors (malformed JSON, rate limiting, ...)
  if (error.statusCode !== undefined && error.statusCode < 500) {
    reply.status(error.statusCode).send({
      success: false,
      error: {
        code: error.code || 'BAD_REQUEST',
        message: error.message,
      },
    });
    return;
  }

  log.error('Unhandled error', { url: request.url, error: error.message, stack: error.stack });

  // Default error
  reply.status(500).send({
    success: false,
    error: {
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred',
    },
  });
};
