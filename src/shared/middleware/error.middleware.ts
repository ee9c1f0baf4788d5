import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { hasZodFastifySchemaValidationErrors } from 'fastify-type-provider-zod';
import { MongoError } from 'mongodb';
import { ZodError } from 'zod';
import { AppError } from '@shared/errors/app-error.js';
import { formatSchemaIssues, formatZodError } from '@shared/errors/zod-error-formatter.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { logger } from '@shared/utils/logger.js';

export function errorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply
) {
  const requestId = request.id;

  // zod parse outside a route schema
  if (error instanceof ZodError) {
    const appError = formatZodError(error);
    return reply.status(400).send({
      error: appError.message,
      code: appError.code,
      details: appError.details,
      requestId,
    });
  }

  // Route schema (params, body) rejected by the type provider
  if (hasZodFastifySchemaValidationErrors(error)) {
    const issues = formatSchemaIssues(error.validation);
    if (error.validationContext === 'params') {
      return reply.status(400).send({
        error: 'Invalid identifier',
        code: ErrorCodes.INVALID_ID,
        details: { issues },
        requestId,
      });
    }
    return reply.status(400).send({
      error: 'Validation failed',
      code: ErrorCodes.VALIDATION_ERROR,
      details: { issues },
      requestId,
    });
  }

  // Known operational error
  if (error instanceof AppError) {
    logger.warn({ err: error, requestId }, error.message);
    return reply.status(error.statusCode).send({
      error: error.message,
      code: error.code,
      details: error.details,
      requestId,
    });
  }

  if (error instanceof MongoError) {
    logger.error({ err: error, requestId }, 'Database error');
    return reply.status(500).send({
      error: 'Database error',
      code: ErrorCodes.DATABASE_ERROR,
      requestId,
    });
  }

  if ('statusCode' in error && typeof error.statusCode === 'number') {
    // Rate limit error
    if (error.statusCode === 429) {
      return reply.status(429).send({
        error: 'Too many requests',
        code: ErrorCodes.RATE_LIMITED,
        requestId,
      });
    }

    // http-errors from sensible, multipart and body parsing
    if (error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: error.message,
        code: ErrorCodes.BAD_REQUEST,
        requestId,
      });
    }
  }

  // Unknown error
  logger.error({ err: error, requestId }, 'Unhandled error');
  return reply.status(500).send({
    error: 'Internal server error',
    code: ErrorCodes.INTERNAL_ERROR,
    requestId,
  });
}
