import fp from 'fastify-plugin';
import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import type { ApiErrorResponse, FieldError } from '@notekeeper/shared';
import { AppError, InvalidIdentifierError, ValidationError } from '../errors/AppError.js';

function sendAppError(request: FastifyRequest, reply: FastifyReply, error: AppError) {
  const level = error.statusCode >= 500 ? 'error' : 'warn';
  request.log[level]({ err: error }, error.message);

  const response: ApiErrorResponse = {
    error: {
      code: error.code,
      message: error.message,
      ...(error.details && { details: error.details }),
    },
  };
  return reply.status(error.statusCode).send(response);
}

export default fp(
  async function errorHandlerPlugin(fastify) {
    fastify.setErrorHandler<FastifyError>((error, request, reply) => {
      // Known application errors
      if (error instanceof AppError) {
        return sendAppError(request, reply, error);
      }

      // Fastify/AJV validation errors (schema validation)
      if (error.validation) {
        const fields: FieldError[] = error.validation.map((v) => ({
          path: v.instancePath || '/',
          message: v.message,
          ...(v.params && { params: v.params }),
        }));
        const details: Record<string, unknown> = { fields };

        // Path parameters are note ids
        if (error.validationContext === 'params') {
          return sendAppError(
            request,
            reply,
            new InvalidIdentifierError('Invalid note identifier', details),
          );
        }
        return sendAppError(request, reply, new ValidationError('Validation failed', details));
      }

      // Fastify client errors (malformed JSON, unsupported media type, oversized body)
      if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
        request.log.warn({ err: error }, error.message);

        const response: ApiErrorResponse = {
          error: {
            code: 'BAD_REQUEST',
            message: error.message,
          },
        };
        return reply.status(error.statusCode).send(response);
      }

      // Unknown/unexpected errors
      request.log.error({ err: error }, 'Unhandled error');

      const isProduction = fastify.config.nodeEnv === 'production';
      const response: ApiErrorResponse = {
        error: {
          code: 'INTERNAL_ERROR',
          message: isProduction ? 'An internal error occurred' : error.message,
        },
      };
      return reply.status(500).send(response);
    });
  },
  {
    name: 'error-handler',
    dependencies: ['config'],
  },
);
