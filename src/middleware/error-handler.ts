/**
 * Global Error Handler Middleware
 * @module middleware/error-handler
 *
 * Maps domain errors to HTTP responses of the shape
 * `{ statusCode, error, message, code, timestamp }`.
 */

import { FastifyInstance, FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { BaseError, isBaseError } from '../errors/index.js';
import { createModuleLogger } from '../logging/index.js';
import type { ErrorResponse } from '../routes/schemas/common.js';

const logger = createModuleLogger('error-handler');

// ============================================================================
// Error Formatting
// ============================================================================

const HTTP_ERROR_NAMES: Readonly<Record<number, string>> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  409: 'Conflict',
  422: 'Unprocessable Entity',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
  504: 'Gateway Timeout',
};

export function getHttpErrorName(statusCode: number): string {
  return HTTP_ERROR_NAMES[statusCode] ?? 'Error';
}

function isFastifyError(error: Error): error is FastifyError {
  return typeof Reflect.get(error, 'statusCode') === 'number';
}

/**
 * Format error for response
 */
export function formatError(error: FastifyError | BaseError | Error, requestId?: string): ErrorResponse {
  const isProduction = process.env.NODE_ENV === 'production';

  if (isBaseError(error)) {
    return {
      statusCode: error.statusCode,
      error: getHttpErrorName(error.statusCode),
      message: error.message,
      code: error.code,
      ...(isProduction || !error.context.details ? {} : { details: error.context.details }),
      requestId,
      timestamp: error.timestamp.toISOString(),
    };
  }

  if (isFastifyError(error) && error.validation) {
    return {
      statusCode: 400,
      error: 'Bad Request',
      message: error.message,
      code: 'VALIDATION_ERROR',
      ...(isProduction ? {} : { details: error.validation }),
      requestId,
      timestamp: new Date().toISOString(),
    };
  }

  if (isFastifyError(error) && error.statusCode !== undefined) {
    return {
      statusCode: error.statusCode,
      error: getHttpErrorName(error.statusCode),
      message: error.message,
      code: error.code,
      requestId,
      timestamp: new Date().toISOString(),
    };
  }

  return {
    statusCode: 500,
    error: 'Internal Server Error',
    message: isProduction ? 'An unexpected error occurred' : error.message,
    code: 'INTERNAL_ERROR',
    requestId,
    timestamp: new Date().toISOString(),
  };
}

// ============================================================================
// Error Handler Plugin
// ============================================================================

export interface ErrorHandlerOptions {
  /** Log handled errors */
  logErrors?: boolean;
}

async function errorHandlerPlugin(
  fastify: FastifyInstance,
  options: ErrorHandlerOptions
): Promise<void> {
  const logErrors = options.logErrors ?? true;

  fastify.setErrorHandler(
    async (error: FastifyError | BaseError | Error, request: FastifyRequest, reply: FastifyReply) => {
      const formatted = formatError(error, request.id);

      if (logErrors) {
        const logContext = {
          err: error,
          requestId: request.id,
          method: request.method,
          url: request.url,
          statusCode: formatted.statusCode,
          code: formatted.code,
        };

        if (formatted.statusCode >= 500) {
          logger.error(logContext, 'Server error');
        } else {
          logger.warn(logContext, 'Client error');
        }
      }

      return reply.status(formatted.statusCode).send(formatted);
    }
  );

  fastify.setNotFoundHandler(async (request: FastifyRequest, reply: FastifyReply) => {
    if (logErrors) {
      logger.warn({ method: request.method, url: request.url, requestId: request.id }, 'Route not found');
    }

    return reply.status(404).send({
      statusCode: 404,
      error: 'Not Found',
      message: `Route ${request.method} ${request.url} not found`,
      code: 'ROUTE_NOT_FOUND',
      requestId: request.id,
      timestamp: new Date().toISOString(),
    });
  });
}

export default fp(errorHandlerPlugin, {
  name: 'error-handler',
  fastify: '4.x',
});
