/**
 * API Middleware Components
 *
 * Request validation, security headers and the error handler that turns
 * anything thrown into the standard envelope.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { Logger } from 'pino';
import { API_ERROR_CODES, HTTP_STATUS, REQUEST_LIMITS, errorResponse } from './types';

const BODY_METHODS = ['POST', 'PUT', 'PATCH'];
const JSON_BODY_ERRORS = ['FST_ERR_CTP_EMPTY_JSON_BODY', 'FST_ERR_CTP_INVALID_JSON_BODY'];

/**
 * Rejects oversized bodies and non-JSON content before parsing
 */
export function createRequestValidationMiddleware() {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const contentLength = request.headers['content-length'];
    if (contentLength) {
      const size = parseInt(contentLength, 10);
      const limit = getRequestSizeLimit(request.url);
      if (size > limit) {
        return reply.code(HTTP_STATUS.PAYLOAD_TOO_LARGE).send(errorResponse({
          code: API_ERROR_CODES.INVALID_REQUEST,
          message: `Request too large. Maximum size: ${limit} bytes`,
          details: { size, limit }
        }));
      }
    }

    if (BODY_METHODS.includes(request.method)) {
      const contentType = request.headers['content-type'];
      if (contentType && !contentType.includes('application/json')) {
        return reply.code(HTTP_STATUS.UNSUPPORTED_MEDIA_TYPE).send(errorResponse({
          code: API_ERROR_CODES.INVALID_REQUEST,
          message: 'Content-Type must be application/json',
          details: { received: contentType }
        }));
      }
    }
  };
}

/**
 * Consistent error responses; only server faults are logged as errors
 */
export function createErrorHandlingMiddleware(logger: Logger) {
  return (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const statusCode = error.statusCode ?? HTTP_STATUS.INTERNAL_SERVER_ERROR;

    if (JSON_BODY_ERRORS.includes(error.code) || (statusCode === HTTP_STATUS.BAD_REQUEST && error.message.includes('JSON'))) {
      logger.debug({ url: request.url }, 'Invalid JSON body');
      reply.code(HTTP_STATUS.BAD_REQUEST).send(errorResponse({
        code: API_ERROR_CODES.INVALID_JSON,
        message: 'Invalid JSON in request body'
      }));
      return;
    }

    if (error.validation) {
      reply.code(HTTP_STATUS.BAD_REQUEST).send(errorResponse({
        code: API_ERROR_CODES.VALIDATION_FAILED,
        message: 'Request validation failed',
        details: error.message
      }));
      return;
    }

    if (statusCode >= 400 && statusCode < 500) {
      reply.code(statusCode).send(errorResponse({
        code: API_ERROR_CODES.INVALID_REQUEST,
        message: error.message
      }));
      return;
    }

    logger.error({ err: error, url: request.url, method: request.method }, 'Unhandled API error');
    reply.code(HTTP_STATUS.INTERNAL_SERVER_ERROR).send(errorResponse({
      code: API_ERROR_CODES.INTERNAL_ERROR,
      message: 'Internal server error'
    }));
  };
}

/**
 * Security and no-cache headers on every API response
 */
export function createSecurityHeadersMiddleware() {
  return async (_request: FastifyRequest, reply: FastifyReply, payload: unknown) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Referrer-Policy', 'strict-origin-when-cross-origin');
    reply.header('Cache-Control', 'no-store, no-cache, must-revalidate');
    return payload;
  };
}

function getRequestSizeLimit(url: string): number {
  if (url.includes('/resolve')) {
    return REQUEST_LIMITS.RESOLVE;
  }
  return REQUEST_LIMITS.DEFAULT;
}

/**
 * Register all API middleware with a Fastify instance
 */
export function registerAPIMiddleware(fastify: FastifyInstance, logger: Logger): void {
  fastify.addHook('onRequest', createRequestValidationMiddleware());
  fastify.addHook('onSend', createSecurityHeadersMiddleware());
  fastify.setErrorHandler(createErrorHandlingMiddleware(logger));
}
