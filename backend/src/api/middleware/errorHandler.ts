/**
 * Global Error Handler
 * Provides consistent error responses across the API
 */

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import type { ApiError, FieldError, ValidationErrorBody } from '@threadlens/shared';
import { AppError } from '../../lib/errors.js';

const ERROR_NAMES: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  413: 'Payload Too Large',
  415: 'Unsupported Media Type',
  422: 'Unprocessable Entity',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
};

const ERROR_CODES: Record<number, string> = {
  400: 'BAD_REQUEST',
  404: 'NOT_FOUND',
  422: 'VALIDATION_ERROR',
  500: 'INTERNAL_ERROR',
  503: 'SERVICE_UNAVAILABLE',
};

function getErrorName(statusCode: number): string {
  return ERROR_NAMES[statusCode] ?? 'Error';
}

function getErrorCode(statusCode: number): string {
  return ERROR_CODES[statusCode] ?? 'UNKNOWN_ERROR';
}

export function zodFieldErrors(error: ZodError): FieldError[] {
  return error.errors.map((issue) => ({
    field: issue.path.join('.') || 'body',
    message: issue.message,
    code: issue.code,
  }));
}

function statusCodeOf(error: FastifyError): number {
  if (error instanceof AppError) return error.statusCode;
  return error.statusCode ?? 500;
}

/**
 * Global error handler for Fastify
 */
export function errorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply): void {
  const timestamp = new Date().toISOString();

  if (error instanceof ZodError || error.validation) {
    request.log.warn({ requestId: request.id, error: error.message }, 'Request validation failed');

    const validationErrors: FieldError[] =
      error instanceof ZodError
        ? zodFieldErrors(error)
        : (error.validation ?? []).map((v) => ({
            field: v.instancePath.replace(/^\//, '') || 'body',
            message: v.message ?? 'Invalid value',
            code: v.keyword,
          }));

    const body: ValidationErrorBody = {
      error: 'Validation Error',
      message: 'Request validation failed',
      code: 'VALIDATION_ERROR',
      validationErrors,
      requestId: request.id,
      timestamp,
    };
    reply.code(400).send(body);
    return;
  }

  const statusCode = statusCodeOf(error);
  const code = error instanceof AppError ? error.code : getErrorCode(statusCode);

  request.log.error(
    {
      error: { name: error.name, message: error.message, stack: error.stack, code },
      requestId: request.id,
    },
    'Request error'
  );

  // Don't expose internal error details in production
  const isProduction = process.env.NODE_ENV === 'production';
  const message =
    statusCode >= 500 && isProduction && !(error instanceof AppError)
      ? 'Internal server error'
      : error.message || 'An error occurred';

  const response: ApiError = {
    error: getErrorName(statusCode),
    message,
    code,
    requestId: request.id,
    timestamp,
  };

  if (error instanceof AppError && error.details && !isProduction) {
    response.details = error.details;
  }

  reply.code(statusCode).send(response);
}
