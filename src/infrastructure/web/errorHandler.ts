import { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { AppError, UpstreamServiceError, ValidationError } from '../../core/errors.js';
import { createLogger, describeError } from '../../utils/logger.js';

const log = createLogger('WebServer');

/**
 * Error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

/**
 * Forward rejected promises from async route handlers to the error handler
 */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

/**
 * Parse a value with a schema, raising ValidationError with the zod issues
 */
export function validate<T>(schema: { parse(value: unknown): T }, value: unknown): T {
  try {
    return schema.parse(value);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ValidationError(
        error.issues.map((issue) => issue.message).join('; '),
        error.issues
      );
    }
    throw error;
  }
}

function isBodyParserError(error: unknown): error is { type: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

function sendError(res: Response, status: number, body: ErrorResponse): void {
  res.status(status).json(body);
}

/**
 * Global error handler. Upstream failures are logged in full and reported
 * to the client without details.
 */
export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
  const context = { method: req.method, path: req.path, ...describeError(error) };

  if (error instanceof ValidationError) {
    log.warn('Invalid request', context);
    sendError(res, error.status, {
      error: { code: error.code, message: error.message, details: error.details },
    });
    return;
  }

  if (isBodyParserError(error)) {
    log.warn('Malformed JSON body', context);
    sendError(res, 400, {
      error: { code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' },
    });
    return;
  }

  if (error instanceof UpstreamServiceError) {
    log.error('Upstream service failed', { ...context, service: error.service, upstreamStatus: error.upstreamStatus });
    sendError(res, error.status, {
      error: { code: error.code, message: `The ${error.service} service is unavailable, please try again later` },
    });
    return;
  }

  if (error instanceof AppError) {
    log.error('Request failed', context);
    sendError(res, error.status, {
      error: { code: error.code, message: error.message },
    });
    return;
  }

  log.error('Unhandled error', context);
  sendError(res, 500, {
    error: { code: 'INTERNAL_ERROR', message: 'An internal error occurred' },
  });
};
