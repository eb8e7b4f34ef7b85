import { Request, Response, NextFunction } from 'express';
import { logger } from './logging.js';
import { ApplicationError } from '../errors/ApplicationError.js';
import { isError } from '../utils/errorHandling.js';

/**
 * Body-parser errors carry an HTTP status (400 for malformed JSON, 413 for too large)
 */
function clientErrorStatus(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number' && error.status >= 400 && error.status < 500) {
    return error.status;
  }
  return undefined;
}

/**
 * Unified error handler for ApplicationError
 * Provides consistent error responses with rich logging context
 */
export const errorHandler = (
  error: Error | ApplicationError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const isDevelopment = process.env.NODE_ENV === 'development';

  let statusCode: number;
  let message: string;
  let errorCode: string | undefined;

  const request = {
    method: req.method,
    url: req.url,
    ip: req.ip,
    userAgent: req.get('User-Agent'),
  };

  if (error instanceof ApplicationError) {
    statusCode = error.statusCode;
    message = error.isOperational ? error.message : 'Internal server error';
    errorCode = error.code;

    const log = statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log('Request error', { error: error.toJSON(), request });
  } else {
    const clientStatus = clientErrorStatus(error);
    statusCode = clientStatus ?? 500;
    message = clientStatus !== undefined ? error.message : 'Internal server error';

    logger.error('Request error (generic)', {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      request,
    });
  }

  const errorResponse: {
    error: {
      message: string;
      status: number;
      code?: string;
      stack?: string;
    };
  } = {
    error: {
      message,
      status: statusCode,
      ...(errorCode && { code: errorCode }),
    },
  };

  if (isDevelopment && isError(error) && error.stack) {
    errorResponse.error.stack = error.stack;
  }

  res.status(statusCode).json(errorResponse);
};

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    error: {
      message: `Route ${req.method} ${req.url} not found`,
      status: 404,
    },
  });
};
