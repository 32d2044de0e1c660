import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { AppError, isOperationalError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('ErrorHandler');

interface ErrorResponse {
  error: {
    message: string;
    code: string;
    details?: Record<string, unknown>;
    stack?: string;
  };
}

function statusOf(error: Error): number {
  if (error instanceof AppError) return error.statusCode;
  // http-errors style, as raised by send() when a transfer fails.
  for (const key of ['status', 'statusCode'] as const) {
    if (key in error) {
      const value: unknown = Reflect.get(error, key);
      if (typeof value === 'number' && value >= 400 && value < 600) return value;
    }
  }
  return 500;
}

function logError(error: Error, req: Request, statusCode: number): void {
  const logContext = {
    statusCode,
    path: req.path,
    method: req.method,
    errorName: error.name,
    errorMessage: error.message,
  };

  if (statusCode >= 500) {
    logger.error('Server error', { ...logContext, stack: error.stack });
  } else {
    logger.warn('Client error', logContext);
  }
}

export const errorHandler: ErrorRequestHandler = (
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  // Headers are gone (an aborted file transfer); let Express close the socket.
  if (res.headersSent) {
    next(err);
    return;
  }

  const isProduction = process.env.NODE_ENV === 'production';
  const statusCode = statusOf(err);
  logError(err, req, statusCode);

  if (!isOperationalError(err) && statusCode >= 500) {
    logger.error('Unhandled error', {
      message: err.message,
      path: req.path,
      method: req.method,
    });
  }

  const body: ErrorResponse = err instanceof AppError
    ? { error: { message: err.message, code: err.code, details: err.details } }
    : {
        error: {
          message: isProduction && statusCode >= 500
            ? 'An unexpected error occurred'
            : err.message || 'Internal Server Error',
          code: statusCode >= 500 ? 'INTERNAL_ERROR' : 'HTTP_ERROR',
        },
      };

  if (!isProduction) {
    body.error.stack = err.stack;
  }

  res.status(statusCode).json(body);
};

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    error: {
      message: `Route ${req.method} ${req.path} not found`,
      code: 'NOT_FOUND',
    },
  });
};
