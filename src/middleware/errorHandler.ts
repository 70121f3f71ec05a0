import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AppError, NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { config } from '../config';
import type { ErrorResponse } from '../types';

export const errorHandler = (
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  let statusCode = 500;
  let message = err.message;
  let isOperational = false;
  let details: AppError['details'] = {};

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    message = err.message;
    isOperational = err.isOperational;
    details = err.details;
  }

  if (statusCode >= 500) {
    logger.error(err.stack || err.message, { method: req.method, path: req.path, statusCode });
  } else {
    logger.warn(message, { method: req.method, path: req.path, statusCode });
  }

  const body: ErrorResponse = {
    ...details,
    status: 'error',
    statusCode,
    error: isOperational ? message : 'Something went wrong',
    ...(config.isDevelopment && { stack: err.stack }),
  };
  res.status(statusCode).json(body);
};

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction): void => {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
};

// Async error wrapper
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
