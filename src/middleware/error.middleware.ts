import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

// body-parser marks its client errors (malformed JSON, oversized body) with a 4xx status
const clientStatus = (err: Error): number | undefined => {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
};

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  // Operational errors
  if (err instanceof AppError) {
    logger.warn({ statusCode: err.statusCode, message: err.message, path: req.path, method: req.method }, 'Request rejected');
    res.status(err.statusCode).json({
      success: false,
      message: err.message,
    });
    return;
  }

  // Zod validation errors
  if (err instanceof ZodError) {
    logger.warn({ issues: err.issues, path: req.path, method: req.method }, 'Validation error');
    res.status(400).json({
      success: false,
      message: 'Validation error',
      errors: err.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      })),
    });
    return;
  }

  const status = clientStatus(err);
  if (status !== undefined) {
    logger.warn({ status, message: err.message, path: req.path, method: req.method }, 'Malformed request');
    res.status(status).json({
      success: false,
      message: 'Malformed request body',
    });
    return;
  }

  logger.error({ err, path: req.path, method: req.method }, 'Unhandled error');

  // Default error
  res.status(500).json({
    success: false,
    message: 'Internal server error',
  });
};

// Async handler wrapper
export const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
