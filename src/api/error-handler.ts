import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import logger from '@/utils/logger';

export interface ErrorWithStatus extends Error {
  status?: number;
  statusCode?: number;
}

interface ErrorBody {
  message: string;
  status: number;
  timestamp: string;
  path: string;
  issues?: string[];
  stack?: string;
}

export function errorHandler(
  error: ErrorWithStatus,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // If response was already sent, delegate to Express default error handler
  if (res.headersSent) {
    return next(error);
  }

  const isValidation = error instanceof ZodError;
  const statusCode = isValidation ? 400 : error.status || error.statusCode || 500;

  logger.error('Express error handler caught error:', {
    error: error.message,
    stack: error.stack,
    url: req.url,
    method: req.method,
    status: statusCode
  });

  const body: ErrorBody = {
    message: statusCode === 500 ? 'Internal Server Error' : isValidation ? 'Invalid request body' : error.message,
    status: statusCode,
    timestamp: new Date().toISOString(),
    path: req.path
  };

  if (error instanceof ZodError) {
    body.issues = error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }

  // Include stack trace in development
  if (process.env.NODE_ENV === 'development') {
    body.stack = error.stack;
  }

  res.status(statusCode).json({ error: body });
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: {
      message: 'Endpoint not found',
      status: 404,
      timestamp: new Date().toISOString(),
      path: req.path
    }
  });
}

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
