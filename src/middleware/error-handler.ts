/**
 * Error Handling Middleware
 * ApiError, async route wrapper and the terminal Express error handler
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { env } from '../config/env';

export class ApiError extends Error {
  readonly statusCode: number;
  readonly details?: string[];

  constructor(statusCode: number, message: string, details?: string[]) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * Forward rejections from async route handlers to the error handler
 */
export const asyncHandler =
  (handler: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction): void => {
  const statusCode = err instanceof ApiError ? err.statusCode : 500;

  if (statusCode >= 500) {
    console.error(`Unhandled error on ${req.method} ${req.path}:`, err);
  }

  res.status(statusCode).json({
    success: false,
    error: statusCode >= 500 && env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    ...(err instanceof ApiError && err.details ? { details: err.details } : {}),
  });
};
