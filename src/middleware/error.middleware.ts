import type { NextFunction, Request, Response } from 'express';
import { HttpError } from '../core/errors.js';

function resolveStatusCode(err: unknown): number {
  if (err instanceof HttpError) return err.statusCode;
  // body-parser and other express middleware attach `statusCode`/`status`.
  if (typeof err === 'object' && err !== null) {
    const candidate = 'statusCode' in err ? err.statusCode : 'status' in err ? err.status : undefined;
    if (typeof candidate === 'number' && candidate >= 400 && candidate < 600) return candidate;
  }
  return 500;
}

export const errorMiddleware = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const message = err instanceof Error ? err.message : 'An unexpected error occurred';
  console.error(`[${new Date().toISOString()}] [HTTP] [${req.method} ${req.path}] [ERROR] ${message}`);

  const statusCode = resolveStatusCode(err);

  res.status(statusCode).json({
    success: false,
    message: statusCode === 500 ? 'An unexpected error occurred' : message,
    // In development, send the stack trace to help debug
    ...(process.env.NODE_ENV === 'development' && err instanceof Error && { stack: err.stack })
  });
};
