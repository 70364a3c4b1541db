import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';

// Correlation context shared by HTTP requests and agent-driven validation runs
export const requestContext = new AsyncLocalStorage<{ requestId: string }>();

// Extend Express Request type to include requestId
declare global {
  namespace Express {
    interface Request {
      requestId: string;
    }
  }
}

/**
 * Middleware to generate and attach a unique request ID to each request.
 *
 * Accepts a client-provided X-Request-ID header, otherwise generates a UUID,
 * echoes it back on the response and runs the rest of the request inside
 * the correlation context so the logger can pick it up.
 */
export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const header = req.headers['x-request-id'];
  const requestId = (typeof header === 'string' && header) || randomUUID();

  req.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  requestContext.run({ requestId }, () => {
    next();
  });
};

/**
 * Runs a unit of work (a CLI or agent validation run) under its own
 * correlation id, so every log line it produces can be grouped.
 */
export function runWithRequestId<T>(requestId: string, work: () => T): T {
  return requestContext.run({ requestId }, work);
}

/**
 * Get the current correlation ID from async context.
 * Returns 'no-context' if called outside a request or run.
 */
export function getRequestId(): string {
  const context = requestContext.getStore();
  return context?.requestId || 'no-context';
}
