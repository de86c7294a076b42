import { NextFunction, Request, Response } from 'express';
import { generateTraceId } from '@charterquote/shared';

declare global {
  namespace Express {
    interface Request {
      traceId?: string;
    }
  }
}

/**
 * Propagates X-Trace-Id from the caller or assigns a fresh one.
 */
export function requestTracing(req: Request, res: Response, next: NextFunction) {
  const header = req.headers['x-trace-id'];
  const traceId = typeof header === 'string' && header.trim() ? header.trim() : generateTraceId();
  req.traceId = traceId;
  res.setHeader('X-Trace-Id', traceId);
  next();
}
