import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { requestContext, logger } from '../utils/logger.js';

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Accept a caller-supplied request ID only when it is a short printable token
 */
function incomingRequestId(header: string | string[] | undefined): string | undefined {
  const value = Array.isArray(header) ? header[0] : header;
  if (!value || value.length > MAX_REQUEST_ID_LENGTH || !/^[\w.:-]+$/.test(value)) {
    return undefined;
  }
  return value;
}

/**
 * Middleware to generate and attach request ID to each request
 * Also sets up async context for logging and logs the outcome of every request
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const requestId = incomingRequestId(req.headers['x-request-id']) ?? randomUUID();
  const startedAt = process.hrtime.bigint();

  res.setHeader('X-Request-ID', requestId);

  const context: Record<string, unknown> = {
    requestId,
    method: req.method,
    path: req.path,
  };

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    logger.info({
      ...context,
      statusCode: res.statusCode,
      contentLength: res.getHeader('Content-Length'),
      durationMs: Math.round(durationMs * 10) / 10,
    }, 'Request completed');
  });

  // Run request in async context
  requestContext.run(context, () => {
    logger.debug({ ...context, query: req.query, ip: req.ip }, 'Incoming request');
    next();
  });
}
