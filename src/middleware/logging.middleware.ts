/**
 * Logging Middleware
 * Request IDs and request/response logging
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { loggers } from '../utils/logger';

// Extend Express Request to add logging properties
declare global {
  namespace Express {
    interface Request {
      startTime?: number;
      requestId?: string;
    }
  }
}

const SLOW_REQUEST_MS = 1000;

/**
 * Assign or propagate X-Request-ID
 */
export const requestId = (req: Request, res: Response, next: NextFunction): void => {
  const incoming = req.get('x-request-id');
  req.requestId = incoming && incoming.length <= 128 ? incoming : uuidv4();
  res.setHeader('X-Request-ID', req.requestId);
  next();
};

/**
 * Request logging middleware. Webhook bodies carry caller speech and phone
 * numbers, so they are only logged at debug level.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  // Skip logging for health checks
  if (req.path === '/health') {
    return next();
  }

  req.startTime = Date.now();

  loggers.api.info('Incoming request', {
    requestId: req.requestId,
    method: req.method,
    url: req.originalUrl,
    ip: req.ip,
    userAgent: req.get('user-agent'),
    contentType: req.get('content-type'),
  });

  if (req.body && typeof req.body === 'object' && Object.keys(req.body).length > 0) {
    loggers.api.debug('Request body', { requestId: req.requestId, body: req.body });
  }

  res.on('finish', () => {
    const responseTime = req.startTime ? Date.now() - req.startTime : 0;
    const logLevel = res.statusCode >= 500 ? 'error'
      : res.statusCode >= 400 ? 'warn' : 'info';

    loggers.api[logLevel]('Request completed', {
      requestId: req.requestId,
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      responseTime,
      ...(responseTime > SLOW_REQUEST_MS && { slowRequest: true }),
    });
  });

  next();
};
