import crypto from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import type { Logger } from './logger';

export interface LogEnrichmentOptions {
  logger: Logger;
  enabled?: boolean;
  includeUserAgent?: boolean;
  includeResponseTime?: boolean;
  customFields?: (req: Request) => Record<string, unknown>;
}

const SAFE_REQUEST_ID = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Attaches `req.log`, a child logger bound to the request id, and logs one
 * line when the response finishes.
 */
export function logEnrichment(options: LogEnrichmentOptions) {
  const {
    logger,
    enabled = true,
    includeUserAgent = true,
    includeResponseTime = true,
    customFields,
  } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    if (!enabled) return next();
    const startTime = Date.now();
    const incoming = req.header('x-request-id');
    const requestId = incoming && SAFE_REQUEST_ID.test(incoming) ? incoming : crypto.randomUUID();
    res.setHeader('X-Request-Id', requestId);

    req.log = logger.child({
      requestId,
      method: req.method,
      path: req.path,
      ...(customFields ? customFields(req) : {}),
    });

    res.on('finish', () => {
      req.log?.info('Request completed', {
        statusCode: res.statusCode,
        responseTime: includeResponseTime ? Date.now() - startTime : undefined,
        userAgent: includeUserAgent ? req.get('User-Agent') : undefined,
        principalId: req.principal?.id,
        cacheStatus: res.getHeader('X-Cache'),
        rateLimitRemaining: res.getHeader('X-RateLimit-Remaining'),
      });
    });

    next();
  };
}

declare global {
  namespace Express {
    interface Request {
      log?: Logger;
    }
  }
}
