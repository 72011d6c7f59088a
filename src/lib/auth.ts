import type { Request, Response, NextFunction } from 'express';
import { AuthenticationError, GatewayError, RateLimitExceeded, toErrorEnvelope } from './errors';
import { bearerToken } from './keys';
import type { GatewayFacade } from './gateway';
import type { Clock } from './clock';
import type { Logger } from './logger';
import type { Principal } from '../types';

export type AuthenticateOptions = {
  gateway: GatewayFacade;
  headerName?: string;
};

// Verifies the bearer token and exposes the principal as `req.principal`.
export function authenticate(options: AuthenticateOptions) {
  const { gateway, headerName = 'authorization' } = options;

  return function authenticateMiddleware(req: Request, res: Response, next: NextFunction) {
    try {
      req.principal = gateway.authenticate(bearerToken(req, headerName));
      next();
    } catch (error) {
      if (error instanceof AuthenticationError) res.setHeader('WWW-Authenticate', 'Bearer');
      next(error);
    }
  };
}

export type ErrorHandlerOptions = {
  clock: Clock;
  logger: Logger;
};

/**
 * Translates gateway rejections into `{detail, error_code, timestamp}`.
 * Anything that is not a known gateway error is logged and hidden behind a
 * generic 500.
 */
export function errorHandler(options: ErrorHandlerOptions) {
  const { clock, logger } = options;

  return function errorHandlerMiddleware(err: unknown, req: Request, res: Response, _next: NextFunction) {
    const log = req.log ?? logger;
    if (err instanceof RateLimitExceeded) {
      res.setHeader('X-RateLimit-Limit', String(err.limit));
      res.setHeader('X-RateLimit-Remaining', String(err.remaining));
      res.setHeader('X-RateLimit-Reset', String(Math.ceil(err.resetAt / 1000)));
      res.setHeader('Retry-After', String(err.retryAfterSeconds));
    }
    if (err instanceof AuthenticationError) {
      log.warn('Authentication failed', { error_code: err.code });
    } else if (!(err instanceof GatewayError)) {
      log.error('Unhandled error', { error: err });
    }
    const { status, body } = toErrorEnvelope(err, clock.now());
    res.status(status).json(body);
  };
}

declare global {
  namespace Express {
    interface Request {
      principal?: Principal;
    }
  }
}
