import type { Request, Response, NextFunction } from 'express';
import { AuthenticationError, RateLimitExceeded } from './errors';
import type { GatewayFacade } from './gateway';
import type { Principal } from '../types';

export type RateLimitOptions = {
  gateway: GatewayFacade;
  hooks?: {
    onAllowed?: (info: { principal: Principal; remaining: number; req: Request }) => void;
    onBlocked?: (info: { principal: Principal; resetAt: number; req: Request }) => void;
  };
};

// Runs after `authenticate`; admission is per principal, never per IP.
export function rateLimit(options: RateLimitOptions) {
  const { gateway, hooks } = options;

  return function rateLimitMiddleware(req: Request, res: Response, next: NextFunction) {
    const principal = req.principal;
    if (!principal) {
      next(new AuthenticationError('Missing', 'Rate limiting requires an authenticated principal'));
      return;
    }
    try {
      const decision = gateway.admit(principal);
      res.setHeader('X-RateLimit-Limit', String(decision.limit));
      res.setHeader('X-RateLimit-Remaining', String(decision.remaining));
      res.setHeader('X-RateLimit-Reset', String(Math.ceil(decision.resetAt / 1000)));
      hooks?.onAllowed?.({ principal, remaining: decision.remaining, req });
      next();
    } catch (error) {
      if (error instanceof RateLimitExceeded) {
        hooks?.onBlocked?.({ principal, resetAt: error.resetAt, req });
      }
      next(error);
    }
  };
}
