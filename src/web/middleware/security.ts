/**
 * Security middleware for the RPC host
 * Response headers for a JSON-only API and a fixed-window rate limiter
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';

export interface SecurityConfig {
  /** Enable HSTS (HTTP Strict Transport Security) */
  enableHSTS: boolean;
  /** HSTS max age in seconds */
  hstsMaxAge: number;
}

export const DEFAULT_SECURITY_CONFIG: SecurityConfig = {
  enableHSTS: false,
  hstsMaxAge: 31536000, // 1 year
};

/**
 * Security headers middleware
 */
export function securityHeaders(config: Partial<SecurityConfig> = {}): RequestHandler {
  const cfg = { ...DEFAULT_SECURITY_CONFIG, ...config };

  return (_req: Request, res: Response, next: NextFunction) => {
    // Nothing here is meant to render in a browser
    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'no-referrer');
    res.setHeader('Cache-Control', 'no-store');
    res.setHeader('Cross-Origin-Resource-Policy', 'same-origin');

    if (cfg.enableHSTS) {
      res.setHeader('Strict-Transport-Security', `max-age=${cfg.hstsMaxAge}; includeSubDomains`);
    }

    res.removeHeader('X-Powered-By');
    next();
  };
}

/**
 * Fixed-window rate limiter keyed by client address
 */
export function rateLimiter(
  windowMs: number,
  maxRequests: number,
  options: {
    keyGenerator?: (req: Request) => string;
    now?: () => number;
  } = {}
): RequestHandler {
  const requests = new Map<string, { count: number; resetAt: number }>();
  const getKey = options.keyGenerator ?? ((req: Request) => req.ip ?? 'unknown');
  const clock = options.now ?? Date.now;

  return (req: Request, res: Response, next: NextFunction) => {
    const key = getKey(req);
    const now = clock();

    // Drop expired windows once the map grows
    if (requests.size > 1000) {
      for (const [k, v] of requests.entries()) {
        if (v.resetAt <= now) {
          requests.delete(k);
        }
      }
    }

    let entry = requests.get(key);
    if (!entry || entry.resetAt <= now) {
      entry = { count: 0, resetAt: now + windowMs };
      requests.set(key, entry);
    }

    entry.count++;

    res.setHeader('X-RateLimit-Limit', maxRequests.toString());
    res.setHeader('X-RateLimit-Remaining', Math.max(0, maxRequests - entry.count).toString());
    res.setHeader('X-RateLimit-Reset', Math.ceil(entry.resetAt / 1000).toString());

    if (entry.count > maxRequests) {
      res.status(429).json({
        ok: false,
        error: { kind: 'RateLimited', message: 'Too many requests' },
        retryAfter: Math.ceil((entry.resetAt - now) / 1000),
      });
      return;
    }

    next();
  };
}
