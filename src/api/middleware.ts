import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ZodError } from 'zod';
import type { Config } from '../config';
import { ValidationError, toHttpError } from '../errors';
import { debugLogger } from '../utils/debug-logger';

/**
 * Security headers middleware using helmet.
 * JSON-only API: nothing is framed, scripted or embedded.
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'same-origin' },
  dnsPrefetchControl: { allow: false },
  frameguard: { action: 'deny' },
  hsts: {
    maxAge: 31536000, // 1 year
    includeSubDomains: true,
  },
  noSniff: true,
  referrerPolicy: { policy: 'no-referrer' },
});

/**
 * Optional API key authentication middleware.
 * When a key is configured, requires X-API-Key on protected routes.
 */
export function createApiKeyAuth(apiKey: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    // If no API key is configured, skip authentication
    if (!apiKey) {
      next();
      return;
    }

    const providedKey = req.header('X-API-Key');

    if (!providedKey) {
      res.status(401).json({ error: 'unauthorized', message: 'API key required. Provide X-API-Key header.' });
      return;
    }

    if (!timingSafeEqual(providedKey, apiKey)) {
      res.status(403).json({ error: 'forbidden', message: 'Invalid API key' });
      return;
    }

    next();
  };
}

/**
 * Constant-time string comparison
 */
function timingSafeEqual(a: string, b: string): boolean {
  let result = a.length ^ b.length;
  for (let i = 0; i < a.length; i++) {
    result |= a.charCodeAt(i) ^ (b.charCodeAt(i % Math.max(b.length, 1)) || 0);
  }
  return result === 0;
}

export function createCorsMiddleware(config: Config): RequestHandler {
  return cors({
    origin: config.server.frontendUrl ??
      (config.server.nodeEnv === 'production' ? false : true),
    credentials: true,
  });
}

export function createRateLimiter(max: number, windowMs = 60 * 1000): RequestHandler {
  return rateLimit({
    windowMs,
    max,
    message: { error: 'rate_limited', message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Express 4 does not forward rejected promises; pass them to the error handler
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

export function toValidationError(error: ZodError): ValidationError {
  const problems = error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
  return new ValidationError(problems.join('; '));
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ error: 'invalid_request', message: 'Malformed JSON body' });
    return;
  }

  const httpError = toHttpError(err);
  if (httpError.status >= 500) {
    console.error(`Error on ${req.method} ${req.path}:`, err);
  } else {
    debugLogger.warn('API', `${req.method} ${req.path} rejected`, { status: httpError.status, message: httpError.body.message });
  }

  if (httpError.retryAfterSeconds !== undefined) {
    res.setHeader('Retry-After', String(httpError.retryAfterSeconds));
  }
  res.status(httpError.status).json(httpError.body);
}

export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    console.log(`${req.method} ${req.path} - ${res.statusCode} - ${duration}ms`);
  });

  next();
}
