import { timingSafeEqual } from 'crypto';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { isPipelineError } from '../utils/errors';
import { formatZodError } from '../schemas';
import { sanitizeForLog } from '../utils/sanitize';

/**
 * Security headers for a JSON-only API
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'same-origin' },
  frameguard: { action: 'deny' },
  hsts: {
    maxAge: 31536000, // 1 year
    includeSubDomains: true,
  },
  noSniff: true,
  referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
});

/**
 * Optional API key authentication
 * When a key is configured, protected routes require a matching X-API-Key header
 */
export function apiKeyAuth(apiKey: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }

    const providedKey = req.header('X-API-Key');
    if (!providedKey) {
      res.status(401).json({ error: 'API key required. Provide X-API-Key header.' });
      return;
    }

    if (!safeEqual(providedKey, apiKey)) {
      res.status(403).json({ error: 'Invalid API key' });
      return;
    }

    next();
  };
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  // Compare against itself on length mismatch so timing does not leak the length
  return left.length === right.length
    ? timingSafeEqual(left, right)
    : !timingSafeEqual(left, left);
}

export function createCorsMiddleware(options: { frontendUrl?: string; production: boolean }): RequestHandler {
  return cors({
    origin: options.frontendUrl || (options.production ? false : true),
  });
}

export const chatRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 10,
  message: { error: 'Too many requests, please try again later.' },
  standardHeaders: true,
  legacyHeaders: false
});

export const extractRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 5,
  message: { error: 'Too many extraction requests, please try again later.' },
  standardHeaders: true,
  legacyHeaders: false
});

/**
 * Forward rejections of async handlers to the error handler (Express 4 does not).
 */
export function asyncHandler(
  fn: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function createErrorHandler(options: { exposeMessages: boolean }) {
  return function errorHandler(
    err: unknown,
    _req: Request,
    res: Response,
    _next: NextFunction
  ): void {
    if (err instanceof ZodError) {
      res.status(400).json({ error: 'INVALID_ARGUMENT', message: formatZodError(err) });
      return;
    }

    // body-parser raises SyntaxError on malformed JSON
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'INVALID_ARGUMENT', message: 'Malformed JSON body' });
      return;
    }

    if (isPipelineError(err)) {
      if (err.status >= 500) {
        console.error(`❌ ${err.name}: ${err.message}`);
      }
      res.status(err.status).json({ error: err.code, message: err.message });
      return;
    }

    console.error('Error:', err);
    res.status(500).json({
      error: 'Internal server error',
      message: options.exposeMessages && err instanceof Error ? err.message : undefined
    });
  };
}

export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    console.log(`${req.method} ${sanitizeForLog(req.path)} - ${res.statusCode} - ${duration}ms`);
  });

  next();
}
