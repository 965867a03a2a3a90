import rateLimit from 'express-rate-limit';
import type { Request, Response } from 'express';
import type { ExportErrorResponse } from '@shared/types';
import { getRateLimitConfig } from '../config/environment.js';

const { windowMs, maxRequests } = getRateLimitConfig();

const rateLimitBody = (error: string): ExportErrorResponse => ({
  error,
  errorType: 'rate_limit'
});

// Rate limiter for the export endpoint: every export walks the whole review history
export const exportRateLimit = rateLimit({
  windowMs,
  max: maxRequests,
  standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
  legacyHeaders: false, // Disable the `X-RateLimit-*` headers
  handler: (req: Request, res: Response) => {
    res.status(429).json(rateLimitBody('Too many export requests from this IP, please try again later.'));
  }
});

// Rate limiter for general API endpoints
export const generalRateLimit = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  max: 1000,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req: Request, res: Response) => {
    res.status(429).json(rateLimitBody('Too many requests from this IP, please try again later.'));
  }
});
