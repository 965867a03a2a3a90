import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

// Environment validation schema
const envSchema = z.object({
  // Server Configuration
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().transform(Number).default('3001'),

  // Store Configuration
  DEFAULT_COUNTRY: z.string().length(2).default('it'),
  DEFAULT_LANG: z.string().min(2).default('it'),
  APPSTORE_MAX_REVIEWS: z.string().transform(Number).optional(), // unset means no cap
  PLAYSTORE_MAX_REVIEWS: z.string().transform(Number).default('100000'),
  APPSTORE_REQUEST_TIMEOUT_MS: z.string().transform(Number).default('30000'),

  // Rate Limiting Configuration
  RATE_LIMIT_WINDOW_MS: z.string().transform(Number).default('900000'), // 15 minutes
  RATE_LIMIT_MAX_REQUESTS: z.string().transform(Number).default('20'),

  // Security Configuration
  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  // Logging Configuration
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info')
});

// Validate and parse environment variables
let config: z.infer<typeof envSchema>;

try {
  config = envSchema.parse(process.env);
} catch (error) {
  if (error instanceof z.ZodError) {
    console.error('Environment validation failed:');
    error.errors.forEach(err => {
      console.error(`  ${err.path.join('.')}: ${err.message}`);
    });
    process.exit(1);
  }
  throw error;
}

// Export typed configuration
export const env = config;

// Helper functions
export const isDevelopment = () => env.NODE_ENV === 'development';
export const isProduction = () => env.NODE_ENV === 'production';

// Store fetch configuration
export const getStoreConfig = () => ({
  country: env.DEFAULT_COUNTRY,
  lang: env.DEFAULT_LANG,
  appStoreLimit: env.APPSTORE_MAX_REVIEWS ?? Number.POSITIVE_INFINITY,
  playStoreLimit: env.PLAYSTORE_MAX_REVIEWS,
  appStoreTimeoutMs: env.APPSTORE_REQUEST_TIMEOUT_MS
});

// Rate limiting configuration
export const getRateLimitConfig = () => ({
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  maxRequests: env.RATE_LIMIT_MAX_REQUESTS
});

// CORS configuration
export const getCorsConfig = () => ({
  origin: isProduction()
    ? env.CORS_ORIGIN.split(',').map(origin => origin.trim())
    : ['http://localhost:5173', 'http://localhost:3000'],
  credentials: true,
  exposedHeaders: ['Content-Disposition']
});

// Logging configuration
export const getLogConfig = () => ({
  level: env.LOG_LEVEL,
  debugMode: env.LOG_LEVEL === 'debug'
});
