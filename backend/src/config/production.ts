// Production configuration and shared HTTP handlers
import type { Server } from 'http';
import type { Request, Response, NextFunction } from 'express';
import { isDevelopment, env } from './environment.js';

export const SERVICE_VERSION = '1.0.0';

// Production middleware configuration
export const productionConfig = {
  // Performance settings
  performance: {
    compressionLevel: 6,
    compressionThreshold: 1024,
    shutdownTimeoutMs: 30000
  },

  // Security settings
  security: {
    helmet: {
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          scriptSrc: ["'self'"],
          imgSrc: ["'self'", 'data:', 'https:'],
          connectSrc: ["'self'"]
        }
      }
    }
  }
};

export const createHealthCheck = () => {
  return (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: env.NODE_ENV,
      version: SERVICE_VERSION
    });
  };
};

// Production error handler
export const productionErrorHandler = (error: Error, req: Request, res: Response, next: NextFunction) => {
  console.error('Production error:', {
    message: error.message,
    stack: error.stack,
    url: req.url,
    method: req.method,
    timestamp: new Date().toISOString()
  });

  if (res.headersSent) {
    return next(error);
  }

  // Don't leak error details in production
  res.status(500).json({
    error: isDevelopment() ? error.message : 'Something went wrong',
    errorType: 'api'
  });
};

// Graceful shutdown handler
export const createGracefulShutdown = (server: Server) => {
  return (signal: string) => {
    console.log(`${signal} received, shutting down gracefully...`);

    // Stop accepting new connections
    server.close(() => {
      console.log('HTTP server closed');
      process.exit(0);
    });

    // Force shutdown after timeout
    setTimeout(() => {
      console.error('Forced shutdown due to timeout');
      process.exit(1);
    }, productionConfig.performance.shutdownTimeoutMs).unref();
  };
};
