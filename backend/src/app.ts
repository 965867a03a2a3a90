import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { createExportRouter } from './routes/export.js';
import { generalRateLimit } from './middleware/rateLimiter.js';
import { getCorsConfig } from './config/environment.js';
import { productionConfig, createHealthCheck, productionErrorHandler } from './config/production.js';
import { ReviewExportService } from './services/exportService.js';

export interface AppDependencies {
  exportService: ReviewExportService;
}

export function createApp({ exportService }: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(helmet(productionConfig.security.helmet));

  app.use(compression({
    filter: (req: Request, res: Response) => {
      if (req.headers['x-no-compression']) {
        return false;
      }
      return compression.filter(req, res);
    },
    level: productionConfig.performance.compressionLevel,
    threshold: productionConfig.performance.compressionThreshold
  }));

  app.use(cors(getCorsConfig()));
  app.use(generalRateLimit);
  app.use(express.json({ limit: '100kb' }));

  // Request logging middleware
  app.use((req, res, next) => {
    console.log(`${new Date().toISOString()} - ${req.method} ${req.path}`);
    next();
  });

  // API Routes
  app.use('/api', createExportRouter(exportService));
  app.get('/api/health', createHealthCheck());

  // 404 handler
  app.use('*', (req, res) => {
    res.status(404).json({
      error: 'Not found',
      message: `Route ${req.method} ${req.originalUrl} not found`
    });
  });

  // Error handling middleware
  app.use(productionErrorHandler);

  return app;
}
