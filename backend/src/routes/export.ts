import { Router, Request, Response } from 'express';
import type { ExportErrorResponse, ExportErrorType, ExportRequest } from '@shared/types';
import { ReviewExportService } from '../services/exportService.js';
import { ExportError } from '../utils/errors.js';
import { exportRateLimit } from '../middleware/rateLimiter.js';

const STATUS_BY_ERROR_TYPE: Record<ExportErrorType, number> = {
  validation: 400,
  fetch: 502,
  malformed_record: 500,
  rate_limit: 429,
  api: 500
};

export function createExportRouter(exportService: ReviewExportService): Router {
  const router = Router();

  // POST /api/export - Fetch every review for a storefront URL and return it as CSV
  router.post('/export', exportRateLimit, async (req: Request<{}, string | ExportErrorResponse, Partial<ExportRequest>>, res: Response<string | ExportErrorResponse>) => {
    const url: unknown = req.body?.url;

    if (typeof url !== 'string' || !url.trim()) {
      return res.status(400).json({
        error: 'url is required and must be a string',
        errorType: 'validation'
      });
    }

    try {
      const file = await exportService.handleExportRequest(url.trim());
      console.log(`[export] ${file.filename}: ${file.content.length} bytes`);

      res.attachment(file.filename);
      res.type(file.contentType);
      return res.send(file.content);
    } catch (error) {
      if (error instanceof ExportError) {
        if (error.errorType !== 'validation') {
          console.error(`[export] ${error.name} for ${url}:`, error.cause ?? error);
        }
        return res.status(STATUS_BY_ERROR_TYPE[error.errorType]).json({
          error: error.message,
          errorType: error.errorType
        });
      }

      console.error('[export] Unexpected error:', error);
      return res.status(500).json({
        error: error instanceof Error ? error.message : 'Internal server error',
        errorType: 'api'
      });
    }
  });

  return router;
}
