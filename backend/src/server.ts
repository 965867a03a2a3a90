// Load environment variables first
import { env, getLogConfig, getStoreConfig } from './config/environment.js';

import { createServer } from 'http';
import { createApp } from './app.js';
import { createGracefulShutdown } from './config/production.js';
import { AppStoreApiClient } from './services/appStoreClient.js';
import { GooglePlayScraperClient } from './services/playStoreClient.js';
import { ReviewFetcher } from './services/reviewFetcher.js';
import { ReviewExportService } from './services/exportService.js';

const { debugMode } = getLogConfig();
const { appStoreTimeoutMs, ...exportOptions } = getStoreConfig();

const fetcher = new ReviewFetcher(
  new AppStoreApiClient({ timeoutMs: appStoreTimeoutMs, debugMode }),
  new GooglePlayScraperClient({ debugMode }),
  debugMode
);
const exportService = new ReviewExportService(fetcher, exportOptions);

const app = createApp({ exportService });
const server = createServer(app);

const gracefulShutdown = createGracefulShutdown(server);
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

// Start server
server.listen(env.PORT, () => {
  console.log(`Server running on port ${env.PORT}`);
  console.log(`Environment: ${env.NODE_ENV}`);
  console.log(`Health check: http://localhost:${env.PORT}/api/health`);
});
