import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createServer } from 'http';

import { env } from './config/env.config';
import { logger } from './config/logger.config';
import { requestLoggingMiddleware } from './middleware/request-logging.middleware';
// Bootstrap DI container (auto-runs on import, must be before routes)
import './bootstrap';
import routes from './routes';
import { errorHandler } from './middleware/error.middleware';
import { PROJECTION_ERRORS_HEADER } from './modules/projections/projections.controller';

const app = express();

// Trust proxy for correct IP detection behind load balancers/proxies
app.set('trust proxy', 1);

app.use(
  helmet({
    // API server only, no HTML served
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
  })
);
app.use(
  cors({
    exposedHeaders: ['Content-Disposition', 'X-Request-ID', PROJECTION_ERRORS_HEADER],
  })
);
app.use(express.json({ limit: '50kb' }));
app.use(requestLoggingMiddleware);

// Routes
app.use('/api', routes);

// Global error handler (must be last)
app.use(errorHandler);

const server = createServer(app);

server.listen(env.PORT, '0.0.0.0', () => {
  logger.info('Projection service started', {
    port: env.PORT,
    provider: env.SPORTS_DATA_PROVIDER,
    starterPolicy: env.STARTER_RESOLUTION_POLICY,
    healthCheck: `http://localhost:${env.PORT}/api/health`,
  });
});

// Graceful shutdown
let isShuttingDown = false;
const gracefulShutdown = () => {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info('Shutting down gracefully...');

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force shutdown after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGTERM', gracefulShutdown);
process.on('SIGINT', gracefulShutdown);

export default app;
