import express, { type Express } from 'express';
import type { Services } from './services.js';
import { getLogger } from './core/logger.js';
import { applySecurity } from './middleware/security.js';
import { createManualCorsMiddleware } from './middleware/corsManual.js';
import { traceContext } from './middleware/trace.js';
import { createRequestLogger } from './middleware/requestLog.js';
import { metricsMiddleware } from './middleware/httpMetrics.js';
import { convertRateLimit, globalRateLimit, settingsRateLimit } from './middleware/rateLimit.js';
import { errorHandler } from './middleware/error.js';
import { setupConvertRoutes } from './routes/convert.js';
import { setupJobRoutes } from './routes/jobs.js';
import { setupEventRoutes } from './routes/events.js';
import { setupSystemRoutes } from './routes/system.js';
import { mountPromMetrics } from './routes/metricsProm.js';
import { HttpError } from './core/httpError.js';

export function createApp(services: Services): Express {
  const { cfg, engine, broadcaster, metrics } = services;
  const log = getLogger('http');
  const app = express();

  app.set('trust proxy', 1);
  applySecurity(app);
  app.use(globalRateLimit);
  app.use(createManualCorsMiddleware(log, { getAllowedOrigins: () => cfg.corsOrigin }));
  app.use(traceContext);
  app.use(createRequestLogger(log));

  mountPromMetrics(app, metrics, engine, broadcaster);
  app.use('/api/convert', metricsMiddleware('convert'));
  app.use('/api/jobs', metricsMiddleware('jobs'));

  setupSystemRoutes(app, { cfg, log, engine, broadcaster, settingsRateLimit });
  setupConvertRoutes(app, { cfg, log, engine, convertRateLimit });
  setupJobRoutes(app, engine);
  setupEventRoutes(app, log, broadcaster);

  app.use((req, _res, next) => {
    next(new HttpError(404, 'NOT_FOUND', `No route for ${req.method} ${req.path}`));
  });
  // Error middleware last
  app.use(errorHandler);
  return app;
}
