import express from 'express';
import cors from 'cors';
import { loadConfig } from './config/env.js';
import { buildServices, type AppDeps } from './container.js';
import { notFoundHandler, errorHandler } from './middleware/errorHandler.js';
import { calendarRouter } from './routes/calendar.js';
import { institutionalRouter } from './routes/institutional.js';
import { marketRouter } from './routes/market.js';
import { newsRouter } from './routes/news.js';
import { ratiosRouter } from './routes/ratios.js';
import { strategyRouter } from './routes/strategy.js';
import { ResponseUtils } from './shared/utils/response.utils.js';
import { logger, setLogLevel } from './utils/logger.js';

export function createApp(deps: AppDeps = {}) {
  const config = deps.config ?? loadConfig();
  setLogLevel(config.logLevel);
  const services = buildServices({ ...deps, config });
  const now = deps.now ?? (() => new Date());

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '2mb' }));
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info({ method: req.method, url: req.originalUrl, status: res.statusCode, ms: Date.now() - start }, 'http_request');
    });
    next();
  });

  app.get('/health', (_req, res) => res.json(ResponseUtils.success({ status: 'ok', time: now().toISOString() })));

  app.use('/api', marketRouter(services));
  app.use('/api', ratiosRouter(services));
  app.use('/api', calendarRouter(services));
  app.use('/api', newsRouter(services, now));
  app.use('/api', institutionalRouter(services));
  app.use('/api', strategyRouter(services));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
