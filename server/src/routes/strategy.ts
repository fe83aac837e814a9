import { Router } from 'express';
import type { AppServices } from '../container.js';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import { asyncHandler } from '../utils/asyncHandler.js';

export function strategyRouter(services: AppServices) {
  const router = Router();

  router.get('/strategies', (_req, res) => {
    res.json(ResponseUtils.success(services.strategy.catalogue()));
  });

  router.get('/strategy-recommendation/:symbol', asyncHandler(async (req, res) => {
    res.json(ResponseUtils.success(await services.strategy.recommend(req.params.symbol)));
  }));

  return router;
}
