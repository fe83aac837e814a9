import { Router } from 'express';
import type { AppServices } from '../container.js';
import { emptyNewsVolume } from '../services/newsVolume.js';
import { isPremarketMarket } from '../services/premarket.js';
import { queryFlag } from '../shared/utils/query.utils.js';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import { HttpError } from '../utils/httpError.js';
import { logger } from '../utils/logger.js';

export function newsRouter(services: AppServices, now: () => Date) {
  const router = Router();

  // ranking failures keep the panel renderable: 200 with an empty payload
  router.get('/news-volume', asyncHandler(async (req, res) => {
    try {
      res.json(ResponseUtils.success(await services.newsVolume.get(queryFlag(req.query.refresh))));
    } catch (err) {
      logger.warn({ err }, 'news_volume_failed');
      res.json(ResponseUtils.error(err instanceof Error ? err : String(err), emptyNewsVolume(now())));
    }
  }));

  router.get('/premarket-data', asyncHandler(async (req, res) => {
    res.json(ResponseUtils.success(await services.premarket.all(queryFlag(req.query.refresh))));
  }));

  router.get('/premarket-data/:market', asyncHandler(async (req, res) => {
    const market = req.params.market.toLowerCase();
    if (!isPremarketMarket(market)) throw HttpError.notFound(`market ${req.params.market}`);
    const data = await services.premarket.forMarket(market, queryFlag(req.query.refresh));
    res.json(ResponseUtils.success({ [market]: data }));
  }));

  return router;
}
