import { Router } from 'express';
import type { AppServices } from '../container.js';
import { parseSections } from '../services/marketSummary.js';
import { isHistoryPeriod } from '../services/stockHistory.js';
import { queryFlag, queryString } from '../shared/utils/query.utils.js';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import { HttpError } from '../utils/httpError.js';

export function marketRouter(services: AppServices) {
  const router = Router();

  router.get('/market-data', asyncHandler(async (req, res) => {
    const request = parseSections(queryString(req.query.sections));
    const data = await services.market.summary(request, queryFlag(req.query.refresh));
    res.json(ResponseUtils.success(data));
  }));

  router.get('/stock-history/:symbol', asyncHandler(async (req, res) => {
    const period = queryString(req.query.period) || '1y';
    if (!isHistoryPeriod(period)) throw HttpError.badRequest(`Unsupported period: ${period}`);
    const data = await services.history.get(req.params.symbol, period);
    if (!data) throw HttpError.notFound(`history for ${req.params.symbol}`);
    res.json(ResponseUtils.success(data));
  }));

  return router;
}
