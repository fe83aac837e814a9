import { Router } from 'express';
import type { AppServices } from '../container.js';
import { parseResample } from '../services/ratios.js';
import { queryFlag, queryString } from '../shared/utils/query.utils.js';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import { HttpError } from '../utils/httpError.js';

export function ratiosRouter(services: AppServices) {
  const router = Router();

  router.get('/ratios', asyncHandler(async (req, res) => {
    res.json(ResponseUtils.success(await services.ratios.summary(queryFlag(req.query.refresh))));
  }));

  router.get('/ratios/:id/history', asyncHandler(async (req, res) => {
    const resample = parseResample(queryString(req.query.resample));
    if (!resample) throw HttpError.badRequest('resample must be 1D, 1W or 1M');
    if (!services.ratios.find(req.params.id)) throw HttpError.notFound(`ratio ${req.params.id}`);
    const data = await services.ratios.historyFor(req.params.id, resample, queryFlag(req.query.refresh));
    if (!data) throw HttpError.notFound(`history for ratio ${req.params.id}`);
    res.json(ResponseUtils.success(data));
  }));

  return router;
}
