import { Router } from 'express';
import type { AppServices } from '../container.js';
import { queryFlag } from '../shared/utils/query.utils.js';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import { asyncHandler } from '../utils/asyncHandler.js';

export function calendarRouter(services: AppServices) {
  const router = Router();

  router.get('/economic-calendar', asyncHandler(async (req, res) => {
    res.json(ResponseUtils.success(await services.calendar.get(queryFlag(req.query.refresh))));
  }));

  router.get('/ir-meetings', asyncHandler(async (req, res) => {
    res.json(ResponseUtils.success(await services.ir.get(queryFlag(req.query.refresh))));
  }));

  return router;
}
