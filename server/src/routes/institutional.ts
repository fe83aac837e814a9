import { Router } from 'express';
import multer from 'multer';
import type { AppServices } from '../container.js';
import { parseBfi82u, resolveUploadDate } from '../services/institutionalNet.js';
import { queryFlag } from '../shared/utils/query.utils.js';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import { decodeCsvBytes } from '../utils/decode.js';
import { HttpError } from '../utils/httpError.js';

const MAX_UPLOAD_BYTES = 2 * 1024 * 1024;

export function institutionalRouter(services: AppServices) {
  const router = Router();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 } });

  router.get('/institutional-net', asyncHandler(async (req, res) => {
    res.json(ResponseUtils.success(await services.institutional.get(queryFlag(req.query.refresh))));
  }));

  router.get('/institutional-net/dates', asyncHandler(async (_req, res) => {
    res.json(ResponseUtils.success({ dates: await services.institutional.listDates() }));
  }));

  router.post('/institutional-net/upload', upload.single('file'), asyncHandler(async (req, res) => {
    const file = req.file;
    if (!file || !file.originalname) throw HttpError.badRequest('Choose a CSV file to upload');
    const text = decodeCsvBytes(file.buffer);
    const body: unknown = req.body;
    const field = typeof body === 'object' && body !== null && 'date' in body ? body.date : undefined;
    const date = resolveUploadDate(field, file.originalname, text);
    if (!date) {
      throw HttpError.badRequest('Cannot determine the date: name the file YYYYMMDD.csv or fill in the date field (YYYYMMDD)');
    }
    if (!parseBfi82u(text, date)) throw HttpError.badRequest('File is not a BFI82U CSV report');
    await services.institutional.save(date, file.buffer);
    res.json(ResponseUtils.success({ saved_date: date, uploaded_dates: await services.institutional.listDates() }));
  }));

  return router;
}
