import { Router } from 'express';
import type { LedgerRecord } from '../ledger/types.js';
import type { ApiServices } from './services.js';
import {
  asyncHandler,
  uploadsQuerySchema,
  validationError,
  type UploadRecordResponse,
  type UploadsResponse,
} from './types.js';

function toUploadRecord(record: LedgerRecord): UploadRecordResponse {
  return {
    date: record.date,
    published: record.published,
    videoId: record.identifier,
    title: record.title,
    weekday: record.weekday,
    url: record.url,
    timestamp: record.timestamp.toISOString(),
  };
}

export function createUploadsRouter(services: Pick<ApiServices, 'ledger'>): Router {
  const { ledger } = services;
  const router = Router();

  /**
   * GET /api/uploads?limit=N
   *
   * Most recent upload ledger records, newest date first (limit 1-100, default 30).
   */
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const parseResult = uploadsQuerySchema.safeParse(req.query);
      if (!parseResult.success) {
        throw validationError(parseResult.error);
      }

      const records = await ledger.recentRecords(parseResult.data.limit);
      const response: UploadsResponse = {
        uploads: records.map(toUploadRecord),
      };

      res.json(response);
    })
  );

  return router;
}
