import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { RECAP_FIELDS, isExportKind, isRecapFieldKey } from '@ops-recap/domain';
import type { DailyRecapInput, RecapFieldKind, RecapUseCasePort } from '@ops-recap/domain';

import { httpError } from '../middleware/error-handler.js';

const MAX_TEXT_LENGTH = 5000;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

const KIND_BY_KEY = new Map<string, RecapFieldKind>(RECAP_FIELDS.map((f) => [f.key, f.kind]));

/**
 * Operator input: any subset of the record's keys. Counters take a
 * non-negative integer or text (text is kept as entered and checked by the
 * validator); free text is echoed as is.
 */
export const recapInputSchema = z
  .record(z.union([z.string().max(MAX_TEXT_LENGTH), z.number(), z.null()]))
  .superRefine((body, ctx) => {
    for (const [key, value] of Object.entries(body)) {
      const kind = KIND_BY_KEY.get(key);
      if (!kind) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'unknown field' });
        continue;
      }
      if (kind === 'counter' && typeof value === 'number' && (!Number.isInteger(value) || value < 0)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'must be a non-negative integer' });
      }
      if (key === 'date' && typeof value === 'string' && value !== '' && !ISO_DATE.test(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'expected YYYY-MM-DD' });
      }
    }
  });

export function toRecapInput(body: z.infer<typeof recapInputSchema>): DailyRecapInput {
  const input: DailyRecapInput = {};
  for (const [key, value] of Object.entries(body)) {
    if (isRecapFieldKey(key)) input[key] = value;
  }
  return input;
}

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

export function createRecapsRouter(service: RecapUseCasePort, defaultLimit = 20): Router {
  const router = Router();

  /** GET /api/recaps/capabilities */
  router.get('/capabilities', (_req: Request, res: Response) => {
    res.json({ exports: service.capabilities() });
  });

  /** POST /api/recaps/preview — metrics, overview and full recap; nothing is saved */
  router.post('/preview', (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = toRecapInput(recapInputSchema.parse(req.body));
      res.json(service.preview(input));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/recaps — validate, then append */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = toRecapInput(recapInputSchema.parse(req.body));
      const result = await service.submit(input);
      if (!result.accepted) {
        res.status(422).json({ error: 'record_rejected', violations: result.violations });
        return;
      }
      res.status(201).json({ saved: true, store: result.store, warning: result.warning });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/recaps — most recent rows, oldest first */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      res.json(await service.listRecent(query.limit ?? defaultLimit));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/recaps/export/:kind — csv | xlsx | pdf */
  router.post('/export/:kind', async (req: Request, res: Response, next: NextFunction) => {
    const kind = req.params['kind'] ?? '';
    let input: DailyRecapInput;
    try {
      input = toRecapInput(recapInputSchema.parse(req.body));
    } catch (err) {
      next(err);
      return;
    }

    if (!isExportKind(kind) || service.capabilities()[kind] !== 'available') {
      next(httpError(404, `export format unavailable: ${kind}`));
      return;
    }

    try {
      const file = await service.exportRecord(kind, input);
      if (!file) {
        next(httpError(404, `export format unavailable: ${kind}`));
        return;
      }
      res
        .status(200)
        .setHeader('Content-Type', file.contentType)
        .setHeader('Content-Disposition', `attachment; filename="${file.fileName}"`)
        .setHeader('Cache-Control', 'no-store')
        .send(file.body);
    } catch (err) {
      // An export failure is reported on its own; saving and other exports keep working.
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[recap-export] ${kind} export failed: ${message}`);
      res.status(500).json({ error: 'export_failed', kind, message });
    }
  });

  return router;
}
