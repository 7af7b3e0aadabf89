import express from 'express';
import { z } from 'zod';
import type { LotQuery, LotStore } from '../lib/lot-store.js';
import { errorMessage } from '../sources/types.js';

const booleanParam = z.enum(['true', 'false', '1', '0']).transform((v) => v === 'true' || v === '1');

const instantParam = z.string().transform((v, ctx) => {
  const ms = /^\d+$/.test(v) ? Number(v) : Date.parse(v);
  if (!Number.isFinite(ms)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected an ISO date or epoch milliseconds' });
    return z.NEVER;
  }
  return ms;
});

export const LotQueryParams = z.object({
  open: booleanParam.optional(),
  location: z.string().optional(),
  closesAfter: instantParam.optional(),
  closesBefore: instantParam.optional(),
  excludeSameDay: booleanParam.optional(),
  minScore: z.coerce.number().min(0).max(1).optional(),
  limit: z.coerce.number().int().positive().max(1000).optional(),
});

/**
 * Read-only view of the lot table for downstream consumers.
 *
 *   GET /lots        ranked query (defaults: open lots, top 100)
 *   GET /lots/:id    one lot or 404
 */
export function createLotsRouter(store: LotStore) {
  const router = express.Router();

  router.get('/lots', async (req, res) => {
    const parsed = LotQueryParams.safeParse(req.query);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return res.status(400).json({ error: `Invalid query parameter ${issue?.path.join('.')}: ${issue?.message}` });
    }

    const q = parsed.data;
    const filter: LotQuery = {
      open: q.open ?? true,
      locations: q.location
        ?.split(',')
        .map((s) => s.trim())
        .filter(Boolean),
      closesAfter: q.closesAfter,
      closesBefore: q.closesBefore,
      excludeSameDay: q.excludeSameDay,
      minScore: q.minScore,
      limit: q.limit ?? 100,
    };

    try {
      const lots = await store.query(filter);
      res.json({ count: lots.length, lots });
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  router.get('/lots/:id', async (req, res) => {
    try {
      const lot = await store.get(req.params.id);
      if (!lot) return res.status(404).json({ error: `Lot ${req.params.id} not found` });
      res.json(lot);
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  return router;
}
