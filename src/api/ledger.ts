/**
 * Sync ledger API routes.
 *
 * GET /ledger: Entries in sequence order, filtered by since, tenantUnitId or canonicalId
 */

import { Router } from 'express';
import { z } from 'zod';
import { SyncLedger } from '../ledger/sync-ledger';
import { parseInput } from './middleware';

const ledgerQuerySchema = z.object({
  since: z.string().datetime().optional(),
  tenantUnitId: z.string().min(1).optional(),
  canonicalId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

export function createLedgerRoutes(ledger: SyncLedger): Router {
  const router = Router();

  router.get('/ledger', async (req, res, next) => {
    try {
      const query = parseInput(ledgerQuerySchema, req.query, 'query');
      const entries = await ledger.list(query);
      res.json({ entries });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
