/**
 * Tenant unit API routes.
 *
 * POST /tenants/:tenantId/units: Submit a unit
 * GET /tenants/:tenantId/units: List the tenant's units
 * GET /tenants/:tenantId/units/:unitId: Get a unit
 * POST /tenants/:tenantId/units/:unitId/sync: Re-run matching for a unit
 */

import { Router } from 'express';
import { z } from 'zod';
import { GeoSyncError, notFoundError } from '../domain/errors';
import { TenantGeoUnit } from '../domain/tenant-unit';
import { GeographyIngestService } from '../ingest/geography-ingest-service';
import { parseInput } from './middleware';

const submitUnitSchema = z.object({
  // Range and integrality are hierarchy errors, reported by the service.
  level: z.number(),
  parentId: z.string().min(1).nullable().default(null),
  names: z
    .record(z.string())
    .refine((names) => Object.keys(names).length > 0, { message: 'At least one name is required' }),
  governmentCode: z.string().min(1).optional(),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

export function createUnitRoutes(ingest: GeographyIngestService): Router {
  const router = Router();

  async function requireUnit(tenantId: string, unitId: string): Promise<TenantGeoUnit> {
    const unit = await ingest.getUnit(unitId);
    if (!unit || unit.tenantId !== tenantId) {
      throw new GeoSyncError(notFoundError('Tenant unit', unitId));
    }
    return unit;
  }

  /**
   * POST /tenants/:tenantId/units
   * 201 with the acknowledgement; 200 when the tenant already had the unit.
   */
  router.post('/tenants/:tenantId/units', async (req, res, next) => {
    try {
      const body = parseInput(submitUnitSchema, req.body);
      const ack = await ingest.submit({ tenantId: req.params.tenantId, ...body });
      res.status(ack.deduplicated ? 200 : 201).json({ ack });
    } catch (err) {
      next(err);
    }
  });

  router.get('/tenants/:tenantId/units', async (req, res, next) => {
    try {
      const query = parseInput(listQuerySchema, req.query, 'query');
      const units = await ingest.listTenantUnits(req.params.tenantId, query);
      res.json({ units });
    } catch (err) {
      next(err);
    }
  });

  router.get('/tenants/:tenantId/units/:unitId', async (req, res, next) => {
    try {
      const unit = await requireUnit(req.params.tenantId, req.params.unitId);
      const ack = await ingest.ackFor(unit, false);
      res.json({ unit, conflictCaseId: ack.conflictCaseId });
    } catch (err) {
      next(err);
    }
  });

  router.post('/tenants/:tenantId/units/:unitId/sync', async (req, res, next) => {
    try {
      await requireUnit(req.params.tenantId, req.params.unitId);
      const ack = await ingest.sync(req.params.unitId);
      res.json({ ack });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
