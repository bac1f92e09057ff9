/**
 * Canonical registry API routes.
 *
 * GET /canonical/:id: Get a canonical unit with its derived confidence
 */

import { Router } from 'express';
import { GeoSyncError, notFoundError } from '../domain/errors';
import { CanonicalRegistry } from '../registry/canonical-registry';

export function createCanonicalRoutes(registry: CanonicalRegistry): Router {
  const router = Router();

  /**
   * GET /canonical/:id
   * A merged unit is still returned; `activeId` names its survivor.
   */
  router.get('/canonical/:id', async (req, res, next) => {
    try {
      const canonical = await registry.getById(req.params.id);
      if (!canonical) throw new GeoSyncError(notFoundError('Canonical unit', req.params.id));
      const active = canonical.retired ? await registry.resolveActive(canonical.id) : canonical;
      res.json({
        canonical,
        confidence: registry.confidence(canonical),
        activeId: active?.id ?? null,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
