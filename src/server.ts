/**
 * Express server configuration.
 *
 * Assembles the ingest boundary with middleware, routes, and dependency
 * injection. Conflict review is programmatic (`context.ingest.resolveConflict`)
 * and has no routes here.
 */

import express from 'express';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { GeoSyncConfig, createConfig } from './config';
import { SyncLedger } from './ledger/sync-ledger';
import { CanonicalMatcher } from './matching/canonical-matcher';
import { CanonicalRegistry } from './registry/canonical-registry';
import { ConflictDetector } from './conflicts/conflict-detector';
import { GeographyIngestService } from './ingest/geography-ingest-service';
import { errorHandler } from './api/middleware';
import { createUnitRoutes } from './api/units';
import { createCanonicalRoutes } from './api/canonical';
import { createLedgerRoutes } from './api/ledger';
import { Logger, logger } from './logger';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: GeoSyncConfig;
  store: Store;
  ledger: SyncLedger;
  matcher: CanonicalMatcher;
  registry: CanonicalRegistry;
  conflicts: ConflictDetector;
  ingest: GeographyIngestService;
}

export interface AppContextOptions {
  store?: Store;
  config?: GeoSyncConfig;
  log?: Logger;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = options.config ?? createConfig();
  const store = options.store ?? createMemoryStore();
  const log = options.log ?? logger;

  const ledger = new SyncLedger(store);
  const matcher = new CanonicalMatcher(store.canonicalUnits, config.matching, log);
  const registry = new CanonicalRegistry(store, ledger, config.matching.noiseWords, log);
  const conflicts = new ConflictDetector(
    store,
    ledger,
    registry,
    matcher,
    { highConfidence: config.matching.highConfidence, maxLevel: config.hierarchy.maxLevel },
    log,
  );
  const ingest = new GeographyIngestService(store, matcher, registry, conflicts, config, log);

  return { config, store, ledger, matcher, registry, conflicts, ingest };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
      syncMode: ctx.config.sync.mode,
    });
  });

  // Versioned API routes: /api/v1 prefix
  const v1 = express.Router();
  v1.use('/', createUnitRoutes(ctx.ingest));
  v1.use('/', createCanonicalRoutes(ctx.registry));
  v1.use('/', createLedgerRoutes(ctx.ledger));
  app.use('/api/v1', v1);

  // Error handler
  app.use(errorHandler);

  return app;
}
