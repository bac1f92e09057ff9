/**
 * geo-reconcile: cross-tenant geography reconciliation.
 *
 * Tenants submit their own administrative trees; each unit is fuzzy-matched
 * against one shared canonical registry and linked, created or parked for
 * review. Every decision is recorded in an append-only sync ledger that can
 * rebuild the registry.
 *
 * The HTTP server lives in `main.ts`; this module only exports.
 */

export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOptions } from './server';
export * from './domain';
export * from './config';
export * from './logger';
export * from './storage/store';
export { createMemoryStore } from './storage/memory-store';
export { runAtomic } from './storage/atomic';
export * from './engine/state-machine';
export * from './matching/normalize';
export * from './matching/similarity';
export * from './matching/canonical-matcher';
export * from './registry/canonical-registry';
export * from './ledger/sync-ledger';
export * from './ledger/replay';
export * from './conflicts/conflict-detector';
export * from './ingest/hierarchy';
export * from './ingest/geography-ingest-service';
