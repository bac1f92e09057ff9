/**
 * Tenant geography unit domain model.
 *
 * A node of one tenant's administrative tree as that tenant entered it.
 * Units are linked to at most one canonical unit and are never deleted,
 * only soft-retired.
 */

import { TypedError } from './errors';

/** Sync lifecycle of a tenant unit. */
export enum SyncState {
  Draft = 'draft',
  PendingSync = 'pending_sync',
  Matched = 'matched',
  ConflictOpen = 'conflict_open',
  Synced = 'synced',
  Rejected = 'rejected',
}

/** Valid sync state transitions. */
export const VALID_SYNC_TRANSITIONS: Record<SyncState, SyncState[]> = {
  [SyncState.Draft]: [SyncState.PendingSync],
  [SyncState.PendingSync]: [SyncState.Matched, SyncState.ConflictOpen],
  [SyncState.Matched]: [SyncState.Synced],
  [SyncState.ConflictOpen]: [SyncState.Synced, SyncState.Rejected, SyncState.PendingSync],
  // Re-ingest, e.g. after a merge or a parent correction.
  [SyncState.Synced]: [SyncState.PendingSync],
  [SyncState.Rejected]: [SyncState.PendingSync],
};

/** Declared names keyed by locale, e.g. `{ en: 'Kathmandu', ne: 'काठमाडौं' }`. */
export type LocalizedNames = Record<string, string>;

export interface TenantGeoUnit {
  id: string;
  tenantId: string;
  /** Depth in the administrative tree; 0 is the country. */
  level: number;
  /** Parent unit of the same tenant; null only at level 0. */
  parentId: string | null;
  names: LocalizedNames;
  /** Name in the default locale, or the first declared name. */
  primaryName: string;
  normalizedName: string;
  governmentCode?: string;
  canonicalId: string | null;
  syncState: SyncState;
  retired: boolean;
  createdAt: string;
  updatedAt: string;
}

/** Input accepted at the ingest boundary. */
export interface SubmitUnitInput {
  tenantId: string;
  level: number;
  parentId: string | null;
  names: LocalizedNames;
  governmentCode?: string;
}

/** Acknowledgement returned by the ingest boundary. */
export interface IngestAck {
  unitId: string;
  syncState: SyncState;
  canonicalId: string | null;
  conflictCaseId: string | null;
  /** True when the submission matched an existing unit of the same tenant. */
  deduplicated: boolean;
  notice?: TypedError;
}
