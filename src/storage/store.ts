/**
 * Storage layer interfaces.
 *
 * Defines the persistence boundary of the reconciliation core. A backend
 * must offer point lookups by id, a unique key on canonical units over
 * (level, parent, normalized name), append-only ledger writes, and
 * transactions that make the ledger append and the registry write of one
 * decision visible together or not at all.
 */

import { CanonicalUnit } from '../domain/canonical-unit';
import { ConflictCase, ConflictStatus } from '../domain/conflict';
import { LedgerEntryDraft, SyncLedgerEntry } from '../domain/ledger';
import { SyncState, TenantGeoUnit } from '../domain/tenant-unit';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Raised by a store when a write would violate a unique key. */
export class UniqueConstraintError extends Error {
  constructor(
    public readonly key: string,
    public readonly existingId: string,
  ) {
    super(`Unique constraint violated for key ${key} (held by ${existingId})`);
    this.name = 'UniqueConstraintError';
  }
}

/** Store interface for tenant units. */
export interface TenantUnitStore {
  create(unit: TenantGeoUnit): Promise<TenantGeoUnit>;
  getById(id: string): Promise<TenantGeoUnit | null>;
  update(id: string, updates: Partial<TenantGeoUnit>): Promise<TenantGeoUnit | null>;
  /** Non-retired unit of a tenant with the same position and normalized name. */
  findByName(
    tenantId: string,
    level: number,
    parentId: string | null,
    normalizedName: string,
  ): Promise<TenantGeoUnit | null>;
  listByTenant(tenantId: string, options?: ListOptions): Promise<TenantGeoUnit[]>;
  listByCanonical(canonicalId: string): Promise<TenantGeoUnit[]>;
  /** Non-retired children of a unit. */
  listChildren(parentId: string): Promise<TenantGeoUnit[]>;
  listBySyncState(state: SyncState, options?: ListOptions): Promise<TenantGeoUnit[]>;
}

/**
 * Store interface for canonical units.
 * `create` and `update` throw UniqueConstraintError when another non-retired
 * unit already holds the same (level, parentId, normalizedName).
 */
export interface CanonicalUnitStore {
  create(unit: CanonicalUnit): Promise<CanonicalUnit>;
  getById(id: string): Promise<CanonicalUnit | null>;
  update(id: string, updates: Partial<CanonicalUnit>): Promise<CanonicalUnit | null>;
  findByKey(level: number, parentId: string | null, normalizedName: string): Promise<CanonicalUnit | null>;
  /**
   * Non-retired units at a level. With `parentId` undefined the parent is not
   * constrained; null selects roots.
   */
  listAtLevel(level: number, parentId?: string | null): Promise<CanonicalUnit[]>;
  /** Non-retired children of a canonical unit. */
  listChildren(parentId: string): Promise<CanonicalUnit[]>;
  list(options?: ListOptions & { includeRetired?: boolean }): Promise<CanonicalUnit[]>;
}

/** Ledger query options. */
export interface LedgerQuery extends ListOptions {
  /** ISO timestamp; entries at or after it. */
  since?: string;
  tenantUnitId?: string;
  canonicalId?: string;
}

/** Append-only store for ledger entries. There is no update or delete. */
export interface LedgerStore {
  append(entry: LedgerEntryDraft): Promise<SyncLedgerEntry>;
  /** Entries in sequence order. */
  list(query?: LedgerQuery): Promise<SyncLedgerEntry[]>;
}

/** Store interface for conflict cases. */
export interface ConflictStore {
  create(conflict: ConflictCase): Promise<ConflictCase>;
  getById(id: string): Promise<ConflictCase | null>;
  update(id: string, updates: Partial<ConflictCase>): Promise<ConflictCase | null>;
  listByStatus(status: ConflictStatus, options?: ListOptions): Promise<ConflictCase[]>;
  listByTenantUnit(tenantUnitId: string): Promise<ConflictCase[]>;
}

/** Composite store interface. */
export interface Store {
  tenantUnits: TenantUnitStore;
  canonicalUnits: CanonicalUnitStore;
  ledger: LedgerStore;
  conflicts: ConflictStore;
  /**
   * Run `fn` as one atomic unit. Writes made through the `tx` handle are
   * discarded if `fn` rejects. Calling `transaction` on `tx` itself runs
   * inline within the enclosing unit.
   */
  transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T>;
}
