/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Transactions are
 * serialized: each runs alone against a snapshot it restores on failure.
 * Writes issued on the root handle while a transaction is running are not
 * isolated from its rollback, so services write only through `tx`.
 */

import { CanonicalUnit, canonicalKey } from '../domain/canonical-unit';
import { ConflictCase, ConflictStatus } from '../domain/conflict';
import { LedgerEntryDraft, SyncLedgerEntry } from '../domain/ledger';
import { SyncState, TenantGeoUnit } from '../domain/tenant-unit';
import {
  Store,
  TenantUnitStore,
  CanonicalUnitStore,
  LedgerStore,
  LedgerQuery,
  ConflictStore,
  ListOptions,
  UniqueConstraintError,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  if (!options) return items;
  const offset = options.offset ?? 0;
  const limit = options.limit ?? 100;
  return items.slice(offset, offset + limit);
}

/** Returned records are copies; mutating them never reaches the store. */
function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

function byCreatedAt<T extends { createdAt: string; id: string }>(a: T, b: T): number {
  return a.createdAt === b.createdAt ? a.id.localeCompare(b.id) : a.createdAt.localeCompare(b.createdAt);
}

/** Keyed table whose records are replaced on write, never mutated in place. */
abstract class MemoryTable<T extends { id: string }> {
  protected data = new Map<string, T>();

  snapshot(): Map<string, T> {
    return new Map(this.data);
  }

  restore(snapshot: Map<string, T>): void {
    this.data = snapshot;
  }

  protected values(): T[] {
    return [...this.data.values()];
  }
}

class MemoryTenantUnitStore extends MemoryTable<TenantGeoUnit> implements TenantUnitStore {
  async create(unit: TenantGeoUnit): Promise<TenantGeoUnit> {
    this.data.set(unit.id, deepCopy(unit));
    return deepCopy(unit);
  }

  async getById(id: string): Promise<TenantGeoUnit | null> {
    const unit = this.data.get(id);
    return unit ? deepCopy(unit) : null;
  }

  async update(id: string, updates: Partial<TenantGeoUnit>): Promise<TenantGeoUnit | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates), id, updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async findByName(
    tenantId: string,
    level: number,
    parentId: string | null,
    normalizedName: string,
  ): Promise<TenantGeoUnit | null> {
    const unit = this.values().find(
      (u) =>
        !u.retired &&
        u.tenantId === tenantId &&
        u.level === level &&
        u.parentId === parentId &&
        u.normalizedName === normalizedName,
    );
    return unit ? deepCopy(unit) : null;
  }

  async listByTenant(tenantId: string, options?: ListOptions): Promise<TenantGeoUnit[]> {
    const items = this.values().filter((u) => u.tenantId === tenantId).sort(byCreatedAt);
    return applyListOptions(items.map(deepCopy), options);
  }

  async listByCanonical(canonicalId: string): Promise<TenantGeoUnit[]> {
    return this.values()
      .filter((u) => u.canonicalId === canonicalId)
      .sort(byCreatedAt)
      .map(deepCopy);
  }

  async listChildren(parentId: string): Promise<TenantGeoUnit[]> {
    return this.values()
      .filter((u) => u.parentId === parentId && !u.retired)
      .sort(byCreatedAt)
      .map(deepCopy);
  }

  async listBySyncState(state: SyncState, options?: ListOptions): Promise<TenantGeoUnit[]> {
    const items = this.values().filter((u) => u.syncState === state && !u.retired).sort(byCreatedAt);
    return applyListOptions(items.map(deepCopy), options);
  }
}

class MemoryCanonicalUnitStore extends MemoryTable<CanonicalUnit> implements CanonicalUnitStore {
  async create(unit: CanonicalUnit): Promise<CanonicalUnit> {
    if (!unit.retired) this.assertKeyFree(unit);
    this.data.set(unit.id, deepCopy(unit));
    return deepCopy(unit);
  }

  async getById(id: string): Promise<CanonicalUnit | null> {
    const unit = this.data.get(id);
    return unit ? deepCopy(unit) : null;
  }

  async update(id: string, updates: Partial<CanonicalUnit>): Promise<CanonicalUnit | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates), id, updatedAt: new Date().toISOString() };
    if (!updated.retired) this.assertKeyFree(updated);
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async findByKey(level: number, parentId: string | null, normalizedName: string): Promise<CanonicalUnit | null> {
    const key = canonicalKey(level, parentId, normalizedName);
    const unit = this.values().find((u) => !u.retired && canonicalKey(u.level, u.parentId, u.normalizedName) === key);
    return unit ? deepCopy(unit) : null;
  }

  async listAtLevel(level: number, parentId?: string | null): Promise<CanonicalUnit[]> {
    return this.values()
      .filter((u) => !u.retired && u.level === level && (parentId === undefined || u.parentId === parentId))
      .sort(byCreatedAt)
      .map(deepCopy);
  }

  async listChildren(parentId: string): Promise<CanonicalUnit[]> {
    return this.values()
      .filter((u) => !u.retired && u.parentId === parentId)
      .sort(byCreatedAt)
      .map(deepCopy);
  }

  async list(options?: ListOptions & { includeRetired?: boolean }): Promise<CanonicalUnit[]> {
    const items = this.values()
      .filter((u) => options?.includeRetired || !u.retired)
      .sort(byCreatedAt);
    return applyListOptions(items.map(deepCopy), options);
  }

  private assertKeyFree(unit: CanonicalUnit): void {
    const key = canonicalKey(unit.level, unit.parentId, unit.normalizedName);
    for (const other of this.data.values()) {
      if (other.id === unit.id || other.retired) continue;
      if (canonicalKey(other.level, other.parentId, other.normalizedName) === key) {
        throw new UniqueConstraintError(key, other.id);
      }
    }
  }
}

interface LedgerSnapshot {
  entries: SyncLedgerEntry[];
  sequence: number;
}

class MemoryLedgerStore implements LedgerStore {
  private entries: SyncLedgerEntry[] = [];
  private sequence = 0;

  async append(draft: LedgerEntryDraft): Promise<SyncLedgerEntry> {
    this.sequence += 1;
    const entry: SyncLedgerEntry = { ...deepCopy(draft), sequence: this.sequence };
    this.entries.push(entry);
    return deepCopy(entry);
  }

  async list(query?: LedgerQuery): Promise<SyncLedgerEntry[]> {
    const items = this.entries.filter((e) => {
      if (query?.since && e.timestamp < query.since) return false;
      if (query?.tenantUnitId && e.tenantUnitId !== query.tenantUnitId) return false;
      if (query?.canonicalId && !ledgerTouches(e, query.canonicalId)) return false;
      return true;
    });
    const paged = query?.limit !== undefined || query?.offset !== undefined ? applyListOptions(items, query) : items;
    return paged.map(deepCopy);
  }

  snapshot(): LedgerSnapshot {
    return { entries: [...this.entries], sequence: this.sequence };
  }

  restore(snapshot: LedgerSnapshot): void {
    this.entries = snapshot.entries;
    this.sequence = snapshot.sequence;
  }
}

/** Whether a ledger entry concerns a canonical unit. */
function ledgerTouches(entry: SyncLedgerEntry, canonicalId: string): boolean {
  if (entry.canonicalId === canonicalId) return true;
  const event = entry.event;
  if (event.kind === 'unit-merged') return event.primaryId === canonicalId || event.secondaryId === canonicalId;
  return entry.candidates.some((c) => c.canonicalId === canonicalId);
}

class MemoryConflictStore extends MemoryTable<ConflictCase> implements ConflictStore {
  async create(conflict: ConflictCase): Promise<ConflictCase> {
    this.data.set(conflict.id, deepCopy(conflict));
    return deepCopy(conflict);
  }

  async getById(id: string): Promise<ConflictCase | null> {
    const conflict = this.data.get(id);
    return conflict ? deepCopy(conflict) : null;
  }

  async update(id: string, updates: Partial<ConflictCase>): Promise<ConflictCase | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates), id };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async listByStatus(status: ConflictStatus, options?: ListOptions): Promise<ConflictCase[]> {
    const items = this.values().filter((c) => c.status === status).sort(byCreatedAt);
    return applyListOptions(items.map(deepCopy), options);
  }

  async listByTenantUnit(tenantUnitId: string): Promise<ConflictCase[]> {
    return this.values()
      .filter((c) => c.tenantUnitId === tenantUnitId)
      .sort(byCreatedAt)
      .map(deepCopy);
  }
}

interface StoreSnapshot {
  tenantUnits: Map<string, TenantGeoUnit>;
  canonicalUnits: Map<string, CanonicalUnit>;
  conflicts: Map<string, ConflictCase>;
  ledger: LedgerSnapshot;
}

class MemoryStore implements Store {
  readonly tenantUnits = new MemoryTenantUnitStore();
  readonly canonicalUnits = new MemoryCanonicalUnitStore();
  readonly ledger = new MemoryLedgerStore();
  readonly conflicts = new MemoryConflictStore();
  private queue: Promise<void> = Promise.resolve();

  transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runIsolated(fn));
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runIsolated<T>(fn: (tx: Store) => Promise<T>): Promise<T> {
    const snapshot = this.snapshot();
    const tx: Store = {
      tenantUnits: this.tenantUnits,
      canonicalUnits: this.canonicalUnits,
      ledger: this.ledger,
      conflicts: this.conflicts,
      transaction: <U>(inner: (handle: Store) => Promise<U>): Promise<U> => inner(tx),
    };
    try {
      return await fn(tx);
    } catch (err) {
      this.restore(snapshot);
      throw err;
    }
  }

  private snapshot(): StoreSnapshot {
    return {
      tenantUnits: this.tenantUnits.snapshot(),
      canonicalUnits: this.canonicalUnits.snapshot(),
      conflicts: this.conflicts.snapshot(),
      ledger: this.ledger.snapshot(),
    };
  }

  private restore(snapshot: StoreSnapshot): void {
    this.tenantUnits.restore(snapshot.tenantUnits);
    this.canonicalUnits.restore(snapshot.canonicalUnits);
    this.conflicts.restore(snapshot.conflicts);
    this.ledger.restore(snapshot.ledger);
  }
}

/** Create a new in-memory store. */
export function createMemoryStore(): Store {
  return new MemoryStore();
}
