/**
 * Tests for the in-memory store: copy isolation, the canonical unique key,
 * and transaction rollback.
 */

import { createMemoryStore } from '../../src/storage/memory-store';
import { UniqueConstraintError } from '../../src/storage/store';
import type { CanonicalUnit } from '../../src/domain/canonical-unit';
import type { TenantGeoUnit } from '../../src/domain/tenant-unit';
import { SyncState } from '../../src/domain/tenant-unit';

const baseCanonical: CanonicalUnit = {
  id: 'geo_1',
  level: 0,
  parentId: null,
  primaryName: 'Nepal',
  normalizedName: 'nepal',
  alternateNames: ['Nepal'],
  tenantIds: ['tenant-a'],
  tenantReferenceCount: 1,
  verification: 'unverified',
  retired: false,
  createdAt: '2024-01-01T00:00:00.000Z',
  updatedAt: '2024-01-01T00:00:00.000Z',
};

const baseUnit: TenantGeoUnit = {
  id: 'tgu_1',
  tenantId: 'tenant-a',
  level: 0,
  parentId: null,
  names: { en: 'Nepal' },
  primaryName: 'Nepal',
  normalizedName: 'nepal',
  canonicalId: null,
  syncState: SyncState.Draft,
  retired: false,
  createdAt: '2024-01-01T00:00:00.000Z',
  updatedAt: '2024-01-01T00:00:00.000Z',
};

describe('Memory store copy isolation', () => {
  it('mutating a returned canonical unit does not affect the store', async () => {
    const store = createMemoryStore();
    await store.canonicalUnits.create(baseCanonical);

    const fetched = await store.canonicalUnits.getById('geo_1');
    fetched?.alternateNames.push('Nepaal');
    fetched?.tenantIds.push('tenant-z');

    const again = await store.canonicalUnits.getById('geo_1');
    expect(again?.alternateNames).toEqual(['Nepal']);
    expect(again?.tenantIds).toEqual(['tenant-a']);
  });

  it('mutating the input after create does not affect the store', async () => {
    const store = createMemoryStore();
    const input: TenantGeoUnit = { ...baseUnit, names: { en: 'Nepal' } };
    await store.tenantUnits.create(input);
    input.names.en = 'Changed';

    const fetched = await store.tenantUnits.getById('tgu_1');
    expect(fetched?.names).toEqual({ en: 'Nepal' });
  });
});

describe('Canonical unique key', () => {
  it('rejects a second active unit with the same level, parent and name', async () => {
    const store = createMemoryStore();
    await store.canonicalUnits.create(baseCanonical);

    await expect(store.canonicalUnits.create({ ...baseCanonical, id: 'geo_2' })).rejects.toBeInstanceOf(
      UniqueConstraintError,
    );
    await expect(store.canonicalUnits.create({ ...baseCanonical, id: 'geo_2' })).rejects.toMatchObject({
      key: '0:root:nepal',
      existingId: 'geo_1',
    });
  });

  it('allows the same name under a different parent', async () => {
    const store = createMemoryStore();
    await store.canonicalUnits.create({ ...baseCanonical, id: 'geo_a', level: 1, parentId: 'geo_x' });
    await store.canonicalUnits.create({ ...baseCanonical, id: 'geo_b', level: 1, parentId: 'geo_y' });

    expect(await store.canonicalUnits.listAtLevel(1)).toHaveLength(2);
    expect(await store.canonicalUnits.listAtLevel(1, 'geo_y')).toHaveLength(1);
  });

  it('a retired unit releases its key', async () => {
    const store = createMemoryStore();
    await store.canonicalUnits.create(baseCanonical);
    await store.canonicalUnits.update('geo_1', { retired: true, mergedInto: 'geo_2' });

    await store.canonicalUnits.create({ ...baseCanonical, id: 'geo_2' });
    const found = await store.canonicalUnits.findByKey(0, null, 'nepal');
    expect(found?.id).toBe('geo_2');
  });

  it('an update that takes a sibling name is rejected', async () => {
    const store = createMemoryStore();
    await store.canonicalUnits.create(baseCanonical);
    await store.canonicalUnits.create({ ...baseCanonical, id: 'geo_2', primaryName: 'India', normalizedName: 'india' });

    await expect(store.canonicalUnits.update('geo_2', { normalizedName: 'nepal' })).rejects.toBeInstanceOf(
      UniqueConstraintError,
    );
    expect((await store.canonicalUnits.getById('geo_2'))?.normalizedName).toBe('india');
  });
});

describe('Memory store transactions', () => {
  it('commits every write of a successful transaction', async () => {
    const store = createMemoryStore();
    await store.transaction(async (tx) => {
      await tx.tenantUnits.create(baseUnit);
      await tx.canonicalUnits.create(baseCanonical);
    });

    expect(await store.tenantUnits.getById('tgu_1')).not.toBeNull();
    expect(await store.canonicalUnits.getById('geo_1')).not.toBeNull();
  });

  it('rolls back every write of a failed transaction, ledger included', async () => {
    const store = createMemoryStore();
    await store.ledger.append({
      id: 'led_0',
      timestamp: '2024-01-01T00:00:00.000Z',
      actorId: 'system',
      tenantUnitId: null,
      tenantId: null,
      candidates: [],
      outcome: null,
      canonicalId: 'geo_0',
      event: { kind: 'unit-verification-changed', canonicalId: 'geo_0', from: 'unverified', to: 'verified' },
    });

    await expect(
      store.transaction(async (tx) => {
        await tx.tenantUnits.create(baseUnit);
        await tx.ledger.append({
          id: 'led_1',
          timestamp: '2024-01-01T00:00:01.000Z',
          actorId: 'system',
          tenantUnitId: 'tgu_1',
          tenantId: 'tenant-a',
          candidates: [],
          outcome: 'create-new',
          canonicalId: 'geo_1',
          event: {
            kind: 'unit-created',
            canonicalId: 'geo_1',
            level: 0,
            parentId: null,
            primaryName: 'Nepal',
            normalizedName: 'nepal',
            names: ['Nepal'],
            tenantId: 'tenant-a',
          },
        });
        throw new Error('write failed');
      }),
    ).rejects.toThrow('write failed');

    expect(await store.tenantUnits.getById('tgu_1')).toBeNull();
    const entries = await store.ledger.list();
    expect(entries.map((e) => e.id)).toEqual(['led_0']);

    // The sequence number of the discarded entry is reused.
    const next = await store.ledger.append({ ...entries[0], id: 'led_2' });
    expect(next.sequence).toBe(2);
  });

  it('runs transactions one at a time', async () => {
    const store = createMemoryStore();
    const order: string[] = [];

    await Promise.all([
      store.transaction(async () => {
        order.push('first:start');
        await new Promise((resolve) => setTimeout(resolve, 10));
        order.push('first:end');
      }),
      store.transaction(async () => {
        order.push('second:start');
        order.push('second:end');
      }),
    ]);

    expect(order).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('a failed transaction does not block the next one', async () => {
    const store = createMemoryStore();
    await expect(store.transaction(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');

    const result = await store.transaction(async (tx) => {
      await tx.tenantUnits.create(baseUnit);
      return 'done';
    });
    expect(result).toBe('done');
  });

  it('a nested transaction runs inline', async () => {
    const store = createMemoryStore();
    await store.transaction(async (tx) =>
      tx.transaction(async (inner) => {
        await inner.tenantUnits.create(baseUnit);
      }),
    );
    expect(await store.tenantUnits.getById('tgu_1')).not.toBeNull();
  });
});

describe('Memory ledger queries', () => {
  it('filters by tenant unit and canonical unit in sequence order', async () => {
    const store = createMemoryStore();
    const entry = {
      timestamp: '2024-01-01T00:00:00.000Z',
      actorId: 'system',
      tenantId: 'tenant-a',
      candidates: [{ canonicalId: 'geo_9', name: 'Nepaal', score: 0.6 }],
      outcome: null,
      canonicalId: null,
      event: { kind: 'conflict-opened' as const, caseId: 'cfl_1', reason: 'no-confident-match' as const },
    };
    await store.ledger.append({ ...entry, id: 'led_1', tenantUnitId: 'tgu_1' });
    await store.ledger.append({ ...entry, id: 'led_2', tenantUnitId: 'tgu_2', candidates: [] });
    await store.ledger.append({ ...entry, id: 'led_3', tenantUnitId: 'tgu_1', timestamp: '2024-02-01T00:00:00.000Z' });

    expect((await store.ledger.list({ tenantUnitId: 'tgu_1' })).map((e) => e.id)).toEqual(['led_1', 'led_3']);
    expect((await store.ledger.list({ canonicalId: 'geo_9' })).map((e) => e.id)).toEqual(['led_1', 'led_3']);
    expect((await store.ledger.list({ since: '2024-01-15T00:00:00.000Z' })).map((e) => e.id)).toEqual(['led_3']);
    expect((await store.ledger.list({ limit: 1, offset: 1 })).map((e) => e.sequence)).toEqual([2]);
  });
});
