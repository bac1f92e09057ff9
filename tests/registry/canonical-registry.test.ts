import { AppContext } from '../../src/server';
import { DuplicateCreateRace, InvalidHierarchyError } from '../../src/domain/errors';
import { SyncState, TenantGeoUnit } from '../../src/domain/tenant-unit';
import { resetLogging } from '../../src/logger';
import { captureLogs, linkedCanonical, openCase, seedTwoTenants, submitUnit, testContext } from '../helpers';

async function requireUnit(ctx: AppContext, unitId: string): Promise<TenantGeoUnit> {
  const unit = await ctx.ingest.getUnit(unitId);
  if (!unit) throw new Error(`missing unit ${unitId}`);
  return unit;
}

describe('CanonicalRegistry', () => {
  let ctx: AppContext;

  beforeEach(() => {
    captureLogs();
    ctx = testContext();
  });

  afterEach(() => resetLogging());

  describe('create and link', () => {
    test('first sighting creates, later tenants link and are counted once', async () => {
      const seed = await seedTwoTenants(ctx);

      const nepal = await ctx.registry.getById(seed.nepalId);
      expect(nepal).toMatchObject({
        level: 0,
        parentId: null,
        primaryName: 'Nepal',
        normalizedName: 'nepal',
        alternateNames: ['Nepal'],
        tenantIds: ['tenant-a', 'tenant-b'],
        tenantReferenceCount: 2,
        verification: 'unverified',
        retired: false,
      });

      const bagmati = await ctx.registry.getById(seed.bagmatiId);
      expect(bagmati).toMatchObject({
        level: 1,
        parentId: seed.nepalId,
        primaryName: 'Bagmati Province',
        normalizedName: 'bagmati',
        alternateNames: ['Bagmati Province', 'Bagmati'],
        tenantReferenceCount: 2,
      });

      // A second unit of the same tenant linking here does not recount it.
      const again = await submitUnit(ctx, 'tenant-a', 0, null, 'Nepaal');
      expect(again.canonicalId).toBe(seed.nepalId);
      const relinked = await ctx.registry.getById(seed.nepalId);
      expect(relinked?.tenantReferenceCount).toBe(2);
      expect(relinked?.alternateNames).toEqual(['Nepal', 'Nepaal']);
    });

    test('the ledger entry is written with the registry change', async () => {
      await seedTwoTenants(ctx);
      const entries = await ctx.ledger.list();
      expect(entries.map((e) => e.outcome)).toEqual(['create-new', 'create-new', 'link-existing', 'link-existing']);
      expect(entries.map((e) => e.event.kind)).toEqual(['unit-created', 'unit-created', 'unit-matched', 'unit-matched']);
      expect(entries.map((e) => e.sequence)).toEqual([1, 2, 3, 4]);
      expect(entries.every((e) => e.actorId === 'system')).toBe(true);
    });

    test('creating over an existing key raises DuplicateCreateRace and writes nothing', async () => {
      const seed = await seedTwoTenants(ctx);
      const now = new Date().toISOString();
      const unit = await ctx.store.tenantUnits.create({
        id: 'tgu_race',
        tenantId: 'tenant-c',
        level: 0,
        parentId: null,
        names: { en: 'Nepal' },
        primaryName: 'Nepal',
        normalizedName: 'nepal',
        canonicalId: null,
        syncState: SyncState.PendingSync,
        retired: false,
        createdAt: now,
        updatedAt: now,
      });

      const attempt = ctx.registry.createFromTenantUnit(unit, null, []);
      await expect(attempt).rejects.toBeInstanceOf(DuplicateCreateRace);
      await expect(ctx.registry.createFromTenantUnit(unit, null, [])).rejects.toMatchObject({
        existingId: seed.nepalId,
      });
      expect(await ctx.ledger.list()).toHaveLength(4);
      expect((await ctx.store.tenantUnits.getById('tgu_race'))?.syncState).toBe(SyncState.PendingSync);
    });

    test('a unit another sync already linked keeps its link and nothing is written', async () => {
      const seed = await seedTwoTenants(ctx);
      const unit = await requireUnit(ctx, seed.b.bagmati);

      const linked = await ctx.registry.linkTenantUnit(unit, seed.bagmatiId, [], 1);
      const created = await ctx.registry.createFromTenantUnit(unit, seed.nepalId, []);

      expect(linked.canonical.id).toBe(seed.bagmatiId);
      expect(created.canonical.id).toBe(seed.bagmatiId);
      expect(created.unit).toMatchObject({ syncState: SyncState.Synced, canonicalId: seed.bagmatiId });
      expect((await ctx.registry.getById(seed.bagmatiId))?.tenantReferenceCount).toBe(2);
      expect(await ctx.store.canonicalUnits.listAtLevel(1, seed.nepalId)).toHaveLength(1);
      expect(await ctx.ledger.list()).toHaveLength(4);
    });

    test('linking across levels is a hierarchy error', async () => {
      const seed = await seedTwoTenants(ctx);
      const unit = await requireUnit(ctx, seed.a.bagmati);

      await expect(ctx.registry.linkTenantUnit(unit, seed.nepalId, [], 1)).rejects.toBeInstanceOf(
        InvalidHierarchyError,
      );
    });
  });

  describe('mergeUnits', () => {
    test('folds names, tenants, children and tenant links into the primary', async () => {
      const seed = await seedTwoTenants(ctx);

      // tenant-b enters a variant spelling; an administrator confirms it as distinct.
      const bagmoti = await submitUnit(ctx, 'tenant-b', 1, seed.b.nepal, 'Bagmoti');
      const created = await ctx.ingest.resolveConflict(openCase(bagmoti), { action: 'create' }, 'admin-1');
      const bagmotiId = linkedCanonical(created.ack ?? bagmoti);

      const ktmA = await submitUnit(ctx, 'tenant-a', 2, seed.a.bagmati, 'Kathmandu');
      const ktmB = await submitUnit(ctx, 'tenant-b', 2, bagmoti.unitId, 'Kathmandu');
      const lalitpur = await submitUnit(ctx, 'tenant-b', 2, bagmoti.unitId, 'Lalitpur');
      expect(linkedCanonical(ktmB)).not.toBe(linkedCanonical(ktmA));

      const result = await ctx.registry.mergeUnits(seed.bagmatiId, bagmotiId, { actorId: 'admin-1' });

      expect(result.primary).toMatchObject({
        id: seed.bagmatiId,
        alternateNames: ['Bagmati Province', 'Bagmati', 'Bagmoti'],
        tenantIds: ['tenant-a', 'tenant-b'],
        tenantReferenceCount: 2,
      });
      expect(result.secondary).toMatchObject({ id: bagmotiId, retired: true, mergedInto: seed.bagmatiId });
      expect(result.repointedUnitIds).toEqual([ktmB.unitId, bagmoti.unitId]);

      // Same-named children merge; others move under the primary.
      const ktmCanonical = await ctx.registry.getById(linkedCanonical(ktmA));
      expect(ktmCanonical?.tenantIds).toEqual(['tenant-a', 'tenant-b']);
      expect(await ctx.registry.getById(linkedCanonical(ktmB))).toMatchObject({
        retired: true,
        mergedInto: linkedCanonical(ktmA),
      });
      expect((await ctx.registry.getById(linkedCanonical(lalitpur)))?.parentId).toBe(seed.bagmatiId);

      expect((await requireUnit(ctx, ktmB.unitId)).canonicalId).toBe(linkedCanonical(ktmA));
      expect((await requireUnit(ctx, bagmoti.unitId)).canonicalId).toBe(seed.bagmatiId);
      expect((await ctx.registry.resolveActive(bagmotiId))?.id).toBe(seed.bagmatiId);

      expect(await ctx.ledger.verify()).toEqual([]);
    });

    test('rejects merging a unit into itself or across levels', async () => {
      const seed = await seedTwoTenants(ctx);

      await expect(ctx.registry.mergeUnits(seed.nepalId, seed.nepalId)).rejects.toMatchObject({
        typedError: { code: 'REGISTRY.MERGE_INVALID' },
      });
      await expect(ctx.registry.mergeUnits(seed.nepalId, seed.bagmatiId)).rejects.toMatchObject({
        typedError: { code: 'REGISTRY.MERGE_INVALID' },
      });
    });

    test('a retired unit cannot be merged again', async () => {
      const seed = await seedTwoTenants(ctx);
      const gandaki = linkedCanonical(await submitUnit(ctx, 'tenant-a', 1, seed.a.nepal, 'Gandaki'));
      await ctx.registry.mergeUnits(seed.bagmatiId, gandaki);

      await expect(ctx.registry.mergeUnits(seed.bagmatiId, gandaki)).rejects.toMatchObject({
        typedError: { code: 'VALIDATION.NOT_FOUND' },
      });
    });
  });

  describe('renameUnit', () => {
    test('keeps the previous primary name as an alternate', async () => {
      const seed = await seedTwoTenants(ctx);
      const renamed = await ctx.registry.renameUnit(seed.bagmatiId, 'Bagmati Pradesh', { actorId: 'admin-1' });

      expect(renamed.primaryName).toBe('Bagmati Pradesh');
      expect(renamed.normalizedName).toBe('bagmati');
      expect(renamed.alternateNames).toEqual(['Bagmati Province', 'Bagmati', 'Bagmati Pradesh']);

      const [last] = (await ctx.ledger.list()).slice(-1);
      expect(last.actorId).toBe('admin-1');
      expect(last.event).toEqual({
        kind: 'unit-renamed',
        canonicalId: seed.bagmatiId,
        previousName: 'Bagmati Province',
        primaryName: 'Bagmati Pradesh',
        normalizedName: 'bagmati',
      });
    });

    test('refuses a name a sibling already holds and suggests a merge', async () => {
      const seed = await seedTwoTenants(ctx);
      const gandaki = linkedCanonical(await submitUnit(ctx, 'tenant-a', 1, seed.a.nepal, 'Gandaki'));

      await expect(ctx.registry.renameUnit(gandaki, 'Bagmati')).rejects.toMatchObject({
        typedError: {
          code: 'REGISTRY.NAME_COLLISION',
          suggestedFixes: [{ type: 'MERGE_UNITS', params: { primaryId: seed.bagmatiId, secondaryId: gandaki } }],
        },
      });
      expect((await ctx.registry.getById(gandaki))?.primaryName).toBe('Gandaki');
    });

    test('refuses a blank name', async () => {
      const seed = await seedTwoTenants(ctx);
      await expect(ctx.registry.renameUnit(seed.bagmatiId, '   ')).rejects.toMatchObject({
        typedError: { code: 'VALIDATION.SCHEMA' },
      });
    });
  });

  describe('verification and confidence', () => {
    test('confidence grows with independent tenants', async () => {
      const seed = await seedTwoTenants(ctx);
      const gandaki = linkedCanonical(await submitUnit(ctx, 'tenant-a', 1, seed.a.nepal, 'Gandaki'));

      const one = await ctx.registry.getById(gandaki);
      const two = await ctx.registry.getById(seed.nepalId);
      expect(one && ctx.registry.confidence(one)).toBe(0.5);
      expect(two && ctx.registry.confidence(two)).toBe(0.75);
    });

    test('verified is certain and disputed halves confidence', async () => {
      const seed = await seedTwoTenants(ctx);

      const verified = await ctx.registry.setVerification(seed.nepalId, 'verified', { actorId: 'admin-1' });
      expect(ctx.registry.confidence(verified)).toBe(1);

      const disputed = await ctx.registry.setVerification(seed.nepalId, 'disputed', { actorId: 'admin-1' });
      expect(ctx.registry.confidence(disputed)).toBe(0.375);
    });

    test('setting the current state writes no ledger entry', async () => {
      const seed = await seedTwoTenants(ctx);
      await ctx.registry.setVerification(seed.nepalId, 'unverified');
      expect(await ctx.ledger.list()).toHaveLength(4);
    });
  });
});
