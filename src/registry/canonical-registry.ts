/**
 * Canonical Registry.
 *
 * Owns every write to canonical units. Each public method is one atomic
 * unit: the ledger entry is appended first, then the registry and tenant
 * units are written, all through the same transaction handle. Methods take
 * an optional handle so callers already inside a transaction (conflict
 * resolution) can compose them.
 */

import { v4 as uuid } from 'uuid';
import { CanonicalUnit, VerificationState, canonicalConfidence, canonicalKey } from '../domain/canonical-unit';
import { ConflictCandidate } from '../domain/conflict';
import {
  DuplicateCreateRace,
  GeoSyncError,
  InvalidHierarchyError,
  createTypedError,
  notFoundError,
} from '../domain/errors';
import { UnitCreatedEvent } from '../domain/ledger';
import { SyncState, TenantGeoUnit } from '../domain/tenant-unit';
import { advanceSyncState } from '../engine/state-machine';
import { SyncLedger } from '../ledger/sync-ledger';
import { Logger, logger as rootLogger } from '../logger';
import { declaredNames, normalizeName } from '../matching/normalize';
import { runAtomic } from '../storage/atomic';
import { CanonicalUnitStore, Store, UniqueConstraintError } from '../storage/store';
import { canonicalFromEvent, retiredInto, withFolded, withRename, withTenantLink } from './canonical-ops';

/** Merge chains longer than this indicate corrupted data. */
const MAX_MERGE_CHAIN = 64;

export interface RegistryActionOptions {
  actorId?: string;
}

export interface RegistryLinkResult {
  canonical: CanonicalUnit;
  unit: TenantGeoUnit;
}

export interface MergeResult {
  primary: CanonicalUnit;
  secondary: CanonicalUnit;
  /** Tenant units re-pointed from the secondary, including nested child merges. */
  repointedUnitIds: string[];
}

/** States a linked unit walks through from its current state. */
function linkPath(state: SyncState): SyncState[] {
  return state === SyncState.PendingSync ? [SyncState.Matched, SyncState.Synced] : [SyncState.Synced];
}

export class CanonicalRegistry {
  private log: Logger;

  constructor(
    private store: Store,
    private ledger: SyncLedger,
    private noiseWords: string[],
    log: Logger = rootLogger,
  ) {
    this.log = log.child('registry');
  }

  async getById(id: string): Promise<CanonicalUnit | null> {
    return this.store.canonicalUnits.getById(id);
  }

  /** Follow `mergedInto` to the surviving unit. */
  async resolveActive(id: string, reader: CanonicalUnitStore = this.store.canonicalUnits): Promise<CanonicalUnit | null> {
    let unit = await reader.getById(id);
    for (let hops = 0; unit?.mergedInto && hops < MAX_MERGE_CHAIN; hops++) {
      unit = await reader.getById(unit.mergedInto);
    }
    return unit && !unit.retired ? unit : null;
  }

  confidence(unit: CanonicalUnit): number {
    return canonicalConfidence(unit);
  }

  /**
   * Create a canonical unit from a tenant unit nothing matched. A concurrent
   * first sighting of the same place surfaces as DuplicateCreateRace, with
   * nothing written.
   */
  async createFromTenantUnit(
    unit: TenantGeoUnit,
    parentCanonicalId: string | null,
    candidates: ConflictCandidate[],
    options: RegistryActionOptions = {},
    handle: Store = this.store,
  ): Promise<RegistryLinkResult> {
    return runAtomic(handle, { operation: 'createFromTenantUnit', unitId: unit.id, log: this.log }, async (tx) => {
      const current = await this.requireTenantUnit(tx, unit.id);
      const settled = await this.existingLink(tx, current);
      if (settled) return settled;
      const syncState = advanceSyncState(current, ...linkPath(current.syncState));
      await this.assertParentPlacement(tx, current, parentCanonicalId);

      const existing = await tx.canonicalUnits.findByKey(current.level, parentCanonicalId, current.normalizedName);
      if (existing) {
        throw new DuplicateCreateRace(
          canonicalKey(current.level, parentCanonicalId, current.normalizedName),
          existing.id,
        );
      }

      const event: UnitCreatedEvent = {
        kind: 'unit-created',
        canonicalId: `geo_${uuid()}`,
        level: current.level,
        parentId: parentCanonicalId,
        primaryName: current.primaryName,
        normalizedName: current.normalizedName,
        names: declaredNames(current.names, current.primaryName),
        tenantId: current.tenantId,
        governmentCode: current.governmentCode,
      };
      const entry = await this.ledger.append(
        {
          actorId: options.actorId,
          tenantUnitId: current.id,
          tenantId: current.tenantId,
          candidates,
          outcome: 'create-new',
          canonicalId: event.canonicalId,
          event,
        },
        tx,
      );

      let canonical: CanonicalUnit;
      try {
        canonical = await tx.canonicalUnits.create(canonicalFromEvent(event, entry.timestamp));
      } catch (err) {
        if (err instanceof UniqueConstraintError) throw new DuplicateCreateRace(err.key, err.existingId);
        throw err;
      }

      const linked = await this.writeTenantLink(tx, current.id, canonical.id, syncState);
      this.log.info('Canonical unit created', {
        canonicalId: canonical.id,
        unitId: current.id,
        tenantId: current.tenantId,
        level: canonical.level,
      });
      return { canonical, unit: linked };
    });
  }

  /**
   * Link a tenant unit to an existing canonical unit. The tenant's spellings
   * join the alternate names; the tenant is counted once however many of
   * its units link here.
   */
  async linkTenantUnit(
    unit: TenantGeoUnit,
    canonicalId: string,
    candidates: ConflictCandidate[],
    score: number,
    options: RegistryActionOptions = {},
    handle: Store = this.store,
  ): Promise<RegistryLinkResult> {
    return runAtomic(handle, { operation: 'linkTenantUnit', unitId: unit.id, log: this.log }, async (tx) => {
      const current = await this.requireTenantUnit(tx, unit.id);
      const target = await this.resolveActive(canonicalId, tx.canonicalUnits);
      if (!target) {
        throw new GeoSyncError(notFoundError('Canonical unit', canonicalId));
      }
      if (target.level !== current.level) {
        throw new InvalidHierarchyError(
          `Canonical unit ${target.id} is at level ${target.level}; the tenant unit is at level ${current.level}`,
          { canonicalId: target.id, canonicalLevel: target.level, level: current.level },
        );
      }
      const settled = await this.existingLink(tx, current);
      if (settled) return settled;
      await this.assertMirrorsTenantParent(tx, current, target);
      const syncState = advanceSyncState(current, ...linkPath(current.syncState));
      const names = declaredNames(current.names, current.primaryName);

      await this.ledger.append(
        {
          actorId: options.actorId,
          tenantUnitId: current.id,
          tenantId: current.tenantId,
          candidates,
          outcome: 'link-existing',
          canonicalId: target.id,
          event: { kind: 'unit-matched', canonicalId: target.id, tenantId: current.tenantId, names, score },
        },
        tx,
      );

      const next = withTenantLink(target, current.tenantId, names);
      const canonical = await this.writeCanonical(tx, next);
      const linked = await this.writeTenantLink(tx, current.id, canonical.id, syncState);
      this.log.info('Tenant unit linked', {
        canonicalId: canonical.id,
        unitId: current.id,
        tenantId: current.tenantId,
        score,
        tenantReferenceCount: canonical.tenantReferenceCount,
      });
      return { canonical, unit: linked };
    });
  }

  /**
   * Fold `secondaryId` into `primaryId`. Children of the secondary move
   * under the primary, or are merged into the primary's child of the same
   * name. The secondary is retired, never deleted.
   */
  async mergeUnits(
    primaryId: string,
    secondaryId: string,
    options: RegistryActionOptions = {},
    handle: Store = this.store,
  ): Promise<MergeResult> {
    return runAtomic(handle, { operation: 'mergeUnits', log: this.log }, async (tx) => {
      if (primaryId === secondaryId) {
        throw new GeoSyncError(
          createTypedError({
            code: 'REGISTRY.MERGE_INVALID',
            message: 'A canonical unit cannot be merged into itself',
            details: { primaryId, secondaryId },
          }),
        );
      }
      const primary = await this.requireActive(tx, primaryId);
      const secondary = await this.requireActive(tx, secondaryId);
      if (primary.level !== secondary.level) {
        throw new GeoSyncError(
          createTypedError({
            code: 'REGISTRY.MERGE_INVALID',
            message: `Cannot merge a level ${secondary.level} unit into a level ${primary.level} unit`,
            details: { primaryId, secondaryId },
          }),
        );
      }
      return this.mergeWithin(tx, primary, secondary, options.actorId);
    });
  }

  /** Give a canonical unit a new primary name; the old one stays an alternate. */
  async renameUnit(
    canonicalId: string,
    newName: string,
    options: RegistryActionOptions = {},
    handle: Store = this.store,
  ): Promise<CanonicalUnit> {
    return runAtomic(handle, { operation: 'renameUnit', log: this.log }, async (tx) => {
      const unit = await this.requireActive(tx, canonicalId);
      const primaryName = newName.trim();
      const normalizedName = normalizeName(primaryName, this.noiseWords);
      if (!primaryName) {
        throw new GeoSyncError(
          createTypedError({ code: 'VALIDATION.SCHEMA', message: 'New name must not be blank' }),
        );
      }

      const holder = await tx.canonicalUnits.findByKey(unit.level, unit.parentId, normalizedName);
      if (holder && holder.id !== unit.id) {
        throw new GeoSyncError(
          createTypedError({
            code: 'REGISTRY.NAME_COLLISION',
            message: `A sibling already uses the name "${holder.primaryName}"`,
            details: { canonicalId, siblingId: holder.id },
            suggestedFixes: [
              { type: 'MERGE_UNITS', params: { primaryId: holder.id, secondaryId: canonicalId } },
            ],
          }),
        );
      }

      await this.ledger.append(
        {
          actorId: options.actorId,
          canonicalId,
          event: { kind: 'unit-renamed', canonicalId, previousName: unit.primaryName, primaryName, normalizedName },
        },
        tx,
      );
      const renamed = await this.writeCanonical(tx, withRename(unit, primaryName, normalizedName));
      this.log.info('Canonical unit renamed', { canonicalId, from: unit.primaryName, to: primaryName });
      return renamed;
    });
  }

  /** Change the verification state. A no-op, with no ledger entry, when unchanged. */
  async setVerification(
    canonicalId: string,
    verification: VerificationState,
    options: RegistryActionOptions = {},
    handle: Store = this.store,
  ): Promise<CanonicalUnit> {
    return runAtomic(handle, { operation: 'setVerification', log: this.log }, async (tx) => {
      const unit = await this.requireActive(tx, canonicalId);
      if (unit.verification === verification) return unit;
      await this.ledger.append(
        {
          actorId: options.actorId,
          canonicalId,
          event: { kind: 'unit-verification-changed', canonicalId, from: unit.verification, to: verification },
        },
        tx,
      );
      return this.writeCanonical(tx, { ...unit, verification });
    });
  }

  private async mergeWithin(
    tx: Store,
    primary: CanonicalUnit,
    secondary: CanonicalUnit,
    actorId: string | undefined,
  ): Promise<MergeResult> {
    const repointedUnitIds: string[] = [];

    // Same-named children collide under the primary; fold them first so
    // their own entries precede this one.
    const movable: CanonicalUnit[] = [];
    for (const child of await tx.canonicalUnits.listChildren(secondary.id)) {
      const twin = await tx.canonicalUnits.findByKey(child.level, primary.id, child.normalizedName);
      if (twin) {
        const nested = await this.mergeWithin(tx, twin, child, actorId);
        repointedUnitIds.push(...nested.repointedUnitIds);
      } else {
        movable.push(child);
      }
    }

    const linked = await tx.tenantUnits.listByCanonical(secondary.id);
    const ownRepointed = linked.map((u) => u.id);

    await this.ledger.append(
      {
        actorId,
        canonicalId: primary.id,
        event: { kind: 'unit-merged', primaryId: primary.id, secondaryId: secondary.id, repointedUnitIds: ownRepointed },
      },
      tx,
    );

    for (const child of movable) {
      await this.writeCanonical(tx, { ...child, parentId: primary.id });
    }
    for (const unit of linked) {
      await tx.tenantUnits.update(unit.id, { canonicalId: primary.id });
    }
    const retired = await this.writeCanonical(tx, retiredInto(secondary, primary.id));
    const survivor = await this.writeCanonical(tx, withFolded(primary, secondary));

    this.log.info('Canonical units merged', {
      primaryId: primary.id,
      secondaryId: secondary.id,
      repointed: ownRepointed.length,
      movedChildren: movable.length,
    });
    return { primary: survivor, secondary: retired, repointedUnitIds: [...repointedUnitIds, ...ownRepointed] };
  }

  /**
   * A sync that finished while this one was matching already linked the
   * unit. Its link stands and nothing is written.
   */
  private async existingLink(tx: Store, unit: TenantGeoUnit): Promise<RegistryLinkResult | null> {
    if (unit.syncState !== SyncState.Synced || !unit.canonicalId) return null;
    const canonical = await this.resolveActive(unit.canonicalId, tx.canonicalUnits);
    if (!canonical) return null;
    this.log.debug('Unit already synced; keeping its link', { unitId: unit.id, canonicalId: canonical.id });
    return { canonical, unit };
  }

  /** The canonical parent chain follows the tenant's: a link must sit under the parent's canonical unit. */
  private async assertMirrorsTenantParent(tx: Store, unit: TenantGeoUnit, target: CanonicalUnit): Promise<void> {
    if (unit.parentId === null) return;
    const parent = await tx.tenantUnits.getById(unit.parentId);
    const parentCanonical = parent?.canonicalId
      ? await this.resolveActive(parent.canonicalId, tx.canonicalUnits)
      : null;
    if (!parentCanonical) {
      throw new InvalidHierarchyError('The parent unit has no canonical link yet; resolve or link the parent first', {
        unitId: unit.id,
        parentId: unit.parentId,
      });
    }
    if (target.parentId !== parentCanonical.id) {
      throw new InvalidHierarchyError(
        `Canonical unit ${target.id} is not under ${parentCanonical.id}, the canonical unit of the tenant parent`,
        { canonicalId: target.id, canonicalParentId: target.parentId, expectedParentId: parentCanonical.id },
      );
    }
  }

  /** A canonical parent must sit one level above the unit being placed. */
  private async assertParentPlacement(tx: Store, unit: TenantGeoUnit, parentCanonicalId: string | null): Promise<void> {
    if (unit.level === 0) {
      if (parentCanonicalId !== null) {
        throw new InvalidHierarchyError('A level 0 canonical unit cannot have a parent', { parentCanonicalId });
      }
      return;
    }
    if (parentCanonicalId === null) {
      throw new InvalidHierarchyError(`A level ${unit.level} canonical unit requires a canonical parent`, {
        unitId: unit.id,
      });
    }
    const parent = await tx.canonicalUnits.getById(parentCanonicalId);
    if (!parent || parent.retired || parent.level !== unit.level - 1) {
      throw new InvalidHierarchyError(`Canonical parent ${parentCanonicalId} cannot hold a level ${unit.level} unit`, {
        parentCanonicalId,
        parentLevel: parent?.level,
      });
    }
  }

  private async requireTenantUnit(tx: Store, id: string): Promise<TenantGeoUnit> {
    const unit = await tx.tenantUnits.getById(id);
    if (!unit) throw new GeoSyncError(notFoundError('Tenant unit', id));
    return unit;
  }

  private async requireActive(tx: Store, id: string): Promise<CanonicalUnit> {
    const unit = await tx.canonicalUnits.getById(id);
    if (!unit || unit.retired) throw new GeoSyncError(notFoundError('Canonical unit', id));
    return unit;
  }

  private async writeCanonical(tx: Store, unit: CanonicalUnit): Promise<CanonicalUnit> {
    const written = await tx.canonicalUnits.update(unit.id, unit);
    if (!written) throw new GeoSyncError(notFoundError('Canonical unit', unit.id));
    return written;
  }

  private async writeTenantLink(
    tx: Store,
    unitId: string,
    canonicalId: string,
    syncState: SyncState,
  ): Promise<TenantGeoUnit> {
    const updated = await tx.tenantUnits.update(unitId, { canonicalId, syncState });
    if (!updated) throw new GeoSyncError(notFoundError('Tenant unit', unitId));
    return updated;
  }
}
