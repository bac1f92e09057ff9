/**
 * Conflict Detector.
 *
 * Opens review cases for submissions the matcher could not decide and for
 * canonical siblings that are not distinguishable, and applies the
 * administrator's resolution. Resolution is a single writer per case: the
 * case is re-read inside the resolving transaction and must still be open.
 */

import { v4 as uuid } from 'uuid';
import { CanonicalUnit } from '../domain/canonical-unit';
import { ConflictCandidate, ConflictCase, ConflictReason, Resolution } from '../domain/conflict';
import {
  DuplicateCreateRace,
  GeoSyncError,
  InvalidHierarchyError,
  conflictAlreadyResolvedError,
  createTypedError,
  notFoundError,
  validationError,
} from '../domain/errors';
import { SyncState, TenantGeoUnit } from '../domain/tenant-unit';
import { advanceSyncState } from '../engine/state-machine';
import { validateHierarchy } from '../ingest/hierarchy';
import { SyncLedger } from '../ledger/sync-ledger';
import { Logger, logger as rootLogger } from '../logger';
import { CanonicalMatcher } from '../matching/canonical-matcher';
import { CanonicalRegistry } from '../registry/canonical-registry';
import { runAtomic } from '../storage/atomic';
import { ListOptions, Store } from '../storage/store';

export interface ConflictDetectorOptions {
  /** Sibling pairs scoring at or above this are collisions. */
  highConfidence: number;
  maxLevel: number;
}

/** What a resolution changed. */
export interface ResolutionOutcome {
  conflict: ConflictCase;
  unit: TenantGeoUnit | null;
  canonical: CanonicalUnit | null;
  /** The unit went back to pending_sync and must be matched again. */
  requeue: boolean;
}

export class ConflictDetector {
  private log: Logger;

  constructor(
    private store: Store,
    private ledger: SyncLedger,
    private registry: CanonicalRegistry,
    private matcher: CanonicalMatcher,
    private options: ConflictDetectorOptions,
    log: Logger = rootLogger,
  ) {
    this.log = log.child('conflicts');
  }

  async get(caseId: string): Promise<ConflictCase | null> {
    return this.store.conflicts.getById(caseId);
  }

  /** Open cases, oldest first. */
  async listOpen(options?: ListOptions): Promise<ConflictCase[]> {
    return this.store.conflicts.listByStatus('open', options);
  }

  async findOpenForUnit(unitId: string): Promise<ConflictCase | null> {
    const cases = await this.store.conflicts.listByTenantUnit(unitId);
    return cases.find((c) => c.status === 'open') ?? null;
  }

  /** Park a tenant unit for review. */
  async open(
    unit: TenantGeoUnit,
    candidates: ConflictCandidate[],
    reason: ConflictReason,
    parentCanonicalId: string | null,
    handle: Store = this.store,
  ): Promise<ConflictCase> {
    return runAtomic(handle, { operation: 'openConflict', unitId: unit.id, log: this.log }, async (tx) => {
      const current = await tx.tenantUnits.getById(unit.id);
      if (!current) throw new GeoSyncError(notFoundError('Tenant unit', unit.id));
      const syncState = advanceSyncState(current, SyncState.ConflictOpen);

      const conflict: ConflictCase = {
        id: `cfl_${uuid()}`,
        tenantUnitId: current.id,
        tenantId: current.tenantId,
        level: current.level,
        parentCanonicalId,
        reason,
        candidates,
        status: 'open',
        createdAt: new Date().toISOString(),
      };
      await this.ledger.append(
        {
          tenantUnitId: current.id,
          tenantId: current.tenantId,
          candidates,
          outcome: 'flagged-conflict',
          event: { kind: 'conflict-opened', caseId: conflict.id, reason },
        },
        tx,
      );
      const created = await tx.conflicts.create(conflict);
      await tx.tenantUnits.update(current.id, { syncState });

      this.log.warn('Conflict opened', {
        caseId: created.id,
        unitId: current.id,
        tenantId: current.tenantId,
        reason,
        candidates: candidates.map((c) => c.canonicalId),
      });
      return created;
    });
  }

  /**
   * Find canonical siblings that are not distinguishable beyond the
   * threshold, open a case per new pair and mark both disputed.
   */
  async auditSiblings(level: number, parentId: string | null, actorId?: string): Promise<ConflictCase[]> {
    const siblings = await this.store.canonicalUnits.listAtLevel(level, parentId);
    const open = (await this.listOpen()).filter((c) => c.reason === 'sibling-collision');
    const seen = new Set(open.map((c) => pairKey(c.candidates[0]?.canonicalId, c.candidates[1]?.canonicalId)));

    const opened: ConflictCase[] = [];
    for (let i = 0; i < siblings.length; i++) {
      for (let j = i + 1; j < siblings.length; j++) {
        const a = siblings[i];
        const b = siblings[j];
        const score = this.matcher.compareUnits(a, b);
        if (score < this.options.highConfidence || seen.has(pairKey(a.id, b.id))) continue;
        seen.add(pairKey(a.id, b.id));
        opened.push(await this.openSiblingCollision(a, b, score, actorId));
      }
    }
    return opened;
  }

  /** Apply an administrator's decision to an open case. */
  async resolve(caseId: string, resolution: Resolution, actorId: string): Promise<ResolutionOutcome> {
    return runAtomic(this.store, { operation: 'resolveConflict', log: this.log }, async (tx) => {
      const conflict = await tx.conflicts.getById(caseId);
      if (!conflict) throw new GeoSyncError(notFoundError('Conflict case', caseId));
      if (conflict.status !== 'open') throw new GeoSyncError(conflictAlreadyResolvedError(caseId));

      const unit = conflict.tenantUnitId ? await tx.tenantUnits.getById(conflict.tenantUnitId) : null;
      if (conflict.tenantUnitId && !unit) {
        throw new GeoSyncError(notFoundError('Tenant unit', conflict.tenantUnitId));
      }

      const outcome = await this.apply(tx, conflict, unit, resolution, actorId);

      await this.ledger.append(
        {
          actorId,
          tenantUnitId: conflict.tenantUnitId,
          tenantId: conflict.tenantId,
          candidates: conflict.candidates,
          canonicalId: outcome.canonical?.id ?? null,
          event: { kind: 'conflict-resolved', caseId, resolution },
        },
        tx,
      );
      const resolved = await tx.conflicts.update(caseId, {
        status: 'resolved',
        resolution,
        resolvedBy: actorId,
        resolvedAt: new Date().toISOString(),
      });
      if (!resolved) throw new GeoSyncError(notFoundError('Conflict case', caseId));

      this.log.info('Conflict resolved', {
        caseId,
        action: resolution.action,
        actorId,
        unitId: conflict.tenantUnitId,
        canonicalId: outcome.canonical?.id,
      });
      return { ...outcome, conflict: resolved };
    });
  }

  private async apply(
    tx: Store,
    conflict: ConflictCase,
    unit: TenantGeoUnit | null,
    resolution: Resolution,
    actorId: string,
  ): Promise<Omit<ResolutionOutcome, 'conflict'>> {
    const options = { actorId };

    switch (resolution.action) {
      case 'merge': {
        this.requireCandidate(conflict, resolution.primaryId);
        this.requireCandidate(conflict, resolution.secondaryId);
        const merged = await this.registry.mergeUnits(resolution.primaryId, resolution.secondaryId, options, tx);
        let canonical = merged.primary;
        if (conflict.reason === 'sibling-collision') {
          canonical = await this.registry.setVerification(canonical.id, 'unverified', options, tx);
        }
        if (!unit) return { unit: null, canonical, requeue: false };
        const linked = await this.registry.linkTenantUnit(
          unit,
          canonical.id,
          conflict.candidates,
          this.scoreOf(conflict, resolution.primaryId),
          options,
          tx,
        );
        return { unit: linked.unit, canonical: linked.canonical, requeue: false };
      }

      case 'rename': {
        this.requireCandidate(conflict, resolution.canonicalId);
        const newName = resolution.newName ?? unit?.primaryName;
        if (!newName) {
          throw new GeoSyncError(validationError('rename needs newName when the case has no tenant unit'));
        }
        let canonical = await this.registry.renameUnit(resolution.canonicalId, newName, options, tx);
        if (conflict.reason === 'sibling-collision') {
          await this.restoreSiblings(tx, conflict, actorId);
          canonical = (await tx.canonicalUnits.getById(canonical.id)) ?? canonical;
        }
        if (!unit) return { unit: null, canonical, requeue: false };
        const linked = await this.registry.linkTenantUnit(
          unit,
          canonical.id,
          conflict.candidates,
          this.scoreOf(conflict, resolution.canonicalId),
          options,
          tx,
        );
        return { unit: linked.unit, canonical: linked.canonical, requeue: false };
      }

      case 'reject': {
        if (!unit) {
          await this.restoreSiblings(tx, conflict, actorId);
          return { unit: null, canonical: null, requeue: false };
        }
        const syncState = advanceSyncState(unit, SyncState.Rejected);
        const rejected = await tx.tenantUnits.update(unit.id, { syncState });
        return { unit: rejected, canonical: null, requeue: false };
      }

      case 'link': {
        const target = this.requireUnit(unit, resolution.action);
        await this.requireLinkTarget(tx, conflict, target, resolution.canonicalId);
        const linked = await this.registry.linkTenantUnit(
          target,
          resolution.canonicalId,
          conflict.candidates,
          this.scoreOf(conflict, resolution.canonicalId),
          options,
          tx,
        );
        return { unit: linked.unit, canonical: linked.canonical, requeue: false };
      }

      case 'create': {
        const target = this.requireUnit(unit, resolution.action);
        const parentCanonicalId = await this.parentCanonicalOf(tx, target);
        try {
          const created = await this.registry.createFromTenantUnit(
            target,
            parentCanonicalId,
            conflict.candidates,
            options,
            tx,
          );
          return { unit: created.unit, canonical: created.canonical, requeue: false };
        } catch (err) {
          if (!(err instanceof DuplicateCreateRace)) throw err;
          // The name was taken after the case opened.
          throw new GeoSyncError(
            createTypedError({
              code: 'REGISTRY.NAME_COLLISION',
              message: `Canonical unit ${err.existingId} already holds "${target.primaryName}" under the same parent`,
              unitId: target.id,
              details: { caseId: conflict.id, canonicalId: err.existingId },
              suggestedFixes: [
                { type: 'LINK_UNIT', params: { caseId: conflict.id, canonicalId: err.existingId } },
              ],
            }),
          );
        }
      }

      case 'reassign-parent': {
        const target = this.requireUnit(unit, resolution.action);
        await validateHierarchy(
          tx.tenantUnits,
          { tenantId: target.tenantId, level: target.level, parentId: resolution.parentId },
          this.options.maxLevel,
          target.id,
        );
        const syncState = advanceSyncState(target, SyncState.PendingSync);
        const moved = await tx.tenantUnits.update(target.id, { parentId: resolution.parentId, syncState });
        return { unit: moved, canonical: null, requeue: true };
      }
    }
  }

  private async openSiblingCollision(
    a: CanonicalUnit,
    b: CanonicalUnit,
    score: number,
    actorId: string | undefined,
  ): Promise<ConflictCase> {
    return runAtomic(this.store, { operation: 'auditSiblings', log: this.log }, async (tx) => {
      const candidates: ConflictCandidate[] = [
        { canonicalId: a.id, name: a.primaryName, score },
        { canonicalId: b.id, name: b.primaryName, score },
      ];
      const conflict: ConflictCase = {
        id: `cfl_${uuid()}`,
        tenantUnitId: null,
        tenantId: null,
        level: a.level,
        parentCanonicalId: a.parentId,
        reason: 'sibling-collision',
        candidates,
        status: 'open',
        createdAt: new Date().toISOString(),
      };
      await this.ledger.append(
        {
          actorId,
          candidates,
          outcome: 'flagged-conflict',
          event: { kind: 'conflict-opened', caseId: conflict.id, reason: 'sibling-collision' },
        },
        tx,
      );
      const created = await tx.conflicts.create(conflict);
      await this.registry.setVerification(a.id, 'disputed', { actorId }, tx);
      await this.registry.setVerification(b.id, 'disputed', { actorId }, tx);

      this.log.warn('Canonical siblings collide', { caseId: created.id, first: a.id, second: b.id, score });
      return created;
    });
  }

  /** Disputed siblings of a dismissed collision go back to unverified. */
  private async restoreSiblings(tx: Store, conflict: ConflictCase, actorId: string): Promise<void> {
    for (const candidate of conflict.candidates) {
      const unit = await tx.canonicalUnits.getById(candidate.canonicalId);
      if (unit && !unit.retired && unit.verification === 'disputed') {
        await this.registry.setVerification(unit.id, 'unverified', { actorId }, tx);
      }
    }
  }

  private async parentCanonicalOf(tx: Store, unit: TenantGeoUnit): Promise<string | null> {
    const placement = await this.placementOf(tx, unit);
    if (placement === undefined) {
      throw new InvalidHierarchyError('The parent unit has no canonical link yet; resolve or link the parent first', {
        unitId: unit.id,
        parentId: unit.parentId,
      });
    }
    return placement;
  }

  /** Canonical parent id, null for roots, undefined while the tenant parent is unlinked. */
  private async placementOf(tx: Store, unit: TenantGeoUnit): Promise<string | null | undefined> {
    if (unit.parentId === null) return null;
    const parent = await tx.tenantUnits.getById(unit.parentId);
    const canonical = parent?.canonicalId ? await this.registry.resolveActive(parent.canonicalId, tx.canonicalUnits) : null;
    return canonical?.id;
  }

  /** A listed candidate, or the unit that took the tenant unit's own name after the case opened. */
  private async requireLinkTarget(
    tx: Store,
    conflict: ConflictCase,
    unit: TenantGeoUnit,
    canonicalId: string,
  ): Promise<void> {
    if (conflict.candidates.some((c) => c.canonicalId === canonicalId)) return;
    const placement = await this.placementOf(tx, unit);
    const holder =
      placement === undefined ? null : await tx.canonicalUnits.findByKey(unit.level, placement, unit.normalizedName);
    if (holder?.id !== canonicalId) this.requireCandidate(conflict, canonicalId);
  }

  private requireCandidate(conflict: ConflictCase, canonicalId: string): void {
    if (!conflict.candidates.some((c) => c.canonicalId === canonicalId)) {
      throw new GeoSyncError(
        validationError(`Canonical unit ${canonicalId} is not a candidate of case ${conflict.id}`, {
          caseId: conflict.id,
          candidates: conflict.candidates.map((c) => c.canonicalId),
        }),
      );
    }
  }

  private requireUnit(unit: TenantGeoUnit | null, action: string): TenantGeoUnit {
    if (!unit) {
      throw new GeoSyncError(validationError(`"${action}" applies only to cases raised for a tenant unit`));
    }
    return unit;
  }

  /** Unlisted targets are holders of the unit's own normalized name. */
  private scoreOf(conflict: ConflictCase, canonicalId: string): number {
    return conflict.candidates.find((c) => c.canonicalId === canonicalId)?.score ?? 1;
  }
}

function pairKey(a: string | undefined, b: string | undefined): string {
  return [a ?? '', b ?? ''].sort().join('|');
}
