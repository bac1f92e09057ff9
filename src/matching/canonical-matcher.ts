/**
 * Canonical Matcher.
 *
 * Proposes canonical units for a tenant unit and decides whether one of
 * them can be linked without a human. Independent tenants report the same
 * place with spelling and transliteration variation; a link is automatic
 * only when exactly one candidate is confident and no other comes close.
 */

import { CanonicalUnit } from '../domain/canonical-unit';
import { ConflictCandidate, ConflictReason } from '../domain/conflict';
import { TenantGeoUnit } from '../domain/tenant-unit';
import { CanonicalUnitStore } from '../storage/store';
import { MatchingConfig } from '../config';
import { Logger, logger as rootLogger } from '../logger';
import { declaredNames, normalizeName } from './normalize';
import { normalizedSimilarity } from './similarity';

/** Outcome of the matching step. `conflict` is normal flow, not an error. */
export type MatchDecision =
  | { kind: 'link'; candidate: ConflictCandidate; candidates: ConflictCandidate[] }
  | { kind: 'create'; candidates: ConflictCandidate[] }
  | { kind: 'conflict'; reason: ConflictReason; candidates: ConflictCandidate[] };

/** The part of a tenant unit the matcher reads. */
export type MatchSubject = Pick<TenantGeoUnit, 'level' | 'names' | 'primaryName' | 'governmentCode'>;

/**
 * Canonical parent to search under: an id, null for roots, or undefined to
 * search the whole level when the tenant parent has no canonical link.
 */
export type ParentScope = string | null | undefined;

export class CanonicalMatcher {
  private log: Logger;

  constructor(
    private canonicalUnits: CanonicalUnitStore,
    private config: MatchingConfig,
    log: Logger = rootLogger,
  ) {
    this.log = log.child('matcher');
  }

  /** Candidates above the floor, best first. */
  async findCandidates(subject: MatchSubject, parent: ParentScope): Promise<ConflictCandidate[]> {
    const pool = await this.canonicalUnits.listAtLevel(subject.level, parent);
    const subjectNames = declaredNames(subject.names, subject.primaryName).map((n) =>
      normalizeName(n, this.config.noiseWords),
    );

    const candidates: ConflictCandidate[] = [];
    for (const unit of pool) {
      const scored = this.score(subjectNames, subject.governmentCode, unit);
      if (scored.score >= this.config.floor) {
        candidates.push({ canonicalId: unit.id, name: scored.name, score: scored.score });
      }
    }

    candidates.sort((a, b) => b.score - a.score || a.canonicalId.localeCompare(b.canonicalId));
    this.log.debug('Candidates ranked', {
      level: subject.level,
      parent: parent ?? null,
      poolSize: pool.length,
      candidates: candidates.length,
    });
    return candidates;
  }

  /**
   * Decide on ranked candidates. The threshold is inclusive; a runner-up
   * strictly closer than the tie margin blocks the link. Without a
   * canonical parent nothing is linked or created: the candidates only
   * inform the reviewer.
   */
  decide(candidates: ConflictCandidate[], options: { parentKnown: boolean }): MatchDecision {
    if (!options.parentKnown) {
      return { kind: 'conflict', reason: 'parent-unreconciled', candidates };
    }
    const [top, runnerUp] = candidates;
    if (!top) {
      return { kind: 'create', candidates };
    }
    if (top.score < this.config.highConfidence) {
      return { kind: 'conflict', reason: 'no-confident-match', candidates };
    }
    if (runnerUp && top.score - runnerUp.score < this.config.tieMargin) {
      return { kind: 'conflict', reason: 'near-tie', candidates };
    }
    return { kind: 'link', candidate: top, candidates };
  }

  /** Similarity of two canonical units, used by the sibling audit. */
  compareUnits(a: CanonicalUnit, b: CanonicalUnit): number {
    const names = canonicalNames(a).map((n) => normalizeName(n, this.config.noiseWords));
    return this.score(names, a.governmentCode, b).score;
  }

  private score(
    subjectNames: string[],
    governmentCode: string | undefined,
    unit: CanonicalUnit,
  ): { score: number; name: string } {
    if (governmentCode && unit.governmentCode === governmentCode) {
      return { score: 1, name: unit.primaryName };
    }
    let best = { score: 0, name: unit.primaryName };
    for (const name of canonicalNames(unit)) {
      const normalized = normalizeName(name, this.config.noiseWords);
      for (const subjectName of subjectNames) {
        const score = normalizedSimilarity(subjectName, normalized);
        if (score > best.score) best = { score, name };
      }
    }
    return best;
  }
}

function canonicalNames(unit: CanonicalUnit): string[] {
  return unit.alternateNames.includes(unit.primaryName)
    ? unit.alternateNames
    : [unit.primaryName, ...unit.alternateNames];
}
