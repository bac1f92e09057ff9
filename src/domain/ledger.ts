/**
 * Sync ledger domain model.
 *
 * Immutable, append-only records of every matching decision and every
 * administrative change to the canonical registry. The event payloads are
 * a closed set of tagged variants; replay depends on each one carrying
 * everything needed to re-apply it.
 */

import { VerificationState } from './canonical-unit';
import { ConflictCandidate, ConflictReason, Resolution } from './conflict';

/** Outcome of one ingest attempt. Null for administrative entries. */
export type SyncOutcome = 'create-new' | 'link-existing' | 'flagged-conflict';

export interface UnitCreatedEvent {
  kind: 'unit-created';
  canonicalId: string;
  level: number;
  parentId: string | null;
  primaryName: string;
  normalizedName: string;
  names: string[];
  tenantId: string;
  governmentCode?: string;
}

export interface UnitMatchedEvent {
  kind: 'unit-matched';
  canonicalId: string;
  tenantId: string;
  names: string[];
  score: number;
}

export interface UnitMergedEvent {
  kind: 'unit-merged';
  primaryId: string;
  secondaryId: string;
  /** Tenant units re-pointed from the secondary to the primary. */
  repointedUnitIds: string[];
}

export interface UnitRenamedEvent {
  kind: 'unit-renamed';
  canonicalId: string;
  previousName: string;
  primaryName: string;
  normalizedName: string;
}

export interface UnitVerificationChangedEvent {
  kind: 'unit-verification-changed';
  canonicalId: string;
  from: VerificationState;
  to: VerificationState;
}

export interface ConflictOpenedEvent {
  kind: 'conflict-opened';
  caseId: string;
  reason: ConflictReason;
}

export interface ConflictResolvedEvent {
  kind: 'conflict-resolved';
  caseId: string;
  resolution: Resolution;
}

export type LedgerEvent =
  | UnitCreatedEvent
  | UnitMatchedEvent
  | UnitMergedEvent
  | UnitRenamedEvent
  | UnitVerificationChangedEvent
  | ConflictOpenedEvent
  | ConflictResolvedEvent;

export type LedgerEventKind = LedgerEvent['kind'];

/** An immutable ledger entry. */
export interface SyncLedgerEntry {
  id: string;
  /** Monotonic position assigned by the store on append. */
  sequence: number;
  timestamp: string;
  /** 'system' for automatic decisions, the administrator otherwise. */
  actorId: string;
  tenantUnitId: string | null;
  tenantId: string | null;
  /** Candidates considered by the matcher, empty for administrative entries. */
  candidates: ConflictCandidate[];
  outcome: SyncOutcome | null;
  /** Canonical unit resulting from the decision, if any. */
  canonicalId: string | null;
  event: LedgerEvent;
}

/** Entry as handed to the store; the store assigns the sequence. */
export type LedgerEntryDraft = Omit<SyncLedgerEntry, 'sequence'>;
