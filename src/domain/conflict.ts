/**
 * Conflict case domain model.
 *
 * A pending human-review item. Cases stay open until an administrator
 * resolves them; there is no timeout.
 */

export type ConflictReason =
  /** Candidates exist but none clears the high-confidence threshold. */
  | 'no-confident-match'
  /** A confident candidate has a runner-up within the tie margin. */
  | 'near-tie'
  /** Nothing matched and the parent has no canonical link to create under. */
  | 'parent-unreconciled'
  /** Two canonical siblings are not distinguishable beyond the threshold. */
  | 'sibling-collision';

export type ConflictStatus = 'open' | 'resolved';

export interface ConflictCandidate {
  canonicalId: string;
  name: string;
  score: number;
}

/** Administrator decision closing a case. */
export type Resolution =
  | { action: 'merge'; primaryId: string; secondaryId: string }
  | { action: 'rename'; canonicalId: string; newName?: string }
  | { action: 'reject' }
  | { action: 'reassign-parent'; parentId: string }
  | { action: 'link'; canonicalId: string }
  | { action: 'create' };

export type ResolutionAction = Resolution['action'];

export interface ConflictCase {
  id: string;
  /** Null for sibling-collision cases raised by the registry audit. */
  tenantUnitId: string | null;
  tenantId: string | null;
  level: number;
  parentCanonicalId: string | null;
  reason: ConflictReason;
  candidates: ConflictCandidate[];
  status: ConflictStatus;
  resolution?: Resolution;
  resolvedBy?: string;
  resolvedAt?: string;
  createdAt: string;
}
