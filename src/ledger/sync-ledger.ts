/**
 * Sync Ledger Service.
 *
 * Append-only history of every ingest decision and every administrative
 * change to the canonical registry. Appends go through the same
 * transaction as the registry write they describe, so replaying the
 * ledger always reproduces the registry.
 */

import { v4 as uuid } from 'uuid';
import { CanonicalUnit } from '../domain/canonical-unit';
import { ConflictCandidate } from '../domain/conflict';
import { LedgerEvent, SyncLedgerEntry, SyncOutcome } from '../domain/ledger';
import { LedgerQuery, Store } from '../storage/store';
import { LedgerDrift, diffUnits, replayEntries } from './replay';

/** Actor recorded for automatic decisions. */
export const SYSTEM_ACTOR = 'system';

/** Input for appending a ledger entry. */
export interface LedgerAppendInput {
  actorId?: string;
  tenantUnitId?: string | null;
  tenantId?: string | null;
  candidates?: ConflictCandidate[];
  outcome?: SyncOutcome | null;
  canonicalId?: string | null;
  event: LedgerEvent;
}

/** The sync ledger. */
export class SyncLedger {
  constructor(private store: Store) {}

  /**
   * Append an entry. Pass the transaction handle of the registry write the
   * entry describes; the entry is discarded if that transaction fails.
   */
  async append(input: LedgerAppendInput, tx: Store = this.store): Promise<SyncLedgerEntry> {
    return tx.ledger.append({
      id: `led_${uuid()}`,
      timestamp: new Date().toISOString(),
      actorId: input.actorId ?? SYSTEM_ACTOR,
      tenantUnitId: input.tenantUnitId ?? null,
      tenantId: input.tenantId ?? null,
      candidates: input.candidates ?? [],
      outcome: input.outcome ?? null,
      canonicalId: input.canonicalId ?? null,
      event: input.event,
    });
  }

  /** Entries in sequence order. */
  async list(query?: LedgerQuery): Promise<SyncLedgerEntry[]> {
    return this.store.ledger.list(query);
  }

  /**
   * Reconstruct canonical units by re-applying every entry recorded at or
   * after `since` on top of `base` (empty by default, which with the epoch
   * as `since` rebuilds the whole registry).
   */
  async replayFrom(since: string, base: CanonicalUnit[] = []): Promise<CanonicalUnit[]> {
    const entries = await this.store.ledger.list({ since });
    return replayEntries(entries, base);
  }

  /** Replay the full history and report where the live registry differs. */
  async verify(): Promise<LedgerDrift[]> {
    const [entries, live] = await Promise.all([
      this.store.ledger.list(),
      this.store.canonicalUnits.list({ includeRetired: true }),
    ]);
    return diffUnits(replayEntries(entries), live);
  }
}
