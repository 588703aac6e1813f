import type { ChallengeStore } from './store.js';
import type { ChallengeId, ContributionEntry, UserId } from '../models.js';

export interface LedgerOptions {
  /** How long an idempotency key suppresses repeats of the same report. */
  dedupWindowMs: number;
}

/**
 * Per-contributor accounting for a challenge. Callers run these inside the same store
 * transaction as the matching counter update so the two never diverge.
 */
export class ProgressLedger {
  constructor(
    private readonly store: ChallengeStore,
    private readonly options: LedgerOptions
  ) {}

  /**
   * Records `key` for this contributor and returns false when it was already seen inside
   * the dedup window. A key older than the window counts as new.
   */
  claimKey(challengeId: ChallengeId, contributorId: UserId, key: string, now: number): boolean {
    const seenAt = this.store.getReportKeySeenAt(challengeId, contributorId, key);
    if (seenAt !== undefined && now - seenAt < this.options.dedupWindowMs) {
      return false;
    }
    this.store.putReportKey(challengeId, contributorId, key, now);
    return true;
  }

  credit(challengeId: ChallengeId, contributorId: UserId, amount: number, now: number) {
    this.store.upsertContribution(challengeId, contributorId, amount, now);
  }

  contributionOf(challengeId: ChallengeId, contributorId: UserId): number {
    return this.store.getContribution(challengeId, contributorId)?.amountContributed ?? 0;
  }

  contributors(challengeId: ChallengeId, limit?: number): ContributionEntry[] {
    return this.store.listContributions(challengeId, limit);
  }

  total(challengeId: ChallengeId): number {
    return this.store.sumContributions(challengeId);
  }

  /** Drops every entry and remembered key for a challenge. Part of an admin reset. */
  clear(challengeId: ChallengeId): number {
    this.store.deleteReportKeys(challengeId);
    return this.store.deleteContributions(challengeId);
  }

  pruneExpiredKeys(now: number): number {
    return this.store.deleteReportKeysSeenBefore(now - this.options.dedupWindowMs);
  }
}
