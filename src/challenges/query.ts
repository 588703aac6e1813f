import type { ChallengeStore } from './store.js';
import type { ProgressLedger } from './ledger.js';
import { ValidationError } from '../utils/errorhandler.js';
import type { Challenge, ChallengeId, LeaderboardEntry, ProgressSnapshot, RewardRecord } from '../models.js';

export interface RewardAudit {
  challengeId: ChallengeId;
  round: number;
  records: RewardRecord[];
  failed: RewardRecord[];
}

/** Read-only views. Each call is a single statement, so it never sees half of a report. */
export class QueryService {
  constructor(
    private readonly store: ChallengeStore,
    private readonly ledger: ProgressLedger
  ) {}

  getProgress(challengeId: ChallengeId): ProgressSnapshot {
    const challenge = this.require(challengeId);
    return {
      currentAmount: challenge.currentAmount,
      targetAmount: challenge.targetAmount,
      status: challenge.status,
    };
  }

  getLeaderboard(challengeId: ChallengeId, limit: number): LeaderboardEntry[] {
    if (!Number.isSafeInteger(limit) || limit <= 0) {
      throw new ValidationError('limit must be a positive integer', 'limit', limit);
    }
    this.require(challengeId);
    return this.ledger.contributors(challengeId, limit).map((entry) => ({
      contributorId: entry.contributorId,
      amountContributed: entry.amountContributed,
    }));
  }

  /** What players see: enabled challenges that are not yet completed, newest first. */
  listActive(): Challenge[] {
    if (!this.store.settings().enabled) return [];
    return this.store.listChallenges().filter((challenge) => challenge.enabled && challenge.status !== 'completed');
  }

  listAll(): Challenge[] {
    return this.store.listChallenges();
  }

  getChallenge(challengeId: ChallengeId): Challenge {
    return this.require(challengeId);
  }

  /** Reward records of the challenge's current round, failures first. */
  getRewardAudit(challengeId: ChallengeId): RewardAudit {
    const challenge = this.require(challengeId);
    const records = this.store.listRewardRecords(challengeId, challenge.round);
    return {
      challengeId,
      round: challenge.round,
      records,
      failed: records.filter((record) => record.status === 'failed'),
    };
  }

  private require(challengeId: ChallengeId): Challenge {
    const challenge = this.store.getChallenge(challengeId);
    if (!challenge) {
      throw new ValidationError(`unknown challenge ${challengeId}`, 'challengeId', challengeId);
    }
    return challenge;
  }
}
