import type { ChallengeStore } from './store.js';
import type { ProgressLedger } from './ledger.js';
import { ValidationError } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import { isChallengeType } from '../models.js';
import type { Challenge, ChallengeId, ChallengeType, ReportOutcome, UserId } from '../models.js';

/** Receives the single threshold crossing of a challenge. */
export interface CompletionHandoff {
  readonly ownerId: string;
  leaseExpiry(now: number): number;
  begin(challengeId: ChallengeId): void;
}

function validateReport(contributorId: UserId, amount: number, idempotencyKey?: string) {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new ValidationError('amount must be a positive integer', 'amount', amount);
  }
  if (!contributorId.trim()) {
    throw new ValidationError('contributor id is required', 'contributorId', contributorId);
  }
  if (idempotencyKey !== undefined && !idempotencyKey.trim()) {
    throw new ValidationError('idempotency key must not be blank', 'idempotencyKey', idempotencyKey);
  }
}

function rejected(challenge: Challenge, reason: 'duplicate' | 'closed'): ReportOutcome {
  return { challengeId: challenge.id, accepted: false, newTotal: challenge.currentAmount, crossedThreshold: false, reason };
}

export class AggregationEngine {
  constructor(
    private readonly store: ChallengeStore,
    private readonly ledger: ProgressLedger,
    private readonly handoff: CompletionHandoff,
    private readonly clock: () => number = Date.now
  ) {}

  reportProgress(challengeId: ChallengeId, contributorId: UserId, amount: number, idempotencyKey?: string): ReportOutcome {
    validateReport(contributorId, amount, idempotencyKey);
    if (!this.store.settings().enabled) {
      throw new ValidationError('community challenges are disabled', 'settings.enabled', false);
    }
    return this.settle(challengeId, contributorId, amount, idempotencyKey, false);
  }

  /**
   * Credits every enabled, active challenge of `type`. Challenges that close or get disabled
   * while this runs come back as `closed` rather than throwing.
   */
  reportProgressByType(type: ChallengeType, contributorId: UserId, amount: number, idempotencyKey?: string): ReportOutcome[] {
    if (!isChallengeType(type)) {
      throw new ValidationError(`unknown challenge type "${type}"`, 'challengeType', type);
    }
    validateReport(contributorId, amount, idempotencyKey);
    if (!this.store.settings().enabled) return [];

    return this.store
      .listChallenges({ type, status: 'active' })
      .filter((challenge) => challenge.enabled)
      .map((challenge) => this.settle(challenge.id, contributorId, amount, idempotencyKey, true));
  }

  private settle(
    challengeId: ChallengeId,
    contributorId: UserId,
    amount: number,
    idempotencyKey: string | undefined,
    lenient: boolean
  ): ReportOutcome {
    const outcome = this.store.transaction(() =>
      this.apply(challengeId, contributorId, amount, idempotencyKey, lenient, this.clock())
    );

    if (outcome.reason === 'duplicate') {
      logger.debug('Duplicate progress report absorbed', { challengeId, contributorId, idempotencyKey });
    }
    if (outcome.crossedThreshold) {
      logger.info('Challenge reached its target', { challengeId, total: outcome.newTotal, contributorId });
      this.handoff.begin(challengeId);
    }
    return outcome;
  }

  // Runs inside one IMMEDIATE transaction: the read, both increments and the claim commit together.
  private apply(
    challengeId: ChallengeId,
    contributorId: UserId,
    amount: number,
    idempotencyKey: string | undefined,
    lenient: boolean,
    now: number
  ): ReportOutcome {
    const challenge = this.store.getChallenge(challengeId);
    if (!challenge) {
      if (lenient) return { challengeId, accepted: false, newTotal: 0, crossedThreshold: false, reason: 'closed' };
      throw new ValidationError(`unknown challenge ${challengeId}`, 'challengeId', challengeId);
    }
    if (!challenge.enabled) {
      if (lenient) return rejected(challenge, 'closed');
      throw new ValidationError(`challenge ${challenge.name} is disabled`, 'challengeId', challengeId);
    }
    if (challenge.status !== 'active') {
      return rejected(challenge, 'closed');
    }
    if (idempotencyKey !== undefined && !this.ledger.claimKey(challengeId, contributorId, idempotencyKey, now)) {
      return rejected(challenge, 'duplicate');
    }
    if (!this.store.incrementProgress(challengeId, amount, now)) {
      return rejected(challenge, 'closed');
    }
    this.ledger.credit(challengeId, contributorId, amount, now);

    const newTotal = challenge.currentAmount + amount;
    const reachedNow = challenge.currentAmount < challenge.targetAmount && newTotal >= challenge.targetAmount;
    const crossedThreshold =
      reachedNow && this.store.claimCompletion(challengeId, this.handoff.ownerId, this.handoff.leaseExpiry(now), now);

    return { challengeId, accepted: true, newTotal, crossedThreshold };
  }
}
