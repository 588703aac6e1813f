import { nanoid } from 'nanoid';
import type { ChallengeStore } from './store.js';
import type { ProgressLedger } from './ledger.js';
import type { CompletionHandoff } from './aggregation.js';
import {
  RewardDispatchError,
  errorMessage,
  formatErrorForLogging,
  isRetryableError,
  withRetry,
} from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import type {
  Announcer,
  Challenge,
  ChallengeId,
  CompletionReport,
  RewardDispatcher,
  UserId,
} from '../models.js';

export interface CompletionOptions {
  /** How long a claimed workflow is protected from takeover without renewal. */
  leaseMs: number;
  rewardMaxAttempts: number;
  rewardRetryBaseMs: number;
}

type GrantAttempt = { ok: true; attempts: number } | { ok: false; attempts: number; error: string };

function emptyReport(challengeId: ChallengeId): CompletionReport {
  return {
    challengeId,
    contributorCount: 0,
    granted: [],
    alreadyGranted: [],
    failed: [],
    announced: false,
    completed: false,
  };
}

/**
 * Drives `active -> completing -> completed`.
 *
 * The persisted status is the exactly-once gate: only the caller whose compare-and-set moves a
 * challenge to `completing` runs the workflow, and it holds a renewable lease while it does.
 * A process that dies mid-workflow leaves the challenge in `completing`; once the lease lapses
 * {@link recoverStalled} picks it up and re-runs every step. Grants already recorded for the
 * current round are skipped, and the announcement slot is taken at most once per round.
 */
export class CompletionCoordinator implements CompletionHandoff {
  readonly ownerId: string;
  private readonly inFlight = new Map<ChallengeId, Promise<CompletionReport>>();

  constructor(
    private readonly store: ChallengeStore,
    private readonly ledger: ProgressLedger,
    private readonly dispatcher: RewardDispatcher,
    private readonly announcer: Announcer,
    private readonly options: CompletionOptions,
    private readonly clock: () => number = Date.now,
    ownerId?: string
  ) {
    this.ownerId = ownerId ?? `worker_${nanoid(8)}`;
  }

  leaseExpiry(now: number): number {
    return now + this.options.leaseMs;
  }

  /** Fire-and-forget start for a challenge this instance has already claimed. */
  begin(challengeId: ChallengeId): void {
    this.run(challengeId).catch((error) => {
      logger.error('Completion workflow failed', formatErrorForLogging(error, { challengeId }));
    });
  }

  /**
   * Claims and completes `challengeId` if it is due. Concurrent calls in this process share one
   * run; a call that loses the claim to another process resolves to null.
   */
  trigger(challengeId: ChallengeId): Promise<CompletionReport | null> {
    const running = this.inFlight.get(challengeId);
    if (running) return running;

    const now = this.clock();
    const expiry = this.leaseExpiry(now);
    if (this.store.claimCompletion(challengeId, this.ownerId, expiry, now)) {
      return this.run(challengeId);
    }
    if (this.store.acquireCompletionLease(challengeId, this.ownerId, expiry, now)) {
      logger.info('Resuming interrupted completion', { challengeId, owner: this.ownerId });
      return this.run(challengeId);
    }
    return Promise.resolve(null);
  }

  /** Resumes stalled workflows and completes active challenges already at their target. */
  async recoverStalled(): Promise<CompletionReport[]> {
    const due = this.store.listPendingCompletions();
    const settled = await Promise.allSettled(due.map((challenge) => this.trigger(challenge.id)));
    const reports: CompletionReport[] = [];
    settled.forEach((outcome, ix) => {
      if (outcome.status === 'rejected') {
        logger.error('Recovered completion failed', formatErrorForLogging(outcome.reason, { challengeId: due[ix].id }));
      } else if (outcome.value) {
        reports.push(outcome.value);
      }
    });
    return reports;
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight.values()]);
    }
  }

  private run(challengeId: ChallengeId): Promise<CompletionReport> {
    const running = this.inFlight.get(challengeId);
    if (running) return running;
    const promise = this.execute(challengeId).finally(() => {
      this.inFlight.delete(challengeId);
    });
    this.inFlight.set(challengeId, promise);
    return promise;
  }

  private async execute(challengeId: ChallengeId): Promise<CompletionReport> {
    const challenge = this.store.getChallenge(challengeId);
    const report = emptyReport(challengeId);
    if (!challenge || challenge.status !== 'completing' || challenge.completionOwner !== this.ownerId) {
      return report;
    }

    // Frozen for this pass; the aggregation engine rejects anything new once status left `active`.
    const contributors = this.ledger.contributors(challengeId);
    report.contributorCount = contributors.length;

    if (challenge.rewardQuantity > 0 && contributors.length > 0) {
      const keepGoing = await this.distribute(
        challenge,
        contributors.map((entry) => entry.contributorId),
        report
      );
      if (!keepGoing) return report;
    }

    if (!this.renewLease(challengeId)) return report;
    report.announced = await this.announce(challenge, contributors.length);

    report.completed = this.store.markCompleted(challengeId, this.ownerId, this.clock());
    if (report.completed) {
      this.store.logEvent('challenge_completed', challengeId, null, {
        round: challenge.round,
        total: challenge.currentAmount,
        contributors: report.contributorCount,
        granted: report.granted.length,
        failed: report.failed.map((failure) => failure.contributorId),
      });
      logger.info('Challenge completed', {
        challengeId,
        name: challenge.name,
        contributors: report.contributorCount,
        failed: report.failed.length,
      });
    } else {
      logger.warn('Challenge changed hands before it could be marked completed', { challengeId });
    }
    return report;
  }

  /** Returns false when the lease was lost and another worker now owns the workflow. */
  private async distribute(challenge: Challenge, contributorIds: UserId[], report: CompletionReport): Promise<boolean> {
    this.store.ensureRewardRecords(challenge, contributorIds, this.clock());
    const records = new Map(
      this.store.listRewardRecords(challenge.id, challenge.round).map((record) => [record.contributorId, record])
    );

    for (const contributorId of contributorIds) {
      if (records.get(contributorId)?.status === 'granted') {
        report.alreadyGranted.push(contributorId);
        continue;
      }

      const attempt = await this.grant(challenge, contributorId);
      if (attempt.ok) {
        this.store.markRewardGranted(challenge.id, challenge.round, contributorId, attempt.attempts, this.clock());
        report.granted.push(contributorId);
      } else {
        this.store.markRewardFailed(
          challenge.id,
          challenge.round,
          contributorId,
          attempt.attempts,
          attempt.error,
          this.clock()
        );
        this.store.logEvent('challenge_reward_failed', challenge.id, contributorId, {
          round: challenge.round,
          rewardItem: challenge.rewardItem,
          rewardQuantity: challenge.rewardQuantity,
          attempts: attempt.attempts,
          error: attempt.error,
        });
        logger.warn('Reward delivery gave up', { challengeId: challenge.id, contributorId, error: attempt.error });
        report.failed.push({ contributorId, error: attempt.error });
      }

      if (!this.renewLease(challenge.id)) return false;
    }
    return true;
  }

  private renewLease(challengeId: ChallengeId): boolean {
    if (this.store.extendCompletionLease(challengeId, this.ownerId, this.leaseExpiry(this.clock()))) {
      return true;
    }
    logger.warn('Completion lease lost to another worker', { challengeId, owner: this.ownerId });
    return false;
  }

  private async grant(challenge: Challenge, contributorId: UserId): Promise<GrantAttempt> {
    const grantKey = `${challenge.id}:${challenge.round}:${contributorId}`;
    let attempts = 0;
    try {
      await withRetry(
        async (attempt) => {
          attempts = attempt;
          const result = await this.dispatcher.grant(
            contributorId,
            challenge.rewardItem,
            challenge.rewardQuantity,
            grantKey
          );
          if (!result.ok) {
            throw new RewardDispatchError(result.reason, challenge.id, contributorId, result.retryable ?? true);
          }
        },
        Math.max(0, this.options.rewardMaxAttempts - 1),
        this.options.rewardRetryBaseMs,
        isRetryableError
      );
      return { ok: true, attempts };
    } catch (error) {
      return { ok: false, attempts, error: errorMessage(error) };
    }
  }

  private async announce(challenge: Challenge, contributorCount: number): Promise<boolean> {
    if (challenge.announcedAt !== null) return false;

    const channelId = this.store.settings().announcementChannelId;
    if (!channelId) {
      logger.debug('No announcement channel configured', { challengeId: challenge.id });
      return false;
    }

    if (!this.store.claimAnnouncement(challenge.id, this.ownerId, this.clock())) {
      logger.debug('Announcement already taken', { challengeId: challenge.id });
      return false;
    }

    try {
      await withRetry(
        () => this.announcer.announce(channelId, challenge.name, challenge.currentAmount, contributorCount),
        1,
        this.options.rewardRetryBaseMs
      );
      return true;
    } catch (error) {
      logger.warn('Completion announcement failed', formatErrorForLogging(error, { challengeId: challenge.id, channelId }));
      this.store.logEvent('challenge_announcement_failed', challenge.id, null, {
        channelId,
        error: errorMessage(error),
      });
      return false;
    }
  }
}
