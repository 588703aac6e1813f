import { openDatabase, type DatabaseManager } from '../src/persistence/db.js';
import { createChallengeSystem, type ChallengeSystem, type ChallengeSystemOptions } from '../src/challenges/index.js';
import type { Announcer, GrantResult, RewardDispatcher, UserId } from '../src/models.js';
import type { ChallengeInput } from '../src/challenges/admin.js';

export class RecordingDispatcher implements RewardDispatcher {
  readonly calls: { contributorId: UserId; rewardItem: string; rewardQuantity: number; grantKey: string }[] = [];
  /** Contributors whose grants fail every time. */
  readonly failFor = new Set<UserId>();

  async grant(contributorId: UserId, rewardItem: string, rewardQuantity: number, grantKey: string): Promise<GrantResult> {
    this.calls.push({ contributorId, rewardItem, rewardQuantity, grantKey });
    if (this.failFor.has(contributorId)) {
      return { ok: false, reason: 'inventory offline' };
    }
    return { ok: true };
  }

  callsFor(contributorId: UserId) {
    return this.calls.filter((call) => call.contributorId === contributorId);
  }
}

export class RecordingAnnouncer implements Announcer {
  readonly calls: { channelId: string; challengeName: string; totalReached: number; contributorCount: number }[] = [];
  failuresLeft = 0;

  async announce(channelId: string, challengeName: string, totalReached: number, contributorCount: number): Promise<void> {
    this.calls.push({ channelId, challengeName, totalReached, contributorCount });
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error('channel unavailable');
    }
  }
}

/** Starts at 1_000_000 and moves forward one millisecond per read. */
export function steppingClock(start = 1_000_000) {
  let now = start;
  const clock = () => now++;
  return Object.assign(clock, {
    advance(ms: number) {
      now += ms;
    },
  });
}

export interface Harness {
  db: DatabaseManager;
  system: ChallengeSystem;
  dispatcher: RecordingDispatcher;
  announcer: RecordingAnnouncer;
  clock: ReturnType<typeof steppingClock>;
}

export function createHarness(overrides: Partial<ChallengeSystemOptions> = {}): Harness {
  const db = openDatabase(':memory:');
  const dispatcher = new RecordingDispatcher();
  const announcer = new RecordingAnnouncer();
  const clock = steppingClock();
  const system = createChallengeSystem(
    db,
    { dispatcher, announcer },
    {
      dedupWindowMs: 60_000,
      leaseMs: 30_000,
      rewardMaxAttempts: 3,
      rewardRetryBaseMs: 0,
      clock,
      ownerId: 'worker_test',
      ...overrides,
    }
  );
  return { db, system, dispatcher, announcer, clock };
}

export function challengeInput(overrides: Partial<ChallengeInput> = {}): ChallengeInput {
  return {
    name: 'Harvest Festival',
    description: 'Bring in the crops together',
    challengeType: 'collect',
    targetAmount: 100,
    rewardItem: 'golden_seed',
    rewardQuantity: 2,
    ...overrides,
  };
}
