import { afterEach, describe, expect, it } from 'vitest';
import { createChallengeSystem, type ChallengeSystem } from '../src/challenges/index.js';
import { openDatabase, type DatabaseManager } from '../src/persistence/db.js';
import type { GrantResult, UserId } from '../src/models.js';
import {
  createHarness,
  challengeInput,
  steppingClock,
  RecordingAnnouncer,
  RecordingDispatcher,
  type Harness,
} from './helpers.js';

const CHANNEL = '123456789012345678';

describe('CompletionCoordinator', () => {
  let h: Harness;

  afterEach(async () => {
    await h.system.completion.drain();
    h.db.close();
  });

  it('runs one workflow for concurrent triggers', async () => {
    h = createHarness();
    h.system.admin.updateSettings({ announcementChannelId: CHANNEL });
    const challenge = h.system.admin.createChallenge(challengeInput({ targetAmount: 1_000 }));
    h.system.engine.reportProgress(challenge.id, 'alice', 60);
    h.system.engine.reportProgress(challenge.id, 'bob', 50);
    // Bypass the admin surface so nothing starts completion on its own.
    h.system.store.updateChallenge(challenge.id, { targetAmount: 100 });

    const other = createChallengeSystem(
      h.db,
      { dispatcher: new RecordingDispatcher(), announcer: new RecordingAnnouncer() },
      { dedupWindowMs: 60_000, leaseMs: 30_000, rewardMaxAttempts: 3, rewardRetryBaseMs: 0, clock: h.clock, ownerId: 'worker_other' }
    );

    const runs = Array.from({ length: 5 }, () => h.system.completion.trigger(challenge.id));
    const rival = other.completion.trigger(challenge.id);
    const reports = await Promise.all(runs);

    expect(await rival).toBeNull();
    expect(new Set(reports).size).toBe(1);
    expect(reports[0]).toEqual({
      challengeId: challenge.id,
      contributorCount: 2,
      granted: ['alice', 'bob'],
      alreadyGranted: [],
      failed: [],
      announced: true,
      completed: true,
    });
    expect(h.dispatcher.calls.map((call) => call.grantKey)).toEqual([
      `${challenge.id}:1:alice`,
      `${challenge.id}:1:bob`,
    ]);
    expect(h.announcer.calls).toEqual([
      { channelId: CHANNEL, challengeName: 'Harvest Festival', totalReached: 110, contributorCount: 2 },
    ]);
    expect(await h.system.completion.trigger(challenge.id)).toBeNull();
  });

  it('resumes an abandoned workflow once its lease lapses', async () => {
    h = createHarness();
    h.system.admin.updateSettings({ announcementChannelId: CHANNEL });
    const challenge = h.system.admin.createChallenge(challengeInput({ targetAmount: 1_000 }));
    h.system.engine.reportProgress(challenge.id, 'alice', 60);
    h.system.engine.reportProgress(challenge.id, 'bob', 30);
    h.system.store.updateChallenge(challenge.id, { targetAmount: 90 });

    // A worker that claimed the challenge, paid alice, announced, then died.
    const now = h.clock();
    expect(h.system.store.claimCompletion(challenge.id, 'worker_dead', now + 10_000, now)).toBe(true);
    const claimed = h.system.query.getChallenge(challenge.id);
    h.system.store.ensureRewardRecords(claimed, ['alice', 'bob'], now);
    h.system.store.markRewardGranted(challenge.id, 1, 'alice', 1, now);
    expect(h.system.store.claimAnnouncement(challenge.id, 'worker_dead', now)).toBe(true);

    expect(await h.system.completion.recoverStalled()).toEqual([]);
    expect(h.dispatcher.calls).toEqual([]);

    h.clock.advance(10_000);
    const [report] = await h.system.completion.recoverStalled();

    expect(report).toEqual({
      challengeId: challenge.id,
      contributorCount: 2,
      granted: ['bob'],
      alreadyGranted: ['alice'],
      failed: [],
      announced: false,
      completed: true,
    });
    expect(h.dispatcher.calls.map((call) => call.contributorId)).toEqual(['bob']);
    expect(h.announcer.calls).toEqual([]);
    expect(h.system.query.getProgress(challenge.id).status).toBe('completed');
  });

  it('completes active challenges found at their target during recovery', async () => {
    h = createHarness();
    const challenge = h.system.admin.createChallenge(challengeInput({ targetAmount: 1_000 }));
    h.system.engine.reportProgress(challenge.id, 'alice', 40);
    h.system.store.updateChallenge(challenge.id, { targetAmount: 40 });

    const reports = await h.system.completion.recoverStalled();

    expect(reports.map((report) => report.challengeId)).toEqual([challenge.id]);
    expect(h.system.query.getProgress(challenge.id).status).toBe('completed');
  });

  it('records a failed grant and still completes', async () => {
    h = createHarness();
    h.dispatcher.failFor.add('bob');
    const challenge = h.system.admin.createChallenge(challengeInput({ targetAmount: 100 }));
    h.system.engine.reportProgress(challenge.id, 'alice', 60);
    h.system.engine.reportProgress(challenge.id, 'bob', 50);
    await h.system.completion.drain();

    expect(h.dispatcher.callsFor('bob')).toHaveLength(3);
    expect(h.dispatcher.callsFor('alice')).toHaveLength(1);
    expect(h.system.query.getProgress(challenge.id).status).toBe('completed');

    const audit = h.system.query.getRewardAudit(challenge.id);
    expect(audit.records.map((record) => [record.contributorId, record.status, record.attempts])).toEqual([
      ['bob', 'failed', 3],
      ['alice', 'granted', 1],
    ]);
    expect(audit.failed[0].lastError).toBe('inventory offline');
    expect(h.system.store.listEvents(challenge.id).map((event) => event.type)).toEqual([
      'challenge_created',
      'challenge_reward_failed',
      'challenge_completed',
    ]);
  });

  it('retries the announcement once', async () => {
    h = createHarness();
    h.system.admin.updateSettings({ announcementChannelId: CHANNEL });
    h.announcer.failuresLeft = 1;
    const challenge = h.system.admin.createChallenge(challengeInput({ targetAmount: 10 }));
    h.system.engine.reportProgress(challenge.id, 'alice', 10);
    await h.system.completion.drain();

    expect(h.announcer.calls).toHaveLength(2);
    expect(h.system.query.getChallenge(challenge.id).announcedAt).not.toBeNull();
  });

  it('completes even when the announcement cannot be delivered', async () => {
    h = createHarness();
    h.system.admin.updateSettings({ announcementChannelId: CHANNEL });
    h.announcer.failuresLeft = 5;
    const challenge = h.system.admin.createChallenge(challengeInput({ targetAmount: 10 }));
    h.system.engine.reportProgress(challenge.id, 'alice', 10);
    await h.system.completion.drain();

    const after = h.system.query.getChallenge(challenge.id);
    expect(h.announcer.calls).toHaveLength(2);
    expect(after.status).toBe('completed');
    // The slot stays taken, so a later owner does not post a second time.
    expect(after.announcedAt).not.toBeNull();
    expect(h.system.store.listEvents(challenge.id).map((event) => event.type)).toContain('challenge_announcement_failed');
  });

  it('skips the announcement without a channel and grants nothing for a zero reward', async () => {
    h = createHarness();
    const challenge = h.system.admin.createChallenge(challengeInput({ targetAmount: 10, rewardQuantity: 0 }));
    h.system.engine.reportProgress(challenge.id, 'alice', 10);
    await h.system.completion.drain();

    expect(h.announcer.calls).toEqual([]);
    expect(h.dispatcher.calls).toEqual([]);
    expect(h.system.query.getProgress(challenge.id).status).toBe('completed');
  });
});

describe('maintenance sweep', () => {
  it('prunes stale keys and completes due challenges on start', async () => {
    const h = createHarness({ dedupWindowMs: 1_000 });
    const challenge = h.system.admin.createChallenge(challengeInput({ targetAmount: 1_000 }));
    h.system.engine.reportProgress(challenge.id, 'alice', 20);
    h.system.store.updateChallenge(challenge.id, { targetAmount: 20 });
    h.system.ledger.claimKey(challenge.id, 'alice', 'ancient', 0);

    const stop = h.system.startMaintenance(60_000);
    await h.system.completion.drain();
    stop();

    expect(h.system.store.getReportKeySeenAt(challenge.id, 'alice', 'ancient')).toBeUndefined();
    expect(h.system.query.getProgress(challenge.id).status).toBe('completed');
    h.db.close();
  });
});

/** Holds every call until `release()`; `arrived` resolves on the first held call. */
function gate() {
  let open: () => void = () => {};
  let signal: () => void = () => {};
  const released = new Promise<void>((resolve) => {
    open = resolve;
  });
  const arrived = new Promise<void>((resolve) => {
    signal = resolve;
  });
  return {
    released,
    arrived,
    hold: () => {
      signal();
      return released;
    },
    release: () => open(),
  };
}

class HeldAnnouncer extends RecordingAnnouncer {
  readonly held = gate();

  override async announce(channelId: string, challengeName: string, totalReached: number, contributorCount: number) {
    await super.announce(channelId, challengeName, totalReached, contributorCount);
    await this.held.hold();
  }
}

class HeldDispatcher extends RecordingDispatcher {
  readonly held = gate();

  constructor(private readonly holdFor: UserId) {
    super();
  }

  override async grant(contributorId: UserId, rewardItem: string, rewardQuantity: number, grantKey: string): Promise<GrantResult> {
    const result = await super.grant(contributorId, rewardItem, rewardQuantity, grantKey);
    if (contributorId === this.holdFor) await this.held.hold();
    return result;
  }
}

describe('lease takeover between workers', () => {
  const options = { dedupWindowMs: 60_000, leaseMs: 1_000, rewardMaxAttempts: 3, rewardRetryBaseMs: 0 };
  let db: DatabaseManager;

  afterEach(() => db.close());

  function worker(ownerId: string, clock: ReturnType<typeof steppingClock>, dispatcher: RecordingDispatcher, announcer: RecordingAnnouncer) {
    return createChallengeSystem(db, { dispatcher, announcer }, { ...options, clock, ownerId });
  }

  function completedEvents(system: ChallengeSystem, challengeId: string) {
    return system.store.listEvents(challengeId).filter((event) => event.type === 'challenge_completed');
  }

  it('announces once when the announcing worker outlives its lease', async () => {
    db = openDatabase(':memory:');
    const clock = steppingClock();
    const slowAnnouncer = new HeldAnnouncer();
    const otherAnnouncer = new RecordingAnnouncer();
    const a = worker('worker_a', clock, new RecordingDispatcher(), slowAnnouncer);
    const b = worker('worker_b', clock, new RecordingDispatcher(), otherAnnouncer);
    a.admin.updateSettings({ announcementChannelId: CHANNEL });
    const challenge = a.admin.createChallenge(challengeInput({ targetAmount: 10, rewardQuantity: 0 }));

    a.engine.reportProgress(challenge.id, 'alice', 10);
    await slowAnnouncer.held.arrived;

    clock.advance(5_000);
    const [takeover] = await b.completion.recoverStalled();
    slowAnnouncer.held.release();
    await a.completion.drain();

    expect(takeover).toMatchObject({ announced: false, completed: true });
    expect(slowAnnouncer.calls).toHaveLength(1);
    expect(otherAnnouncer.calls).toEqual([]);
    expect(b.query.getProgress(challenge.id)).toEqual({ currentAmount: 10, targetAmount: 10, status: 'completed' });
    expect(completedEvents(b, challenge.id)).toHaveLength(1);
  });

  it('stops a worker that loses its lease mid-distribution', async () => {
    db = openDatabase(':memory:');
    const clock = steppingClock();
    const slowDispatcher = new HeldDispatcher('bob');
    const otherDispatcher = new RecordingDispatcher();
    const a = worker('worker_a', clock, slowDispatcher, new RecordingAnnouncer());
    const b = worker('worker_b', clock, otherDispatcher, new RecordingAnnouncer());
    const challenge = a.admin.createChallenge(challengeInput({ targetAmount: 100 }));
    a.engine.reportProgress(challenge.id, 'alice', 60);

    a.engine.reportProgress(challenge.id, 'bob', 50);
    await slowDispatcher.held.arrived;

    clock.advance(5_000);
    const [takeover] = await b.completion.recoverStalled();
    slowDispatcher.held.release();
    await a.completion.drain();

    expect(takeover).toMatchObject({ granted: ['bob'], alreadyGranted: ['alice'], failed: [], completed: true });
    expect(slowDispatcher.calls.map((call) => call.contributorId)).toEqual(['alice', 'bob']);
    expect(otherDispatcher.calls.map((call) => call.grantKey)).toEqual([`${challenge.id}:1:bob`]);
    expect(
      b.query.getRewardAudit(challenge.id).records.map((record) => [record.contributorId, record.status, record.attempts])
    ).toEqual([
      ['alice', 'granted', 1],
      ['bob', 'granted', 1],
    ]);
    expect(completedEvents(b, challenge.id)).toHaveLength(1);
    expect(b.query.getProgress(challenge.id).status).toBe('completed');
  });
});

describe('recovery sweep', () => {
  it('keeps the reports of healthy runs when another run fails', async () => {
    const h = createHarness();
    const healthy = h.system.admin.createChallenge(challengeInput({ name: 'Healthy', targetAmount: 1_000 }));
    const broken = h.system.admin.createChallenge(challengeInput({ name: 'Broken', targetAmount: 1_000 }));
    h.system.engine.reportProgress(healthy.id, 'alice', 10);
    h.system.engine.reportProgress(broken.id, 'bob', 10);
    h.system.store.updateChallenge(healthy.id, { targetAmount: 10 });
    h.system.store.updateChallenge(broken.id, { targetAmount: 10 });
    const markCompleted = h.system.store.markCompleted.bind(h.system.store);
    h.system.store.markCompleted = (id, owner, now) => {
      if (id === broken.id) throw new Error('disk full');
      return markCompleted(id, owner, now);
    };

    const reports = await h.system.completion.recoverStalled();

    expect(reports.map((report) => report.challengeId)).toEqual([healthy.id]);
    expect(h.system.query.getProgress(healthy.id).status).toBe('completed');
    expect(h.system.query.getProgress(broken.id).status).toBe('completing');
    h.db.close();
  });
});
