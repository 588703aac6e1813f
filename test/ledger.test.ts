import { afterEach, describe, expect, it } from 'vitest';
import { createHarness, challengeInput, type Harness } from './helpers.js';

describe('ProgressLedger', () => {
  let h: Harness;

  afterEach(() => h.db.close());

  it('keeps the ledger sum equal to the challenge total', () => {
    h = createHarness();
    const challenge = h.system.admin.createChallenge(challengeInput({ targetAmount: 1_000 }));

    h.system.engine.reportProgress(challenge.id, 'u1', 30);
    h.system.engine.reportProgress(challenge.id, 'u2', 12);
    h.system.engine.reportProgress(challenge.id, 'u1', 8);

    expect(h.system.ledger.total(challenge.id)).toBe(50);
    expect(h.system.query.getProgress(challenge.id).currentAmount).toBe(50);
    expect(h.system.ledger.contributionOf(challenge.id, 'u1')).toBe(38);
    expect(h.system.ledger.contributionOf(challenge.id, 'nobody')).toBe(0);
  });

  it('remembers first and last contribution times', () => {
    h = createHarness();
    const challenge = h.system.admin.createChallenge(challengeInput({ targetAmount: 1_000 }));

    h.system.engine.reportProgress(challenge.id, 'u1', 5);
    h.clock.advance(500);
    h.system.engine.reportProgress(challenge.id, 'u1', 5);

    const [entry] = h.system.ledger.contributors(challenge.id);
    expect(entry.amountContributed).toBe(10);
    expect(entry.lastContributedAt - entry.firstContributedAt).toBeGreaterThanOrEqual(500);
  });

  it('rejects a key seen inside the window and accepts it once the window has passed', () => {
    h = createHarness({ dedupWindowMs: 1_000 });
    const challenge = h.system.admin.createChallenge(challengeInput());
    const { ledger } = h.system;

    expect(ledger.claimKey(challenge.id, 'u1', 'k1', 5_000)).toBe(true);
    expect(ledger.claimKey(challenge.id, 'u1', 'k1', 5_999)).toBe(false);
    expect(ledger.claimKey(challenge.id, 'u2', 'k1', 5_999)).toBe(true);
    expect(ledger.claimKey(challenge.id, 'u1', 'k1', 6_000)).toBe(true);
  });

  it('prunes keys older than the window', () => {
    h = createHarness({ dedupWindowMs: 1_000 });
    const challenge = h.system.admin.createChallenge(challengeInput());
    const { ledger, store } = h.system;

    ledger.claimKey(challenge.id, 'u1', 'old', 1_000);
    ledger.claimKey(challenge.id, 'u1', 'fresh', 1_800);

    expect(ledger.pruneExpiredKeys(2_500)).toBe(1);
    expect(store.getReportKeySeenAt(challenge.id, 'u1', 'old')).toBeUndefined();
    expect(store.getReportKeySeenAt(challenge.id, 'u1', 'fresh')).toBe(1_800);
  });

  it('clear drops entries and remembered keys', () => {
    h = createHarness();
    const challenge = h.system.admin.createChallenge(challengeInput({ targetAmount: 1_000 }));
    h.system.engine.reportProgress(challenge.id, 'u1', 5, 'k1');
    h.system.engine.reportProgress(challenge.id, 'u2', 5, 'k2');

    expect(h.system.ledger.clear(challenge.id)).toBe(2);
    expect(h.system.ledger.contributors(challenge.id)).toEqual([]);
    expect(h.system.store.getReportKeySeenAt(challenge.id, 'u1', 'k1')).toBeUndefined();
  });
});
