import { nanoid } from 'nanoid';
import type { DatabaseManager } from '../persistence/db.js';
import { getChallengeSettings, upsertChallengeSettings } from '../persistence/settings.js';
import type {
  Challenge,
  ChallengeId,
  ChallengeSettings,
  ChallengeStatus,
  ChallengeType,
  ContributionEntry,
  RewardRecord,
  RewardStatus,
  UserId,
} from '../models.js';

interface ChallengeRow {
  challenge_id: string;
  name: string;
  description: string;
  challenge_type: ChallengeType;
  target_amount: number;
  reward_item: string;
  reward_quantity: number;
  enabled: number;
  status: ChallengeStatus;
  current_amount: number;
  round: number;
  announced_at: number | null;
  completion_owner: string | null;
  completion_lease_until: number | null;
  created_at: number;
  updated_at: number;
  completed_at: number | null;
}

interface ContributionRow {
  challenge_id: string;
  contributor_id: string;
  amount_contributed: number;
  first_contributed_at: number;
  last_contributed_at: number;
}

interface RewardRow {
  challenge_id: string;
  round: number;
  contributor_id: string;
  reward_item: string;
  reward_quantity: number;
  status: RewardStatus;
  attempts: number;
  last_error: string | null;
  updated_at: number;
  granted_at: number | null;
}

export interface NewChallenge {
  name: string;
  description: string;
  challengeType: ChallengeType;
  targetAmount: number;
  rewardItem: string;
  rewardQuantity: number;
  enabled: boolean;
}

export type ChallengePatch = Partial<NewChallenge>;

const PATCH_COLUMNS: [keyof NewChallenge, string][] = [
  ['name', 'name'],
  ['description', 'description'],
  ['challengeType', 'challenge_type'],
  ['targetAmount', 'target_amount'],
  ['rewardItem', 'reward_item'],
  ['rewardQuantity', 'reward_quantity'],
  ['enabled', 'enabled'],
];

function toChallenge(row: ChallengeRow): Challenge {
  return {
    id: row.challenge_id,
    name: row.name,
    description: row.description,
    challengeType: row.challenge_type,
    targetAmount: row.target_amount,
    rewardItem: row.reward_item,
    rewardQuantity: row.reward_quantity,
    enabled: row.enabled === 1,
    status: row.status,
    currentAmount: row.current_amount,
    round: row.round,
    announcedAt: row.announced_at,
    completionOwner: row.completion_owner,
    completionLeaseUntil: row.completion_lease_until,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    completedAt: row.completed_at,
  };
}

function toContribution(row: ContributionRow): ContributionEntry {
  return {
    challengeId: row.challenge_id,
    contributorId: row.contributor_id,
    amountContributed: row.amount_contributed,
    firstContributedAt: row.first_contributed_at,
    lastContributedAt: row.last_contributed_at,
  };
}

function toReward(row: RewardRow): RewardRecord {
  return {
    challengeId: row.challenge_id,
    round: row.round,
    contributorId: row.contributor_id,
    rewardItem: row.reward_item,
    rewardQuantity: row.reward_quantity,
    status: row.status,
    attempts: row.attempts,
    lastError: row.last_error,
    updatedAt: row.updated_at,
    grantedAt: row.granted_at,
  };
}

function sqlValue(value: string | number | boolean): string | number {
  return typeof value === 'boolean' ? (value ? 1 : 0) : value;
}

/**
 * Every read and write of challenge state goes through here. Mutations that must be
 * observed together are composed by callers inside {@link ChallengeStore.transaction}.
 */
export class ChallengeStore {
  constructor(private readonly db: DatabaseManager) {}

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn);
  }

  settings(): ChallengeSettings {
    return getChallengeSettings(this.db);
  }

  saveSettings(patch: Partial<Omit<ChallengeSettings, 'updatedAt'>>): ChallengeSettings {
    return upsertChallengeSettings(this.db, patch);
  }

  // -- challenges ---------------------------------------------------------

  insertChallenge(input: NewChallenge, now = Date.now()): Challenge {
    const id = `ch_${nanoid(10)}`;
    this.db
      .prepare(
        `INSERT INTO challenges (challenge_id, name, description, challenge_type, target_amount, reward_item, reward_quantity, enabled, created_at, updated_at)
         VALUES (?,?,?,?,?,?,?,?,?,?)`
      )
      .run(
        id,
        input.name,
        input.description,
        input.challengeType,
        input.targetAmount,
        input.rewardItem,
        input.rewardQuantity,
        input.enabled ? 1 : 0,
        now,
        now
      );
    const created = this.getChallenge(id);
    if (!created) throw new Error(`Challenge ${id} vanished after insert`);
    return created;
  }

  getChallenge(id: ChallengeId): Challenge | undefined {
    const row = this.db.prepare<ChallengeRow>('SELECT * FROM challenges WHERE challenge_id=?').get(id);
    return row ? toChallenge(row) : undefined;
  }

  listChallenges(filter: { type?: ChallengeType; status?: ChallengeStatus } = {}): Challenge[] {
    const clauses: string[] = [];
    const params: string[] = [];
    if (filter.type) {
      clauses.push('challenge_type=?');
      params.push(filter.type);
    }
    if (filter.status) {
      clauses.push('status=?');
      params.push(filter.status);
    }
    const where = clauses.length ? `WHERE ${clauses.join(' AND ')}` : '';
    return this.db
      .prepare<ChallengeRow>(`SELECT * FROM challenges ${where} ORDER BY created_at DESC, rowid DESC`)
      .all(...params)
      .map(toChallenge);
  }

  updateChallenge(id: ChallengeId, patch: ChallengePatch, now = Date.now()): boolean {
    const sets: string[] = [];
    const params: (string | number)[] = [];
    for (const [key, column] of PATCH_COLUMNS) {
      const value = patch[key];
      if (value === undefined) continue;
      sets.push(`${column}=?`);
      params.push(sqlValue(value));
    }
    if (!sets.length) return this.getChallenge(id) !== undefined;
    sets.push('updated_at=?');
    params.push(now);
    const result = this.db
      .prepare(`UPDATE challenges SET ${sets.join(', ')} WHERE challenge_id=?`)
      .run(...params, id);
    return result.changes === 1;
  }

  deleteChallenge(id: ChallengeId): boolean {
    return this.db.prepare('DELETE FROM challenges WHERE challenge_id=?').run(id).changes === 1;
  }

  /** Conditional, row-scoped increment. False when the challenge is no longer accepting progress. */
  incrementProgress(id: ChallengeId, amount: number, now = Date.now()): boolean {
    const result = this.db
      .prepare(
        `UPDATE challenges SET current_amount=current_amount+?, updated_at=?
         WHERE challenge_id=? AND status='active' AND enabled=1`
      )
      .run(amount, now, id);
    return result.changes === 1;
  }

  /** Compare-and-set `active -> completing` once the target is met. Succeeds for exactly one caller. */
  claimCompletion(id: ChallengeId, owner: string, leaseUntil: number, now = Date.now()): boolean {
    const result = this.db
      .prepare(
        `UPDATE challenges SET status='completing', completion_owner=?, completion_lease_until=?, updated_at=?
         WHERE challenge_id=? AND status='active' AND current_amount>=target_amount`
      )
      .run(owner, leaseUntil, now, id);
    return result.changes === 1;
  }

  /** Take over a `completing` challenge whose lease has lapsed (or that we already own). */
  acquireCompletionLease(id: ChallengeId, owner: string, leaseUntil: number, now = Date.now()): boolean {
    const result = this.db
      .prepare(
        `UPDATE challenges SET completion_owner=?, completion_lease_until=?, updated_at=?
         WHERE challenge_id=? AND status='completing'
           AND (completion_owner IS NULL OR completion_owner=? OR completion_lease_until IS NULL OR completion_lease_until<=?)`
      )
      .run(owner, leaseUntil, now, id, owner, now);
    return result.changes === 1;
  }

  extendCompletionLease(id: ChallengeId, owner: string, leaseUntil: number): boolean {
    const result = this.db
      .prepare(
        `UPDATE challenges SET completion_lease_until=?
         WHERE challenge_id=? AND status='completing' AND completion_owner=?`
      )
      .run(leaseUntil, id, owner);
    return result.changes === 1;
  }

  /**
   * Takes the one announcement slot of the current round. Only the lease holder of a `completing`
   * challenge can take it, and only once; a failed delivery is not retried by a later owner.
   */
  claimAnnouncement(id: ChallengeId, owner: string, now = Date.now()): boolean {
    const result = this.db
      .prepare(
        `UPDATE challenges SET announced_at=?
         WHERE challenge_id=? AND announced_at IS NULL AND status='completing' AND completion_owner=?`
      )
      .run(now, id, owner);
    return result.changes === 1;
  }

  markCompleted(id: ChallengeId, owner: string, now = Date.now()): boolean {
    const result = this.db
      .prepare(
        `UPDATE challenges SET status='completed', completed_at=?, updated_at=?, completion_owner=NULL, completion_lease_until=NULL
         WHERE challenge_id=? AND status='completing' AND completion_owner=?`
      )
      .run(now, now, id, owner);
    return result.changes === 1;
  }

  /** Challenges stuck mid-completion, plus active ones already at or past their target. */
  listPendingCompletions(): Challenge[] {
    return this.db
      .prepare<ChallengeRow>(
        `SELECT * FROM challenges
         WHERE status='completing' OR (status='active' AND enabled=1 AND current_amount>=target_amount)
         ORDER BY updated_at ASC`
      )
      .all()
      .map(toChallenge);
  }

  resetChallengeRow(id: ChallengeId, now = Date.now()): boolean {
    const result = this.db
      .prepare(
        `UPDATE challenges SET current_amount=0, status='active', round=round+1, announced_at=NULL,
           completion_owner=NULL, completion_lease_until=NULL, completed_at=NULL, updated_at=?
         WHERE challenge_id=?`
      )
      .run(now, id);
    return result.changes === 1;
  }

  // -- contributions ------------------------------------------------------

  upsertContribution(challengeId: ChallengeId, contributorId: UserId, amount: number, now = Date.now()) {
    this.db
      .prepare(
        `INSERT INTO challenge_contributions (challenge_id, contributor_id, amount_contributed, first_contributed_at, last_contributed_at)
         VALUES (?,?,?,?,?)
         ON CONFLICT(challenge_id, contributor_id) DO UPDATE SET
           amount_contributed=amount_contributed+excluded.amount_contributed,
           last_contributed_at=excluded.last_contributed_at`
      )
      .run(challengeId, contributorId, amount, now, now);
  }

  getContribution(challengeId: ChallengeId, contributorId: UserId): ContributionEntry | undefined {
    const row = this.db
      .prepare<ContributionRow>('SELECT * FROM challenge_contributions WHERE challenge_id=? AND contributor_id=?')
      .get(challengeId, contributorId);
    return row ? toContribution(row) : undefined;
  }

  /** Ranked: amount desc, earliest first contribution, then insertion order. */
  listContributions(challengeId: ChallengeId, limit = -1): ContributionEntry[] {
    return this.db
      .prepare<ContributionRow>(
        `SELECT * FROM challenge_contributions WHERE challenge_id=?
         ORDER BY amount_contributed DESC, first_contributed_at ASC, rowid ASC
         LIMIT ?`
      )
      .all(challengeId, limit)
      .map(toContribution);
  }

  sumContributions(challengeId: ChallengeId): number {
    const row = this.db
      .prepare<{ total: number }>(
        'SELECT COALESCE(SUM(amount_contributed), 0) AS total FROM challenge_contributions WHERE challenge_id=?'
      )
      .get(challengeId);
    return row?.total ?? 0;
  }

  deleteContributions(challengeId: ChallengeId): number {
    return this.db.prepare('DELETE FROM challenge_contributions WHERE challenge_id=?').run(challengeId).changes;
  }

  // -- idempotency keys ---------------------------------------------------

  getReportKeySeenAt(challengeId: ChallengeId, contributorId: UserId, key: string): number | undefined {
    const row = this.db
      .prepare<{ seen_at: number }>(
        'SELECT seen_at FROM challenge_report_keys WHERE challenge_id=? AND contributor_id=? AND idempotency_key=?'
      )
      .get(challengeId, contributorId, key);
    return row?.seen_at;
  }

  putReportKey(challengeId: ChallengeId, contributorId: UserId, key: string, now = Date.now()) {
    this.db
      .prepare(
        `INSERT INTO challenge_report_keys (challenge_id, contributor_id, idempotency_key, seen_at) VALUES (?,?,?,?)
         ON CONFLICT(challenge_id, contributor_id, idempotency_key) DO UPDATE SET seen_at=excluded.seen_at`
      )
      .run(challengeId, contributorId, key, now);
  }

  deleteReportKeys(challengeId: ChallengeId): number {
    return this.db.prepare('DELETE FROM challenge_report_keys WHERE challenge_id=?').run(challengeId).changes;
  }

  deleteReportKeysSeenBefore(cutoff: number): number {
    return this.db.prepare('DELETE FROM challenge_report_keys WHERE seen_at<?').run(cutoff).changes;
  }

  // -- reward records -----------------------------------------------------

  ensureRewardRecords(challenge: Challenge, contributorIds: UserId[], now = Date.now()) {
    const stmt = this.db.prepare(
      `INSERT OR IGNORE INTO challenge_rewards (challenge_id, round, contributor_id, reward_item, reward_quantity, status, attempts, updated_at)
       VALUES (?,?,?,?,?,'pending',0,?)`
    );
    for (const contributorId of contributorIds) {
      stmt.run(challenge.id, challenge.round, contributorId, challenge.rewardItem, challenge.rewardQuantity, now);
    }
  }

  listRewardRecords(challengeId: ChallengeId, round: number): RewardRecord[] {
    return this.db
      .prepare<RewardRow>(
        `SELECT * FROM challenge_rewards WHERE challenge_id=? AND round=?
         ORDER BY CASE status WHEN 'failed' THEN 0 WHEN 'pending' THEN 1 ELSE 2 END, contributor_id ASC`
      )
      .all(challengeId, round)
      .map(toReward);
  }

  markRewardGranted(challengeId: ChallengeId, round: number, contributorId: UserId, attempts: number, now = Date.now()) {
    this.db
      .prepare(
        `UPDATE challenge_rewards SET status='granted', attempts=attempts+?, last_error=NULL, granted_at=?, updated_at=?
         WHERE challenge_id=? AND round=? AND contributor_id=? AND status!='granted'`
      )
      .run(attempts, now, now, challengeId, round, contributorId);
  }

  markRewardFailed(
    challengeId: ChallengeId,
    round: number,
    contributorId: UserId,
    attempts: number,
    error: string,
    now = Date.now()
  ) {
    this.db
      .prepare(
        `UPDATE challenge_rewards SET status='failed', attempts=attempts+?, last_error=?, updated_at=?
         WHERE challenge_id=? AND round=? AND contributor_id=?`
      )
      .run(attempts, error, now, challengeId, round, contributorId);
  }

  // -- audit --------------------------------------------------------------

  logEvent(type: string, challengeId: ChallengeId | null, userId: UserId | null, payload: Record<string, unknown> = {}) {
    const now = Date.now();
    this.db
      .prepare('INSERT INTO events (event_id, challenge_id, user_id, type, payload_json, ts) VALUES (?,?,?,?,?,?)')
      .run(`${type}_${now}_${nanoid(6)}`, challengeId, userId, type, JSON.stringify(payload), now);
  }

  listEvents(challengeId: ChallengeId): { type: string; userId: string | null; payload: unknown; ts: number }[] {
    return this.db
      .prepare<{ type: string; user_id: string | null; payload_json: string; ts: number }>(
        'SELECT type, user_id, payload_json, ts FROM events WHERE challenge_id=? ORDER BY ts ASC, rowid ASC'
      )
      .all(challengeId)
      .map((row) => ({ type: row.type, userId: row.user_id, payload: JSON.parse(row.payload_json), ts: row.ts }));
  }
}
