export type UserId = string;
export type ChallengeId = string;
export type ChannelId = string;

export const CHALLENGE_TYPES = ['collect', 'trade', 'craft', 'catch', 'donate'] as const;
export type ChallengeType = (typeof CHALLENGE_TYPES)[number];

export type ChallengeStatus = 'active' | 'completing' | 'completed';

export interface ChallengeSettings {
  enabled: boolean;
  announcementChannelId: ChannelId | null;
  updatedAt: number;
}

export interface Challenge {
  id: ChallengeId;
  name: string;
  description: string;
  challengeType: ChallengeType;
  targetAmount: number;
  rewardItem: string;
  rewardQuantity: number;
  enabled: boolean;
  status: ChallengeStatus;
  currentAmount: number;
  /** Bumped by every reset; reward records are scoped to it. */
  round: number;
  announcedAt: number | null;
  completionOwner: string | null;
  completionLeaseUntil: number | null;
  createdAt: number;
  updatedAt: number;
  completedAt: number | null;
}

export interface ContributionEntry {
  challengeId: ChallengeId;
  contributorId: UserId;
  amountContributed: number;
  firstContributedAt: number;
  lastContributedAt: number;
}

export type RewardStatus = 'pending' | 'granted' | 'failed';

export interface RewardRecord {
  challengeId: ChallengeId;
  round: number;
  contributorId: UserId;
  rewardItem: string;
  rewardQuantity: number;
  status: RewardStatus;
  attempts: number;
  lastError: string | null;
  updatedAt: number;
  grantedAt: number | null;
}

export interface ReportOutcome {
  challengeId: ChallengeId;
  accepted: boolean;
  newTotal: number;
  crossedThreshold: boolean;
  reason?: 'duplicate' | 'closed';
}

export interface ProgressSnapshot {
  currentAmount: number;
  targetAmount: number;
  status: ChallengeStatus;
}

export interface LeaderboardEntry {
  contributorId: UserId;
  amountContributed: number;
}

export type GrantResult = { ok: true } | { ok: false; reason: string; retryable?: boolean };

/**
 * Delivers a challenge reward to one contributor. `grantKey` is stable per
 * (challenge, round, contributor); implementations should treat a repeated key as
 * already delivered.
 */
export interface RewardDispatcher {
  grant(contributorId: UserId, rewardItem: string, rewardQuantity: number, grantKey: string): Promise<GrantResult>;
}

export interface Announcer {
  announce(channelId: ChannelId, challengeName: string, totalReached: number, contributorCount: number): Promise<void>;
}

export interface CompletionReport {
  challengeId: ChallengeId;
  contributorCount: number;
  granted: UserId[];
  alreadyGranted: UserId[];
  failed: { contributorId: UserId; error: string }[];
  announced: boolean;
  completed: boolean;
}

export function isChallengeType(value: string): value is ChallengeType {
  return CHALLENGE_TYPES.some((type) => type === value);
}
