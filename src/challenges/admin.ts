import type { ChallengeStore, ChallengePatch, NewChallenge } from './store.js';
import type { ProgressLedger } from './ledger.js';
import type { CompletionCoordinator } from './completion.js';
import { ValidationError, formatErrorForLogging } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import { CHALLENGE_TYPES, isChallengeType } from '../models.js';
import type { Challenge, ChallengeId, ChallengeSettings, ChallengeType } from '../models.js';

export interface ChallengeInput {
  name: string;
  description?: string;
  challengeType: ChallengeType;
  targetAmount: number;
  rewardItem: string;
  rewardQuantity?: number;
  enabled?: boolean;
}

const NAME_MAX = 64;
const DESCRIPTION_MAX = 256;
const REWARD_ITEM_MAX = 64;

function checkName(name: string) {
  const trimmed = name.trim();
  if (!trimmed || trimmed.length > NAME_MAX) {
    throw new ValidationError(`name must be 1-${NAME_MAX} characters`, 'name', name);
  }
  return trimmed;
}

function checkDescription(description: string) {
  if (description.length > DESCRIPTION_MAX) {
    throw new ValidationError(`description must be at most ${DESCRIPTION_MAX} characters`, 'description', description);
  }
  return description.trim();
}

function checkType(type: ChallengeType) {
  if (!isChallengeType(type)) {
    throw new ValidationError(`challenge type must be one of ${CHALLENGE_TYPES.join(', ')}`, 'challengeType', type);
  }
  return type;
}

function checkTarget(target: number) {
  if (!Number.isSafeInteger(target) || target <= 0) {
    throw new ValidationError('target amount must be a positive integer', 'targetAmount', target);
  }
  return target;
}

function checkRewardItem(item: string) {
  const trimmed = item.trim();
  if (!trimmed || trimmed.length > REWARD_ITEM_MAX) {
    throw new ValidationError(`reward item must be 1-${REWARD_ITEM_MAX} characters`, 'rewardItem', item);
  }
  return trimmed;
}

function checkRewardQuantity(quantity: number) {
  if (!Number.isSafeInteger(quantity) || quantity < 0) {
    throw new ValidationError('reward quantity must be a non-negative integer', 'rewardQuantity', quantity);
  }
  return quantity;
}

function validatePatch(patch: ChallengePatch): ChallengePatch {
  const clean: ChallengePatch = {};
  if (patch.name !== undefined) clean.name = checkName(patch.name);
  if (patch.description !== undefined) clean.description = checkDescription(patch.description);
  if (patch.challengeType !== undefined) clean.challengeType = checkType(patch.challengeType);
  if (patch.targetAmount !== undefined) clean.targetAmount = checkTarget(patch.targetAmount);
  if (patch.rewardItem !== undefined) clean.rewardItem = checkRewardItem(patch.rewardItem);
  if (patch.rewardQuantity !== undefined) clean.rewardQuantity = checkRewardQuantity(patch.rewardQuantity);
  if (patch.enabled !== undefined) clean.enabled = patch.enabled;
  return clean;
}

/** The operations the admin configuration surface calls. */
export class ChallengeAdmin {
  constructor(
    private readonly store: ChallengeStore,
    private readonly ledger: ProgressLedger,
    private readonly completion: CompletionCoordinator
  ) {}

  createChallenge(input: ChallengeInput): Challenge {
    const record: NewChallenge = {
      name: checkName(input.name),
      description: checkDescription(input.description ?? ''),
      challengeType: checkType(input.challengeType),
      targetAmount: checkTarget(input.targetAmount),
      rewardItem: checkRewardItem(input.rewardItem),
      rewardQuantity: checkRewardQuantity(input.rewardQuantity ?? 0),
      enabled: input.enabled ?? true,
    };
    const challenge = this.store.insertChallenge(record);
    this.store.logEvent('challenge_created', challenge.id, null, { ...record });
    logger.info('Challenge created', { challengeId: challenge.id, name: challenge.name, target: challenge.targetAmount });
    return challenge;
  }

  /**
   * Edits a challenge definition. Lowering the target of an active challenge to or below its
   * current progress starts completion right away.
   */
  updateChallenge(challengeId: ChallengeId, patch: ChallengePatch): Challenge {
    const clean = validatePatch(patch);
    const updated = this.store.transaction(() => {
      this.requireNotCompleting(challengeId, 'updated');
      this.store.updateChallenge(challengeId, clean);
      return this.require(challengeId);
    });
    this.store.logEvent('challenge_updated', challengeId, null, { ...clean });
    this.completeIfDue(updated);
    return updated;
  }

  setEnabled(challengeId: ChallengeId, enabled: boolean): Challenge {
    const updated = this.store.transaction(() => {
      this.require(challengeId);
      this.store.updateChallenge(challengeId, { enabled });
      return this.require(challengeId);
    });
    this.store.logEvent(enabled ? 'challenge_enabled' : 'challenge_disabled', challengeId, null);
    this.completeIfDue(updated);
    return updated;
  }

  /**
   * Reopens a challenge: progress back to zero, every ledger entry and remembered report key
   * gone, status `active`, and a new reward round so the next completion grants again.
   */
  resetChallenge(challengeId: ChallengeId): Challenge {
    const { before, after } = this.store.transaction(() => {
      const previous = this.requireNotCompleting(challengeId, 'reset');
      this.ledger.clear(challengeId);
      this.store.resetChallengeRow(challengeId);
      return { before: previous, after: this.require(challengeId) };
    });
    this.store.logEvent('challenge_reset', challengeId, null, {
      previousStatus: before.status,
      previousTotal: before.currentAmount,
      previousRound: before.round,
    });
    logger.info('Challenge reset', { challengeId, previousTotal: before.currentAmount, round: after.round });
    return after;
  }

  deleteChallenge(challengeId: ChallengeId): boolean {
    const deleted = this.store.transaction(() => {
      this.requireNotCompleting(challengeId, 'deleted');
      return this.store.deleteChallenge(challengeId);
    });
    if (deleted) logger.info('Challenge deleted', { challengeId });
    return deleted;
  }

  updateSettings(patch: { enabled?: boolean; announcementChannelId?: string | null }): ChallengeSettings {
    const clean: { enabled?: boolean; announcementChannelId?: string | null } = {};
    if (patch.enabled !== undefined) clean.enabled = patch.enabled;
    if (patch.announcementChannelId !== undefined) {
      const channel = patch.announcementChannelId?.trim() ?? '';
      if (channel && !/^\d{5,25}$/.test(channel)) {
        throw new ValidationError('announcement channel must be a channel id', 'announcementChannelId', channel);
      }
      clean.announcementChannelId = channel || null;
    }
    const settings = this.store.saveSettings(clean);
    this.store.logEvent('challenge_settings_updated', null, null, { ...clean });
    return settings;
  }

  private completeIfDue(challenge: Challenge) {
    if (challenge.status !== 'active' || !challenge.enabled) return;
    if (challenge.currentAmount < challenge.targetAmount) return;
    this.completion.trigger(challenge.id).catch((error) => {
      logger.error('Completion after admin change failed', formatErrorForLogging(error, { challengeId: challenge.id }));
    });
  }

  private require(challengeId: ChallengeId): Challenge {
    const challenge = this.store.getChallenge(challengeId);
    if (!challenge) {
      throw new ValidationError(`unknown challenge ${challengeId}`, 'challengeId', challengeId);
    }
    return challenge;
  }

  private requireNotCompleting(challengeId: ChallengeId, action: string): Challenge {
    const challenge = this.require(challengeId);
    if (challenge.status === 'completing') {
      throw new ValidationError(`challenge cannot be ${action} while its completion is in progress`, 'status', challenge.status);
    }
    return challenge;
  }
}
