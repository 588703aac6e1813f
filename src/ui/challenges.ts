import { EmbedBuilder } from 'discord.js';
import type { Challenge, LeaderboardEntry, ProgressSnapshot } from '../models.js';
import type { RewardAudit } from '../challenges/query.js';

const BAR_WIDTH = 10;
const MEDALS = ['🥇', '🥈', '🥉'];

// `[█████░░░░░] 50% (50/100)`
export function renderProgressBar(current: number, target: number): string {
  const ratio = target > 0 ? Math.min(current / target, 1) : 0;
  const filled = Math.floor(BAR_WIDTH * ratio);
  const bar = '█'.repeat(filled) + '░'.repeat(BAR_WIDTH - filled);
  return `\`[${bar}]\` ${Math.floor(ratio * 100)}% (${current.toLocaleString('en-US')}/${target.toLocaleString('en-US')})`;
}

export function formatReward(challenge: Pick<Challenge, 'rewardItem' | 'rewardQuantity'>): string {
  if (challenge.rewardQuantity <= 0) return 'No item reward';
  return `${challenge.rewardQuantity}× ${challenge.rewardItem} for every contributor`;
}

export function formatLeaderboardLines(entries: LeaderboardEntry[]): string[] {
  return entries.map((entry, ix) => {
    const rank = MEDALS[ix] ?? `**${ix + 1}.**`;
    return `${rank} <@${entry.contributorId}> — ${entry.amountContributed.toLocaleString('en-US')}`;
  });
}

export function buildChallengesEmbed(challenges: Challenge[]): EmbedBuilder {
  const embed = new EmbedBuilder().setTitle('Community Challenges').setColor(0x3498db);
  for (const challenge of challenges.slice(0, 25)) {
    const status = challenge.status === 'completing' ? ' (completing…)' : '';
    const lines = [
      challenge.description || null,
      `Type: **${challenge.challengeType}** · Reward: ${formatReward(challenge)}`,
      renderProgressBar(challenge.currentAmount, challenge.targetAmount),
      `ID: \`${challenge.id}\``,
    ].filter((line): line is string => line !== null);
    embed.addFields({ name: `${challenge.name}${status}`, value: lines.join('\n') });
  }
  return embed;
}

export function buildProgressEmbed(challenge: Challenge, progress: ProgressSnapshot): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(challenge.name)
    .setColor(progress.status === 'completed' ? 0x2ecc71 : 0x3498db)
    .setDescription(
      [
        renderProgressBar(progress.currentAmount, progress.targetAmount),
        `Status: **${progress.status}**`,
        `Reward: ${formatReward(challenge)}`,
      ].join('\n')
    );
}

export function buildLeaderboardEmbed(challenge: Challenge, entries: LeaderboardEntry[]): EmbedBuilder {
  const lines = formatLeaderboardLines(entries);
  return new EmbedBuilder()
    .setTitle(`${challenge.name} — Top Contributors`)
    .setColor(0xf1c40f)
    .setDescription(lines.length ? lines.join('\n') : 'No contributions yet.');
}

export function buildCompletionEmbed(challengeName: string, totalReached: number, contributorCount: number): EmbedBuilder {
  const players = contributorCount === 1 ? 'player' : 'players';
  return new EmbedBuilder()
    .setTitle('🎉 Community Challenge Complete!')
    .setColor(0x2ecc71)
    .setDescription(
      `**${challengeName}** reached **${totalReached.toLocaleString('en-US')}** thanks to ${contributorCount} ${players}. Rewards are on their way!`
    );
}

export function formatRewardAudit(audit: RewardAudit): string {
  const granted = audit.records.filter((record) => record.status === 'granted').length;
  const pending = audit.records.filter((record) => record.status === 'pending').length;
  const header = `Round ${audit.round}: ${granted} granted, ${pending} pending, ${audit.failed.length} failed`;
  const failures = audit.failed.map(
    (record) => `• <@${record.contributorId}> after ${record.attempts} attempt(s): ${record.lastError ?? 'unknown error'}`
  );
  return [header, ...failures].join('\n');
}
