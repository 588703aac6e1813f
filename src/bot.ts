import {
  Client,
  GatewayIntentBits,
  Events,
  SlashCommandBuilder,
  REST,
  Routes,
  type ChatInputCommandInteraction,
  type Interaction,
} from 'discord.js';
import { CFG } from './config.js';
import type { ChallengeSystem } from './challenges/index.js';
import { CHALLENGE_TYPES, isChallengeType } from './models.js';
import { PermissionError, ValidationError, formatErrorForLogging, formatErrorForUser } from './utils/errorhandler.js';
import { logger } from './utils/logger.js';
import {
  buildChallengesEmbed,
  buildLeaderboardEmbed,
  buildProgressEmbed,
  formatRewardAudit,
} from './ui/challenges.js';

const TYPE_CHOICES = CHALLENGE_TYPES.map((type) => ({ name: type, value: type }));

export function commandDefinitions() {
  return [
    new SlashCommandBuilder().setName('challenges').setDescription('List active community challenges').toJSON(),
    new SlashCommandBuilder()
      .setName('challenge')
      .setDescription('Community challenge details')
      .addSubcommand((s) =>
        s
          .setName('progress')
          .setDescription('Show progress toward a challenge')
          .addStringOption((o) => o.setName('id').setDescription('Challenge id').setRequired(true))
      )
      .addSubcommand((s) =>
        s
          .setName('leaderboard')
          .setDescription('Top contributors for a challenge')
          .addStringOption((o) => o.setName('id').setDescription('Challenge id').setRequired(true))
          .addIntegerOption((o) => o.setName('limit').setDescription('How many').setMinValue(1).setMaxValue(25))
      )
      .toJSON(),
    new SlashCommandBuilder()
      .setName('challenge_admin')
      .setDescription('Manage community challenges (owner only)')
      .addSubcommand((s) =>
        s
          .setName('create')
          .setDescription('Create a challenge')
          .addStringOption((o) => o.setName('name').setDescription('Display name').setRequired(true).setMaxLength(64))
          .addStringOption((o) =>
            o.setName('type').setDescription('Action that counts').setRequired(true).addChoices(...TYPE_CHOICES)
          )
          .addIntegerOption((o) => o.setName('target').setDescription('Community target').setRequired(true).setMinValue(1))
          .addStringOption((o) => o.setName('reward_item').setDescription('Reward item key').setRequired(true))
          .addIntegerOption((o) => o.setName('reward_quantity').setDescription('Per contributor').setMinValue(0))
          .addStringOption((o) => o.setName('description').setDescription('Short description').setMaxLength(256))
      )
      .addSubcommand((s) =>
        s
          .setName('target')
          .setDescription('Change a challenge target')
          .addStringOption((o) => o.setName('id').setDescription('Challenge id').setRequired(true))
          .addIntegerOption((o) => o.setName('amount').setDescription('New target').setRequired(true).setMinValue(1))
      )
      .addSubcommand((s) =>
        s
          .setName('enable')
          .setDescription('Enable a challenge')
          .addStringOption((o) => o.setName('id').setDescription('Challenge id').setRequired(true))
      )
      .addSubcommand((s) =>
        s
          .setName('disable')
          .setDescription('Disable a challenge')
          .addStringOption((o) => o.setName('id').setDescription('Challenge id').setRequired(true))
      )
      .addSubcommand((s) =>
        s
          .setName('reset')
          .setDescription('Clear progress and reopen a challenge')
          .addStringOption((o) => o.setName('id').setDescription('Challenge id').setRequired(true))
      )
      .addSubcommand((s) =>
        s
          .setName('delete')
          .setDescription('Delete a challenge')
          .addStringOption((o) => o.setName('id').setDescription('Challenge id').setRequired(true))
      )
      .addSubcommand((s) =>
        s
          .setName('add_progress')
          .setDescription('Credit progress to a player by hand')
          .addStringOption((o) => o.setName('id').setDescription('Challenge id').setRequired(true))
          .addUserOption((o) => o.setName('user').setDescription('Contributor').setRequired(true))
          .addIntegerOption((o) => o.setName('amount').setDescription('Amount').setRequired(true).setMinValue(1))
      )
      .addSubcommand((s) =>
        s
          .setName('settings')
          .setDescription('Global challenge settings')
          .addBooleanOption((o) => o.setName('enabled').setDescription('Master switch'))
          .addChannelOption((o) => o.setName('channel').setDescription('Announcement channel'))
          .addBooleanOption((o) => o.setName('clear_channel').setDescription('Turn announcements off'))
      )
      .addSubcommand((s) =>
        s
          .setName('audit')
          .setDescription('Reward delivery status for a challenge')
          .addStringOption((o) => o.setName('id').setDescription('Challenge id').setRequired(true))
      )
      .toJSON(),
  ];
}

async function handlePlayerCommand(i: ChatInputCommandInteraction, system: ChallengeSystem) {
  if (i.commandName === 'challenges') {
    const active = system.query.listActive();
    if (!active.length) {
      return i.reply({ ephemeral: true, content: 'There are no active community challenges at the moment.' });
    }
    return i.reply({ embeds: [buildChallengesEmbed(active)] });
  }

  const id = i.options.getString('id', true);
  const challenge = system.query.getChallenge(id);
  if (!challenge.enabled) {
    throw new ValidationError(`challenge ${id} is not available`, 'challengeId', id);
  }
  if (i.options.getSubcommand() === 'leaderboard') {
    const limit = i.options.getInteger('limit') ?? CFG.leaderboardSize;
    return i.reply({ embeds: [buildLeaderboardEmbed(challenge, system.query.getLeaderboard(id, limit))] });
  }
  return i.reply({ embeds: [buildProgressEmbed(challenge, system.query.getProgress(id))] });
}

async function handleAdminCommand(i: ChatInputCommandInteraction, system: ChallengeSystem) {
  if (i.user.id !== CFG.ownerId) {
    throw new PermissionError('challenge_admin is owner only', 'owner', i.user.id);
  }
  const { admin, engine, query } = system;
  const sub = i.options.getSubcommand();

  switch (sub) {
    case 'create': {
      const type = i.options.getString('type', true);
      if (!isChallengeType(type)) throw new ValidationError(`unknown challenge type "${type}"`, 'type', type);
      const created = admin.createChallenge({
        name: i.options.getString('name', true),
        challengeType: type,
        targetAmount: i.options.getInteger('target', true),
        rewardItem: i.options.getString('reward_item', true),
        rewardQuantity: i.options.getInteger('reward_quantity') ?? 0,
        description: i.options.getString('description') ?? '',
      });
      return i.reply({ ephemeral: true, content: `Created **${created.name}** (\`${created.id}\`).` });
    }
    case 'target': {
      const updated = admin.updateChallenge(i.options.getString('id', true), {
        targetAmount: i.options.getInteger('amount', true),
      });
      return i.reply({ ephemeral: true, content: `Target for **${updated.name}** is now ${updated.targetAmount}.` });
    }
    case 'enable':
    case 'disable': {
      const updated = admin.setEnabled(i.options.getString('id', true), sub === 'enable');
      return i.reply({ ephemeral: true, content: `**${updated.name}** is now ${updated.enabled ? 'enabled' : 'disabled'}.` });
    }
    case 'reset': {
      const reset = admin.resetChallenge(i.options.getString('id', true));
      return i.reply({ ephemeral: true, content: `**${reset.name}** was reset (round ${reset.round}).` });
    }
    case 'delete': {
      const id = i.options.getString('id', true);
      const deleted = admin.deleteChallenge(id);
      return i.reply({ ephemeral: true, content: deleted ? `Deleted \`${id}\`.` : `No challenge \`${id}\`.` });
    }
    case 'add_progress': {
      const who = i.options.getUser('user', true);
      // The interaction id is unique per invocation, so a redelivered interaction is not double counted.
      const outcome = engine.reportProgress(
        i.options.getString('id', true),
        who.id,
        i.options.getInteger('amount', true),
        `interaction:${i.id}`
      );
      const content = outcome.accepted
        ? `Credited ${who.tag}. Total is now ${outcome.newTotal}.${outcome.crossedThreshold ? ' 🎉 Target reached!' : ''}`
        : `Not credited (${outcome.reason ?? 'rejected'}).`;
      return i.reply({ ephemeral: true, content });
    }
    case 'settings': {
      const channel = i.options.getChannel('channel');
      const clearChannel = i.options.getBoolean('clear_channel') ?? false;
      const settings = admin.updateSettings({
        enabled: i.options.getBoolean('enabled') ?? undefined,
        announcementChannelId: clearChannel ? null : channel?.id,
      });
      const where = settings.announcementChannelId ? `<#${settings.announcementChannelId}>` : 'off';
      return i.reply({
        ephemeral: true,
        content: `Challenges ${settings.enabled ? 'enabled' : 'disabled'}; announcements: ${where}.`,
      });
    }
    case 'audit': {
      const audit = query.getRewardAudit(i.options.getString('id', true));
      return i.reply({ ephemeral: true, content: formatRewardAudit(audit) });
    }
    default:
      throw new ValidationError(`unknown subcommand ${sub}`, 'subcommand', sub);
  }
}

async function registerSlash() {
  const rest = new REST({ version: '10' }).setToken(CFG.token);
  try {
    await rest.put(Routes.applicationCommands(CFG.clientId), { body: commandDefinitions() });
    logger.info('Slash commands registered.');
  } catch (e) {
    logger.error('Slash command registration failed', formatErrorForLogging(e));
  }
}

export function createClient(): Client {
  return new Client({ intents: [GatewayIntentBits.Guilds] });
}

/** Wires commands and startup onto `client`. The returned function stops maintenance and logs out. */
export function attachBot(client: Client, system: ChallengeSystem): () => Promise<void> {
  let stopMaintenance: (() => void) | undefined;

  client.once(Events.ClientReady, async (c: Client<true>) => {
    logger.info(`Logged in as ${c.user.tag}`);
    await registerSlash();
    // Recovery needs the client: resumed workflows may announce.
    stopMaintenance = system.startMaintenance(CFG.recoveryIntervalMs);
  });

  client.on(Events.InteractionCreate, async (i: Interaction) => {
    if (!i.isChatInputCommand()) return;
    try {
      if (i.commandName === 'challenge_admin') {
        await handleAdminCommand(i, system);
      } else if (i.commandName === 'challenges' || i.commandName === 'challenge') {
        await handlePlayerCommand(i, system);
      }
    } catch (error) {
      logger.warn('Command failed', formatErrorForLogging(error, { command: i.commandName, userId: i.user.id }));
      const content = formatErrorForUser(error);
      try {
        if (i.replied || i.deferred) {
          await i.followUp({ ephemeral: true, content });
        } else {
          await i.reply({ ephemeral: true, content });
        }
      } catch (replyError) {
        logger.error('Failed to report command error', formatErrorForLogging(replyError));
      }
    }
  });

  return async () => {
    stopMaintenance?.();
    await system.completion.drain();
    await client.destroy();
  };
}
