import type { Client } from 'discord.js';
import { AnnouncementError } from '../utils/errorhandler.js';
import { buildCompletionEmbed } from '../ui/challenges.js';
import type { Announcer, ChannelId } from '../models.js';

export class DiscordAnnouncer implements Announcer {
  constructor(private readonly client: Client) {}

  async announce(channelId: ChannelId, challengeName: string, totalReached: number, contributorCount: number): Promise<void> {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isSendable()) {
      throw new AnnouncementError(`Channel ${channelId} cannot receive messages`, channelId);
    }
    await channel.send({ embeds: [buildCompletionEmbed(challengeName, totalReached, contributorCount)] });
  }
}
