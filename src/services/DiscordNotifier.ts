// MARK: - Discord Notifier
// Delivers rendered reminder text to a task's Discord channel

import { Client, MessageCreateOptions } from 'discord.js';
import type { Notifier } from './reminders/types';
import { RateLimiter } from '../utils/rateLimiter';
import { logger } from '../utils/logger';

const SEND_SPACING_MS = 250;

type SendableChannel = { send: (options: MessageCreateOptions) => Promise<unknown> };

function isSendableChannel(channel: unknown): channel is SendableChannel {
  return typeof channel === 'object'
    && channel !== null
    && 'send' in channel
    && typeof channel.send === 'function';
}

export class DiscordNotifier implements Notifier {
  private readonly rateLimiter: RateLimiter;

  constructor(private readonly client: Client, spacingMs = SEND_SPACING_MS) {
    this.rateLimiter = new RateLimiter(spacingMs);
  }

  /**
   * Resolves false when the channel cannot receive messages; transport errors reject.
   * Mentions in the text ping only the listed users.
   */
  send(chatId: string, text: string, mentionUserIds: readonly string[]): Promise<boolean> {
    return this.rateLimiter.schedule(async () => {
      if (!this.client.isReady()) {
        logger.warn('Discord client not ready for reminder delivery', { chatId });
        return false;
      }

      const channel = await this.client.channels.fetch(chatId);
      if (!channel || !channel.isTextBased() || !isSendableChannel(channel)) {
        logger.warn('Reminder channel not found or not text-based', { chatId });
        return false;
      }

      await channel.send({
        content: text,
        allowedMentions: { users: [...mentionUserIds] },
      });
      return true;
    });
  }
}
