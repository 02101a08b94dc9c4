// MARK: - Interaction Cleanup Utilities
// Ephemeral command replies that remove themselves after a TTL

import {
  InteractionReplyOptions,
  MessageFlags,
  RepliableInteraction,
} from 'discord.js';
import { errorMessage } from './errors';
import { logger } from './logger';

const DEFAULT_TTL_MS = 30_000;
const cleanupTimers = new WeakMap<RepliableInteraction, NodeJS.Timeout>();

export function scheduleInteractionCleanup(interaction: RepliableInteraction, ttlMs = DEFAULT_TTL_MS): void {
  const existing = cleanupTimers.get(interaction);
  if (existing) {
    clearTimeout(existing);
  }

  const timeout = setTimeout(() => {
    cleanupTimers.delete(interaction);
    // The reply may already be gone (dismissed by the user or expired token).
    interaction.deleteReply().catch(error => {
      logger.debug('Ephemeral reply cleanup skipped', { error: errorMessage(error) });
    });
  }, ttlMs);

  timeout.unref();
  cleanupTimers.set(interaction, timeout);
}

/**
 * Replies (or edits a deferred reply) ephemerally and schedules its removal.
 */
export async function replyEphemeral(
  interaction: RepliableInteraction,
  content: string,
  ttlMs = DEFAULT_TTL_MS,
): Promise<void> {
  if (interaction.deferred || interaction.replied) {
    await interaction.editReply({ content });
  } else {
    const options: InteractionReplyOptions = { content, flags: MessageFlags.Ephemeral };
    await interaction.reply(options);
  }
  scheduleInteractionCleanup(interaction, ttlMs);
}
