// MARK: - Reminders Command
// Per-member opt-in for being named in task reminder notifications

import { ChatInputCommandInteraction, SlashCommandBuilder } from 'discord.js';
import type { CommandContext } from './types';
import { toParticipantProfile } from './task';
import { errorMessage } from '../utils/errors';
import { replyEphemeral } from '../utils/interactionCleanup';
import { logger } from '../utils/logger';

export const data = new SlashCommandBuilder()
  .setName('reminders')
  .setDescription('Choose whether task reminders mention you')
  .addSubcommand(sub =>
    sub
      .setName('on')
      .setDescription('Be mentioned in reminders for tasks assigned to you'),
  )
  .addSubcommand(sub =>
    sub
      .setName('off')
      .setDescription('Stop being mentioned in task reminders'),
  );

export function buildOptInMessage(enabled: boolean): string {
  return enabled
    ? '✅ You will be included in reminders for tasks assigned to you.'
    : '🔕 You will no longer be included in task reminders. Use `/reminders on` to opt back in.';
}

export async function execute(interaction: ChatInputCommandInteraction, context: CommandContext): Promise<void> {
  const enabled = interaction.options.getSubcommand(true) === 'on';

  try {
    await context.taskManager.setReminderOptIn(toParticipantProfile(interaction.user), enabled);
    await replyEphemeral(interaction, buildOptInMessage(enabled));
  } catch (error) {
    logger.error('Reminder opt-in update failed', {
      userId: interaction.user.id,
      enabled,
      error: errorMessage(error),
    });
    await replyEphemeral(interaction, '❌ Sorry, I could not update your reminder preference. Please try again.');
  }
}
