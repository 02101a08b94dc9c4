// MARK: - Task Command
// Create, list, update, and delete group tasks and edit their reminder offsets

import {
  ChatInputCommandInteraction,
  PermissionFlagsBits,
  SlashCommandBuilder,
  User,
} from 'discord.js';
import type { CommandContext } from './types';
import type { TaskListFilter } from '../services/TaskManager';
import type { ParticipantProfile, TaskRecord } from '../services/TaskStore';
import { describeReminderOffsets, formatDueAt } from '../services/reminders/composer';
import { parseReminderOffsetList } from '../services/reminders/offsets';
import { TASK_STATUSES, TaskStatus } from '../services/reminders/types';
import { errorMessage, InvalidReminderOffsetError, TaskValidationError } from '../utils/errors';
import { replyEphemeral } from '../utils/interactionCleanup';
import { logger } from '../utils/logger';

const ASSIGNEE_OPTIONS = ['assignee', 'assignee2', 'assignee3'] as const;
const LIST_FILTERS: readonly TaskListFilter[] = ['open', 'all', ...TASK_STATUSES];
const DUE_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{1,2}):(\d{2})(?:\s*(?:UTC|Z))?$/i;

export const data = new SlashCommandBuilder()
  .setName('task')
  .setDescription('Track group tasks and get reminded before they are due')
  .addSubcommand(sub =>
    sub
      .setName('add')
      .setDescription('Create a task for this channel')
      .addStringOption(option =>
        option
          .setName('name')
          .setDescription('What needs to get done?')
          .setRequired(true)
          .setMaxLength(200),
      )
      .addStringOption(option =>
        option
          .setName('due')
          .setDescription('Deadline in UTC, e.g. 2025-10-25 15:00')
          .setRequired(true),
      )
      .addUserOption(option =>
        option
          .setName('assignee')
          .setDescription('Who is responsible')
          .setRequired(true),
      )
      .addUserOption(option =>
        option
          .setName('assignee2')
          .setDescription('Another assignee')
          .setRequired(false),
      )
      .addUserOption(option =>
        option
          .setName('assignee3')
          .setDescription('Another assignee')
          .setRequired(false),
      )
      .addStringOption(option =>
        option
          .setName('reminders')
          .setDescription('Minutes before the deadline, e.g. 60,30,15 or off (default 30)')
          .setRequired(false),
      ),
  )
  .addSubcommand(sub =>
    sub
      .setName('list')
      .setDescription('List tasks assigned to you or another member')
      .addStringOption(option =>
        option
          .setName('status')
          .setDescription('Filter by status')
          .setRequired(false)
          .addChoices(
            { name: 'Open', value: 'open' },
            { name: 'New', value: 'NEW' },
            { name: 'In progress', value: 'IN_PROGRESS' },
            { name: 'Done', value: 'DONE' },
            { name: 'All', value: 'all' },
          ),
      )
      .addUserOption(option =>
        option
          .setName('member')
          .setDescription('Show tasks for this member instead of yourself')
          .setRequired(false),
      ),
  )
  .addSubcommand(sub =>
    sub
      .setName('status')
      .setDescription('Update the status of a task')
      .addStringOption(option =>
        option
          .setName('code')
          .setDescription('Task code, e.g. TK0001')
          .setRequired(true),
      )
      .addStringOption(option =>
        option
          .setName('status')
          .setDescription('New status')
          .setRequired(true)
          .addChoices(
            { name: 'New', value: 'NEW' },
            { name: 'In progress', value: 'IN_PROGRESS' },
            { name: 'Done', value: 'DONE' },
          ),
      ),
  )
  .addSubcommand(sub =>
    sub
      .setName('delete')
      .setDescription('Delete a task and all of its reminders')
      .addStringOption(option =>
        option
          .setName('code')
          .setDescription('Task code, e.g. TK0001')
          .setRequired(true),
      ),
  )
  .addSubcommand(sub =>
    sub
      .setName('reminders')
      .setDescription('Replace the reminder times of a task')
      .addStringOption(option =>
        option
          .setName('code')
          .setDescription('Task code, e.g. TK0001')
          .setRequired(true),
      )
      .addStringOption(option =>
        option
          .setName('times')
          .setDescription('Minutes before the deadline, e.g. 60,30,15, or off')
          .setRequired(true),
      ),
  );

/**
 * Parses `YYYY-MM-DD HH:MM` (optionally suffixed with UTC/Z) as a UTC instant.
 */
export function parseDueDate(raw: string): Date | null {
  const match = raw.trim().match(DUE_DATE_PATTERN);
  if (!match) {
    return null;
  }

  const [year, month, day, hour, minute] = match.slice(1, 6).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute));

  if (
    date.getUTCFullYear() !== year
    || date.getUTCMonth() !== month - 1
    || date.getUTCDate() !== day
    || date.getUTCHours() !== hour
    || date.getUTCMinutes() !== minute
  ) {
    return null;
  }

  return date;
}

export function isTaskStatus(value: string | null): value is TaskStatus {
  return value !== null && TASK_STATUSES.some(status => status === value);
}

function isListFilter(value: string | null): value is TaskListFilter {
  return value !== null && LIST_FILTERS.some(filter => filter === value);
}

export function toParticipantProfile(user: User): ParticipantProfile {
  return {
    userId: user.id,
    handle: user.username,
    displayName: user.globalName ?? undefined,
  };
}

export function buildTaskCreatedMessage(task: TaskRecord, offsets: readonly number[]): string {
  const assignees = task.assigneeIds.length > 0
    ? task.assigneeIds.map(id => `<@${id}>`).join(', ')
    : '(unassigned)';
  const reminderLine = offsets.length > 0
    ? `🔔 **Reminders:** ${describeReminderOffsets(offsets)} before`
    : '🔕 **Reminders:** off';

  return [
    '✅ **Task Created!**',
    '',
    `📋 **Task:** ${task.name}`,
    `🔢 **Task Code:** ${task.code}`,
    `👥 **Assigned to:** ${assignees}`,
    `⏰ **Due:** ${formatDueAt(task.dueAt)}`,
    reminderLine,
  ].join('\n');
}

export function buildRemindersUpdatedMessage(task: Pick<TaskRecord, 'name' | 'code'>, offsets: readonly number[]): string {
  if (offsets.length === 0) {
    return `🔕 Reminders turned off for **${task.name}** (\`${task.code}\`).`;
  }
  return `🔔 Reminders for **${task.name}** (\`${task.code}\`) set to ${describeReminderOffsets(offsets)} before the deadline.`;
}

function canManageTasks(interaction: ChatInputCommandInteraction): boolean {
  return interaction.memberPermissions?.has(PermissionFlagsBits.ManageMessages) ?? false;
}

async function handleAdd(interaction: ChatInputCommandInteraction, guildId: string, context: CommandContext): Promise<void> {
  if (!canManageTasks(interaction)) {
    await replyEphemeral(interaction, '⚠️ Only members who can manage messages may create tasks.');
    return;
  }

  const name = interaction.options.getString('name', true);
  const dueAt = parseDueDate(interaction.options.getString('due', true));
  if (!dueAt) {
    await replyEphemeral(
      interaction,
      '❌ I could not read that due date. Use `YYYY-MM-DD HH:MM` in UTC, for example `2025-10-25 15:00`.',
    );
    return;
  }

  const remindersRaw = interaction.options.getString('reminders');
  const reminderOffsets = remindersRaw === null ? undefined : parseReminderOffsetList(remindersRaw);

  const assignees = ASSIGNEE_OPTIONS
    .map(option => interaction.options.getUser(option))
    .filter((user): user is User => user !== null);

  await context.taskManager.registerParticipants(assignees.map(toParticipantProfile));

  const { task, reminders } = await context.taskManager.addTask({
    guildId,
    channelId: interaction.channelId,
    name,
    dueAt,
    assigneeIds: assignees.map(user => user.id),
    createdBy: interaction.user.id,
    reminderOffsets,
  });

  await interaction.reply({
    content: buildTaskCreatedMessage(task, reminders.map(reminder => reminder.offsetMinutes)),
    allowedMentions: { users: task.assigneeIds },
  });
}

async function handleList(interaction: ChatInputCommandInteraction, guildId: string, context: CommandContext): Promise<void> {
  const rawFilter = interaction.options.getString('status');
  const filter: TaskListFilter = isListFilter(rawFilter) ? rawFilter : 'open';
  const member = interaction.options.getUser('member') ?? interaction.user;

  const entries = await context.taskManager.listTasksForUser(guildId, member.id, filter);
  const header = `📋 Tasks for <@${member.id}> (${filter})`;

  await replyEphemeral(interaction, `${header}\n\n${context.taskManager.formatTasks(entries)}`);
}

async function handleStatus(interaction: ChatInputCommandInteraction, guildId: string, context: CommandContext): Promise<void> {
  const code = interaction.options.getString('code', true);
  const status = interaction.options.getString('status', true);

  if (!isTaskStatus(status)) {
    await replyEphemeral(interaction, '❌ Status must be one of NEW, IN_PROGRESS, or DONE.');
    return;
  }

  const task = await context.taskManager.updateStatus(guildId, code, status);
  if (!task) {
    await replyEphemeral(interaction, `❌ No task with code \`${code}\` exists in this server.`);
    return;
  }

  await replyEphemeral(interaction, `✅ \`${task.code}\` **${task.name}** is now ${task.status}.`);
}

async function handleDelete(interaction: ChatInputCommandInteraction, guildId: string, context: CommandContext): Promise<void> {
  if (!canManageTasks(interaction)) {
    await replyEphemeral(interaction, '⚠️ Only members who can manage messages may delete tasks.');
    return;
  }

  const code = interaction.options.getString('code', true);
  const task = await context.taskManager.deleteTask(guildId, code);
  if (!task) {
    await replyEphemeral(interaction, `❌ No task with code \`${code}\` exists in this server.`);
    return;
  }

  await replyEphemeral(interaction, `🗑️ Deleted \`${task.code}\` **${task.name}** and its reminders.`);
}

async function handleReminders(interaction: ChatInputCommandInteraction, guildId: string, context: CommandContext): Promise<void> {
  const code = interaction.options.getString('code', true);
  const offsets = parseReminderOffsetList(interaction.options.getString('times', true));

  const result = await context.taskManager.editReminders(guildId, code, offsets);
  if (!result) {
    await replyEphemeral(interaction, `❌ No task with code \`${code}\` exists in this server.`);
    return;
  }

  await replyEphemeral(
    interaction,
    buildRemindersUpdatedMessage(result.task, result.reminders.map(reminder => reminder.offsetMinutes)),
  );
}

export async function execute(interaction: ChatInputCommandInteraction, context: CommandContext): Promise<void> {
  const guildId = interaction.guildId;
  if (!guildId) {
    await replyEphemeral(interaction, '❌ This command is only available inside a server.');
    return;
  }

  const sub = interaction.options.getSubcommand(true);

  try {
    switch (sub) {
      case 'add':
        await handleAdd(interaction, guildId, context);
        return;
      case 'list':
        await handleList(interaction, guildId, context);
        return;
      case 'status':
        await handleStatus(interaction, guildId, context);
        return;
      case 'delete':
        await handleDelete(interaction, guildId, context);
        return;
      case 'reminders':
        await handleReminders(interaction, guildId, context);
        return;
      default:
        await replyEphemeral(interaction, '❌ Unknown task subcommand.');
    }
  } catch (error) {
    if (error instanceof TaskValidationError || error instanceof InvalidReminderOffsetError) {
      await replyEphemeral(interaction, `⚠️ ${error.message}`);
      return;
    }

    logger.error('Task command failed', {
      guildId,
      userId: interaction.user.id,
      sub,
      error: errorMessage(error),
    });

    await replyEphemeral(interaction, '❌ Something went wrong while processing your task command. Please try again later.');
  }
}
