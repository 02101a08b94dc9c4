// MARK: - Reminder Composer
// Filters opted-in assignees and renders the reminder notification text

import type { ReminderAssignee, ReminderTaskSnapshot } from './types';

export function selectRecipients(assignees: readonly ReminderAssignee[]): ReminderAssignee[] {
  return assignees.filter(assignee => assignee.optedIn === true);
}

export function formatRecipient(assignee: ReminderAssignee): string {
  const handle = assignee.handle?.trim();
  if (handle) {
    return handle.startsWith('@') ? handle : `@${handle}`;
  }

  const displayName = assignee.displayName?.trim();
  if (displayName) {
    return displayName;
  }

  return `User ${assignee.id}`;
}

/**
 * Pings the assignee and keeps the handle or display name readable,
 * e.g. `<@111> (@alice)`.
 */
export function formatRecipientMention(assignee: ReminderAssignee): string {
  const mention = `<@${assignee.id}>`;
  if (assignee.handle?.trim() || assignee.displayName?.trim()) {
    return `${mention} (${formatRecipient(assignee)})`;
  }
  return mention;
}

export function formatReminderOffset(offsetMinutes: number): string {
  if (offsetMinutes === 60) {
    return '1 hour';
  }
  if (offsetMinutes === 30) {
    return '30 minutes';
  }
  return `${offsetMinutes} minutes`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats an instant as `YYYY-MM-DD HH:MM UTC`.
 */
export function formatDueAt(dueAt: Date): string {
  const date = `${dueAt.getUTCFullYear()}-${pad(dueAt.getUTCMonth() + 1)}-${pad(dueAt.getUTCDate())}`;
  const time = `${pad(dueAt.getUTCHours())}:${pad(dueAt.getUTCMinutes())}`;
  return `${date} ${time} UTC`;
}

export function buildTaskReminderMessage(
  task: Pick<ReminderTaskSnapshot, 'name' | 'code' | 'dueAt'>,
  recipients: readonly ReminderAssignee[],
  offsetMinutes: number,
): string {
  const timestamp = Math.floor(task.dueAt.getTime() / 1000);

  const lines: string[] = [
    '🔔 **Task Reminder**',
    '',
    `📋 **Task:** ${task.name}`,
    `🔢 **Task Code:** ${task.code}`,
    `⏰ **Due:** ${formatDueAt(task.dueAt)} (<t:${timestamp}:R>)`,
    `👥 **Assigned to:** ${recipients.map(formatRecipientMention).join(', ')}`,
    '',
    `⚠️ This task is due in about ${formatReminderOffset(offsetMinutes)}!`,
  ];

  return lines.join('\n');
}

/**
 * Human summary of a reminder set, e.g. `1 hour, 30 minutes, 15 minutes`.
 */
export function describeReminderOffsets(offsets: readonly number[]): string {
  if (offsets.length === 0) {
    return 'off';
  }
  return offsets.map(formatReminderOffset).join(', ');
}
