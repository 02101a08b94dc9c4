// MARK: - Reminder Core Types
// Plain value shapes exchanged between the scheduler and its collaborators

export type TaskStatus = 'NEW' | 'IN_PROGRESS' | 'DONE';

export const TASK_STATUSES: readonly TaskStatus[] = ['NEW', 'IN_PROGRESS', 'DONE'];

export interface ReminderAssignee {
  id: string;
  handle?: string;
  displayName?: string;
  optedIn: boolean;
}

export interface ReminderTaskSnapshot {
  id: string;
  code: string;
  name: string;
  chatId: string;
  dueAt: Date;
  status: TaskStatus;
  assignees: ReminderAssignee[];
}

export interface PendingReminder {
  reminderId: string;
  offsetMinutes: number;
  sent: boolean;
  task: ReminderTaskSnapshot;
}

/**
 * Storage operations the scheduler depends on.
 * `listPendingReminders` only returns unsent reminders of tasks that are not DONE.
 */
export interface TaskStore {
  listPendingReminders(): Promise<PendingReminder[]>;
  /** Idempotent: marking an already-sent reminder resolves true. */
  markReminderSent(reminderId: string): Promise<boolean>;
}

/**
 * Best-effort message transport. Resolves false (or rejects) when the
 * transport does not accept the message; callers never retry.
 * Only `mentionUserIds` may be pinged by the message.
 */
export interface Notifier {
  send(chatId: string, text: string, mentionUserIds: readonly string[]): Promise<boolean>;
}
