// MARK: - Task Manager Service
// Task CRUD and reminder-set edits on top of the task repository

import { DEFAULT_REMINDER_OFFSETS, normalizeReminderOffsets } from './reminders/offsets';
import { describeReminderOffsets, formatDueAt } from './reminders/composer';
import type { TaskStatus } from './reminders/types';
import type {
  ParticipantProfile,
  ParticipantRecord,
  ReminderRecord,
  TaskChanges,
  TaskRecord,
  TaskRepository,
} from './TaskStore';
import { TaskValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

const MAX_TASK_NAME_LENGTH = 200;
const DAY_MS = 86_400_000;
const HOUR_MS = 3_600_000;
const MINUTE_MS = 60_000;

export type TaskListFilter = TaskStatus | 'open' | 'all';

export interface AddTaskOptions {
  guildId: string;
  channelId: string;
  name: string;
  dueAt: Date;
  assigneeIds: string[];
  createdBy: string;
  reminderOffsets?: number[];
  now?: Date;
}

export interface TaskWithReminders {
  task: TaskRecord;
  reminders: ReminderRecord[];
}

export interface TaskListOptions {
  guildId?: string;
  status?: TaskStatus;
  skip: number;
  limit: number;
}

export type AssignmentResult =
  | { outcome: 'assigned'; task: TaskRecord }
  | { outcome: 'task-not-found' | 'user-not-found' | 'already-assigned' };

const STATUS_ICONS: Record<TaskStatus, string> = {
  NEW: '📝',
  IN_PROGRESS: '🚧',
  DONE: '✅',
};

function statusesFor(filter: TaskListFilter): TaskStatus[] {
  if (filter === 'open') {
    return ['NEW', 'IN_PROGRESS'];
  }
  if (filter === 'all') {
    return ['NEW', 'IN_PROGRESS', 'DONE'];
  }
  return [filter];
}

export function formatTimeLeft(dueAt: Date, now: Date): string {
  const remaining = dueAt.getTime() - now.getTime();
  if (remaining <= 0) {
    return 'overdue';
  }

  const days = Math.floor(remaining / DAY_MS);
  const hours = Math.floor((remaining % DAY_MS) / HOUR_MS);

  if (days > 0) {
    return `${days} day(s) ${hours} hour(s) left`;
  }
  if (hours > 0) {
    return `${hours} hour(s) left`;
  }
  return `${Math.floor(remaining / MINUTE_MS)} minute(s) left`;
}

function validateTaskName(raw: string): string {
  const name = raw.trim();
  if (!name) {
    throw new TaskValidationError('Please tell me what the task is.');
  }
  if (name.length > MAX_TASK_NAME_LENGTH) {
    throw new TaskValidationError(`Task names are limited to ${MAX_TASK_NAME_LENGTH} characters.`);
  }
  return name;
}

export class TaskManager {
  constructor(
    private readonly store: TaskRepository,
    private readonly defaultOffsets: readonly number[] = DEFAULT_REMINDER_OFFSETS,
  ) {}

  async addTask(options: AddTaskOptions): Promise<TaskWithReminders> {
    const name = validateTaskName(options.name);
    const now = options.now ?? new Date();

    if (Number.isNaN(options.dueAt.getTime())) {
      throw new TaskValidationError('The due date could not be understood.');
    }

    if (options.dueAt.getTime() <= now.getTime()) {
      throw new TaskValidationError(`The due date needs to be in the future. I understood: ${formatDueAt(options.dueAt)}`);
    }

    const offsets = normalizeReminderOffsets(options.reminderOffsets, this.defaultOffsets);

    const task = await this.store.createTask({
      guildId: options.guildId,
      channelId: options.channelId,
      name,
      dueAt: options.dueAt,
      assigneeIds: Array.from(new Set(options.assigneeIds)),
      createdBy: options.createdBy,
    });

    const reminders = await this.store.createReminderSet(task.id, offsets);

    logger.info('Task created', {
      guildId: options.guildId,
      channelId: options.channelId,
      taskCode: task.code,
      assignees: task.assigneeIds.length,
      reminderOffsets: offsets,
    });

    return { task, reminders };
  }

  async listTasksForUser(
    guildId: string,
    userId: string,
    filter: TaskListFilter = 'open',
  ): Promise<TaskWithReminders[]> {
    const tasks = await this.store.listTasksForAssignee(guildId, userId, statusesFor(filter));

    return Promise.all(
      tasks.map(async task => ({
        task,
        reminders: await this.store.listReminders(task.id),
      })),
    );
  }

  async updateStatus(guildId: string, code: string, status: TaskStatus): Promise<TaskRecord | null> {
    const task = await this.store.findTaskByCode(guildId, code);
    if (!task) {
      return null;
    }

    if (task.status === status) {
      return task;
    }

    const updated = await this.store.updateTask(task.id, { status });
    logger.info('Task status updated', { guildId, taskCode: task.code, from: task.status, to: status });
    return updated;
  }

  async deleteTask(guildId: string, code: string): Promise<TaskRecord | null> {
    const task = await this.store.findTaskByCode(guildId, code);
    if (!task) {
      return null;
    }

    await this.store.deleteTask(task.id);
    return task;
  }

  /**
   * Replaces the task's reminders wholesale; previously sent offsets become unsent again.
   */
  async editReminders(guildId: string, code: string, offsets: number[]): Promise<TaskWithReminders | null> {
    const normalized = normalizeReminderOffsets(offsets);
    const task = await this.store.findTaskByCode(guildId, code);
    if (!task) {
      return null;
    }

    const reminders = await this.store.replaceReminderSet(task.id, normalized);
    return { task, reminders };
  }

  async getTask(taskId: string): Promise<TaskWithReminders | null> {
    const task = await this.store.findTaskById(taskId);
    if (!task) {
      return null;
    }
    return { task, reminders: await this.store.listReminders(task.id) };
  }

  listTasks(options: TaskListOptions): Promise<TaskRecord[]> {
    return this.store.listTasks({
      guildId: options.guildId,
      statuses: options.status ? [options.status] : undefined,
      skip: options.skip,
      limit: options.limit,
    });
  }

  /**
   * Applies a partial edit. Moving the due date needs no reminder rewrite:
   * fire instants are derived from it on every scan.
   */
  async updateTask(taskId: string, changes: TaskChanges): Promise<TaskRecord | null> {
    const validated: TaskChanges = { ...changes };
    if (changes.name !== undefined) {
      validated.name = validateTaskName(changes.name);
    }
    if (changes.dueAt !== undefined && Number.isNaN(changes.dueAt.getTime())) {
      throw new TaskValidationError('The due date could not be understood.');
    }

    const updated = await this.store.updateTask(taskId, validated);
    if (updated) {
      logger.info('Task updated', { taskCode: updated.code, fields: Object.keys(validated) });
    }
    return updated;
  }

  async deleteTaskById(taskId: string): Promise<boolean> {
    return this.store.deleteTask(taskId);
  }

  async assignTask(taskId: string, userId: string): Promise<AssignmentResult> {
    const task = await this.store.findTaskById(taskId);
    if (!task) {
      return { outcome: 'task-not-found' };
    }

    const participant = await this.store.findParticipant(userId);
    if (!participant) {
      return { outcome: 'user-not-found' };
    }

    if (task.assigneeIds.includes(userId)) {
      return { outcome: 'already-assigned' };
    }

    const updated = await this.store.addAssignee(taskId, userId);
    if (!updated) {
      return { outcome: 'task-not-found' };
    }

    logger.info('Task assigned', { taskCode: updated.code, userId });
    return { outcome: 'assigned', task: updated };
  }

  /**
   * Creates a participant record. Resolves null when the user already exists.
   */
  async createParticipant(
    profile: ParticipantProfile,
    receiveReminders = true,
  ): Promise<ParticipantRecord | null> {
    if (await this.store.findParticipant(profile.userId)) {
      return null;
    }

    await this.store.upsertParticipant(profile);
    if (!receiveReminders) {
      await this.store.setReminderOptIn(profile.userId, false);
    }
    return this.store.findParticipant(profile.userId);
  }

  getParticipant(userId: string): Promise<ParticipantRecord | null> {
    return this.store.findParticipant(userId);
  }

  listParticipants(skip: number, limit: number): Promise<ParticipantRecord[]> {
    return this.store.listParticipants(skip, limit);
  }

  async setReminderOptIn(profile: ParticipantProfile, enabled: boolean): Promise<void> {
    await this.store.upsertParticipant(profile);
    await this.store.setReminderOptIn(profile.userId, enabled);
  }

  async registerParticipants(profiles: ParticipantProfile[]): Promise<void> {
    for (const profile of profiles) {
      await this.store.upsertParticipant(profile);
    }
  }

  formatTasks(entries: TaskWithReminders[], now: Date = new Date()): string {
    if (entries.length === 0) {
      return '📭 No tasks found.';
    }

    return entries
      .map(({ task, reminders }) => {
        const offsets = reminders.map(reminder => reminder.offsetMinutes);
        const reminderLine = offsets.length > 0
          ? `🔔 Reminders: ${describeReminderOffsets(offsets)} before`
          : '🔕 Reminders off';
        const timestamp = Math.floor(task.dueAt.getTime() / 1000);

        return [
          `${STATUS_ICONS[task.status]} \`${task.code}\` **${task.name}** · ${task.status}`,
          `   ⏰ Due: ${formatDueAt(task.dueAt)} (<t:${timestamp}:R>) · ⏳ ${formatTimeLeft(task.dueAt, now)}`,
          `   ${reminderLine}`,
        ].join('\n');
      })
      .join('\n\n');
  }
}
