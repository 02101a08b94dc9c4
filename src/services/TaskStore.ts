// MARK: - Task Store
// MongoDB-backed persistence for tasks, reminder sets, and participant preferences

import { Types } from 'mongoose';
import { Task, ITask } from '../models/Task';
import { Reminder, IReminder } from '../models/Reminder';
import { Participant, IParticipant } from '../models/Participant';
import { Counter } from '../models/Counter';
import { normalizeReminderOffsets } from './reminders/offsets';
import type {
  PendingReminder,
  ReminderAssignee,
  TaskStatus,
  TaskStore,
} from './reminders/types';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const TASK_CODE_COUNTER = 'taskCode';

export interface TaskRecord {
  id: string;
  code: string;
  sequence: number;
  name: string;
  guildId: string;
  channelId: string;
  dueAt: Date;
  status: TaskStatus;
  assigneeIds: string[];
  createdBy: string;
  createdAt: Date;
  completedAt?: Date;
}

export interface ReminderRecord {
  id: string;
  taskId: string;
  offsetMinutes: number;
  sent: boolean;
  createdAt: Date;
  sentAt?: Date;
}

export interface ParticipantRecord {
  userId: string;
  handle?: string;
  displayName?: string;
  receiveReminders: boolean;
  createdAt: Date;
}

export interface NewTaskInput {
  guildId: string;
  channelId: string;
  name: string;
  dueAt: Date;
  assigneeIds: string[];
  createdBy: string;
}

export interface TaskChanges {
  name?: string;
  dueAt?: Date;
  status?: TaskStatus;
}

export interface TaskQuery {
  guildId?: string;
  statuses?: readonly TaskStatus[];
  skip: number;
  limit: number;
}

export interface ParticipantProfile {
  userId: string;
  handle?: string;
  displayName?: string;
}

/**
 * Full persistence surface used by the command layer and the REST API.
 * The scheduler only depends on the narrower {@link TaskStore}.
 */
export interface TaskRepository extends TaskStore {
  createTask(input: NewTaskInput): Promise<TaskRecord>;
  findTaskById(taskId: string): Promise<TaskRecord | null>;
  findTaskByCode(guildId: string, code: string): Promise<TaskRecord | null>;
  listTasks(query: TaskQuery): Promise<TaskRecord[]>;
  listTasksForAssignee(guildId: string, userId: string, statuses: readonly TaskStatus[]): Promise<TaskRecord[]>;
  updateTask(taskId: string, changes: TaskChanges): Promise<TaskRecord | null>;
  addAssignee(taskId: string, userId: string): Promise<TaskRecord | null>;
  deleteTask(taskId: string): Promise<boolean>;
  createReminderSet(taskId: string, offsets: readonly number[]): Promise<ReminderRecord[]>;
  replaceReminderSet(taskId: string, offsets: readonly number[]): Promise<ReminderRecord[]>;
  listReminders(taskId: string): Promise<ReminderRecord[]>;
  upsertParticipant(profile: ParticipantProfile): Promise<void>;
  setReminderOptIn(userId: string, enabled: boolean): Promise<void>;
  findParticipant(userId: string): Promise<ParticipantRecord | null>;
  listParticipants(skip: number, limit: number): Promise<ParticipantRecord[]>;
}

/**
 * Display code for a task. Codes widen past `TK9999`, so ordering uses the
 * stored sequence rather than the code text.
 */
export function formatTaskCode(sequence: number): string {
  return `TK${String(sequence).padStart(4, '0')}`;
}

export function toTaskRecord(task: ITask): TaskRecord {
  return {
    id: task._id.toHexString(),
    code: task.code,
    sequence: task.sequence,
    name: task.name,
    guildId: task.guildId,
    channelId: task.channelId,
    dueAt: task.dueAt,
    status: task.status,
    assigneeIds: [...task.assigneeIds],
    createdBy: task.createdBy,
    createdAt: task.createdAt,
    completedAt: task.completedAt,
  };
}

export function toReminderRecord(reminder: IReminder): ReminderRecord {
  return {
    id: reminder._id.toHexString(),
    taskId: reminder.taskId.toHexString(),
    offsetMinutes: reminder.offsetMinutes,
    sent: reminder.sent,
    createdAt: reminder.createdAt,
    sentAt: reminder.sentAt,
  };
}

export function toParticipantRecord(participant: IParticipant): ParticipantRecord {
  return {
    userId: participant.userId,
    handle: participant.handle,
    displayName: participant.displayName,
    receiveReminders: participant.receiveReminders,
    createdAt: participant.createdAt,
  };
}

export class MongoTaskStore implements TaskRepository {
  /**
   * Only reminders of open tasks are read, so completed tasks drop out of
   * the scan without touching their reminder rows.
   */
  async listPendingReminders(): Promise<PendingReminder[]> {
    const tasks = await Task.find({ status: { $ne: 'DONE' } });
    if (tasks.length === 0) {
      return [];
    }

    const reminders = await Reminder.find({
      sent: false,
      taskId: { $in: tasks.map(task => task._id) },
    }).sort({ createdAt: 1 });
    if (reminders.length === 0) {
      return [];
    }

    const tasksById = new Map(tasks.map(task => [task._id.toHexString(), task]));
    const taskIdsWithReminders = new Set(reminders.map(reminder => reminder.taskId.toHexString()));
    const assigneeIds = Array.from(new Set(
      tasks
        .filter(task => taskIdsWithReminders.has(task._id.toHexString()))
        .flatMap(task => task.assigneeIds),
    ));
    const participants = assigneeIds.length > 0
      ? await Participant.find({ userId: { $in: assigneeIds } })
      : [];
    const participantsById = new Map(participants.map(participant => [participant.userId, participant]));

    const pending: PendingReminder[] = [];
    for (const reminder of reminders) {
      const task = tasksById.get(reminder.taskId.toHexString());
      if (!task) {
        continue;
      }

      const assignees: ReminderAssignee[] = task.assigneeIds.map(userId => {
        const participant = participantsById.get(userId);
        return {
          id: userId,
          handle: participant?.handle,
          displayName: participant?.displayName,
          optedIn: participant?.receiveReminders ?? true,
        };
      });

      pending.push({
        reminderId: reminder._id.toHexString(),
        offsetMinutes: reminder.offsetMinutes,
        sent: reminder.sent,
        task: {
          id: task._id.toHexString(),
          code: task.code,
          name: task.name,
          chatId: task.channelId,
          dueAt: task.dueAt,
          status: task.status,
          assignees,
        },
      });
    }

    return pending;
  }

  async markReminderSent(reminderId: string): Promise<boolean> {
    if (!Types.ObjectId.isValid(reminderId)) {
      return false;
    }

    const result = await Reminder.updateOne(
      { _id: reminderId, sent: false },
      { $set: { sent: true, sentAt: new Date() } },
    );

    if (result.matchedCount > 0) {
      return true;
    }

    const existing = await Reminder.exists({ _id: reminderId });
    return existing !== null;
  }

  async createTask(input: NewTaskInput): Promise<TaskRecord> {
    const counter = await Counter.findOneAndUpdate(
      { _id: TASK_CODE_COUNTER },
      { $inc: { seq: 1 } },
      { new: true, upsert: true },
    );

    if (!counter) {
      throw new Error('Failed to allocate a task code');
    }

    const task = await Task.create({
      code: formatTaskCode(counter.seq),
      sequence: counter.seq,
      name: input.name,
      guildId: input.guildId,
      channelId: input.channelId,
      dueAt: input.dueAt,
      assigneeIds: input.assigneeIds,
      createdBy: input.createdBy,
      status: 'NEW',
    });

    return toTaskRecord(task);
  }

  async findTaskById(taskId: string): Promise<TaskRecord | null> {
    if (!Types.ObjectId.isValid(taskId)) {
      return null;
    }

    const task = await Task.findById(taskId);
    return task ? toTaskRecord(task) : null;
  }

  async findTaskByCode(guildId: string, code: string): Promise<TaskRecord | null> {
    const task = await Task.findOne({ guildId, code: code.trim().toUpperCase() });
    return task ? toTaskRecord(task) : null;
  }

  async listTasks(query: TaskQuery): Promise<TaskRecord[]> {
    const filter: { guildId?: string; status?: { $in: TaskStatus[] } } = {};
    if (query.guildId) {
      filter.guildId = query.guildId;
    }
    if (query.statuses) {
      filter.status = { $in: [...query.statuses] };
    }

    const tasks = await Task.find(filter)
      .sort({ sequence: 1 })
      .skip(query.skip)
      .limit(query.limit);

    return tasks.map(toTaskRecord);
  }

  async listTasksForAssignee(
    guildId: string,
    userId: string,
    statuses: readonly TaskStatus[],
  ): Promise<TaskRecord[]> {
    const tasks = await Task.find({
      guildId,
      assigneeIds: userId,
      status: { $in: [...statuses] },
    })
      .sort({ dueAt: 1 })
      .limit(25);

    return tasks.map(toTaskRecord);
  }

  async updateTask(taskId: string, changes: TaskChanges): Promise<TaskRecord | null> {
    if (!Types.ObjectId.isValid(taskId)) {
      return null;
    }

    const task = await Task.findById(taskId);
    if (!task) {
      return null;
    }

    if (changes.name !== undefined) {
      task.name = changes.name;
    }
    if (changes.dueAt !== undefined) {
      task.dueAt = changes.dueAt;
    }
    if (changes.status !== undefined) {
      task.status = changes.status;
    }

    await task.save();
    return toTaskRecord(task);
  }

  async addAssignee(taskId: string, userId: string): Promise<TaskRecord | null> {
    if (!Types.ObjectId.isValid(taskId)) {
      return null;
    }

    const task = await Task.findOneAndUpdate(
      { _id: taskId },
      { $addToSet: { assigneeIds: userId }, $set: { updatedAt: new Date() } },
      { new: true },
    );
    return task ? toTaskRecord(task) : null;
  }

  async deleteTask(taskId: string): Promise<boolean> {
    if (!Types.ObjectId.isValid(taskId)) {
      return false;
    }

    const result = await Task.deleteOne({ _id: taskId });
    const removed = await Reminder.deleteMany({ taskId });

    logger.info('Task deleted', {
      taskId,
      deleted: result.deletedCount > 0,
      remindersRemoved: removed.deletedCount,
    });

    return result.deletedCount > 0;
  }

  async createReminderSet(taskId: string, offsets: readonly number[]): Promise<ReminderRecord[]> {
    const normalized = normalizeReminderOffsets(offsets);
    if (normalized.length === 0) {
      return [];
    }

    const created = await Reminder.create(
      normalized.map(offsetMinutes => ({
        taskId: new Types.ObjectId(taskId),
        offsetMinutes,
        sent: false,
      })),
    );

    return created.map(toReminderRecord);
  }

  /**
   * Writes the new set before removing the old rows (sent or not), so a failed
   * insert leaves the previous reminders in place.
   */
  async replaceReminderSet(taskId: string, offsets: readonly number[]): Promise<ReminderRecord[]> {
    const normalized = normalizeReminderOffsets(offsets);
    const created = await this.createReminderSet(taskId, normalized);
    const keepIds = created.map(reminder => new Types.ObjectId(reminder.id));

    try {
      const removed = await Reminder.deleteMany({ taskId, _id: { $nin: keepIds } });
      logger.info('Reminder set replaced', {
        taskId,
        removed: removed.deletedCount,
        offsets: normalized,
      });
    } catch (error) {
      logger.error('Reminder set replacement left previous reminders in place', {
        taskId,
        newReminderIds: created.map(reminder => reminder.id),
        error: errorMessage(error),
      });
      throw error;
    }

    return created;
  }

  async listReminders(taskId: string): Promise<ReminderRecord[]> {
    const reminders = await Reminder.find({ taskId }).sort({ offsetMinutes: -1 });
    return reminders.map(toReminderRecord);
  }

  async upsertParticipant(profile: ParticipantProfile): Promise<void> {
    await Participant.updateOne(
      { userId: profile.userId },
      {
        $set: {
          handle: profile.handle,
          displayName: profile.displayName,
          updatedAt: new Date(),
        },
        $setOnInsert: { receiveReminders: true, createdAt: new Date() },
      },
      { upsert: true },
    );
  }

  async setReminderOptIn(userId: string, enabled: boolean): Promise<void> {
    await Participant.updateOne(
      { userId },
      {
        $set: { receiveReminders: enabled, updatedAt: new Date() },
        $setOnInsert: { createdAt: new Date() },
      },
      { upsert: true },
    );

    logger.info('Reminder opt-in updated', { userId, enabled });
  }

  async findParticipant(userId: string): Promise<ParticipantRecord | null> {
    const participant = await Participant.findOne({ userId });
    return participant ? toParticipantRecord(participant) : null;
  }

  async listParticipants(skip: number, limit: number): Promise<ParticipantRecord[]> {
    const participants = await Participant.find()
      .sort({ createdAt: 1 })
      .skip(skip)
      .limit(limit);

    return participants.map(toParticipantRecord);
  }
}
