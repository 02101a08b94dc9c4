// MARK: - Task Model
// Persists group tasks with their due instant, status, and assignees

import mongoose, { Schema, Document, Types } from 'mongoose';
import { TASK_STATUSES, TaskStatus } from '../services/reminders/types';

export interface ITask extends Document<Types.ObjectId> {
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
  updatedAt: Date;
  completedAt?: Date;
}

const TaskSchema = new Schema<ITask>({
  code: {
    type: String,
    required: true,
    unique: true,
  },
  sequence: {
    type: Number,
    required: true,
    index: true,
  },
  name: {
    type: String,
    required: true,
    minlength: 1,
    maxlength: 200,
  },
  guildId: {
    type: String,
    required: true,
    index: true,
  },
  channelId: {
    type: String,
    required: true,
  },
  dueAt: {
    type: Date,
    required: true,
  },
  status: {
    type: String,
    enum: [...TASK_STATUSES],
    default: 'NEW',
  },
  assigneeIds: [{
    type: String,
  }],
  createdBy: {
    type: String,
    required: true,
  },
  createdAt: {
    type: Date,
    default: Date.now,
  },
  updatedAt: {
    type: Date,
    default: Date.now,
  },
  completedAt: {
    type: Date,
  },
});

TaskSchema.index({ guildId: 1, status: 1 });
TaskSchema.index({ status: 1 });
TaskSchema.index({ guildId: 1, assigneeIds: 1, status: 1 });

TaskSchema.pre('save', function taskUpdate(next) {
  this.updatedAt = new Date();
  if (this.status === 'DONE' && !this.completedAt) {
    this.completedAt = new Date();
  }
  next();
});

export const Task = mongoose.model<ITask>('Task', TaskSchema);
