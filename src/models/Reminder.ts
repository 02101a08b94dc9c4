// MARK: - Reminder Model
// One row per minutes-before-due offset of a task, flipped to sent once fired

import mongoose, { Document, Schema, Types } from 'mongoose';

export interface IReminder extends Document<Types.ObjectId> {
  taskId: Types.ObjectId;
  offsetMinutes: number;
  sent: boolean;
  sentAt?: Date;
  createdAt: Date;
}

const ReminderSchema = new Schema<IReminder>({
  taskId: {
    type: Schema.Types.ObjectId,
    ref: 'Task',
    required: true,
    index: true,
  },
  offsetMinutes: {
    type: Number,
    required: true,
    min: 1,
    validate: {
      validator: Number.isInteger,
      message: 'offsetMinutes must be a whole number of minutes',
    },
  },
  sent: {
    type: Boolean,
    default: false,
  },
  sentAt: {
    type: Date,
  },
  createdAt: {
    type: Date,
    default: Date.now,
  },
});

ReminderSchema.index({ sent: 1, taskId: 1 });

export const Reminder = mongoose.model<IReminder>('Reminder', ReminderSchema);
