// MARK: - Participant Model
// Chat members known to the bot and their reminder opt-in preference

import mongoose, { Document, Schema, Types } from 'mongoose';

export interface IParticipant extends Document<Types.ObjectId> {
  userId: string;
  handle?: string;
  displayName?: string;
  receiveReminders: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const ParticipantSchema = new Schema<IParticipant>({
  userId: {
    type: String,
    required: true,
    unique: true,
  },
  handle: {
    type: String,
    trim: true,
  },
  displayName: {
    type: String,
    trim: true,
  },
  receiveReminders: {
    type: Boolean,
    default: true,
  },
  createdAt: {
    type: Date,
    default: Date.now,
  },
  updatedAt: {
    type: Date,
    default: Date.now,
  },
});

export const Participant = mongoose.model<IParticipant>('Participant', ParticipantSchema);
