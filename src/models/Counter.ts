// MARK: - Counter Model
// Named monotonically increasing sequences (task codes)

import mongoose, { Document, Schema } from 'mongoose';

export interface ICounter extends Document<string> {
  seq: number;
}

const CounterSchema = new Schema<ICounter>({
  _id: {
    type: String,
    required: true,
  },
  seq: {
    type: Number,
    default: 0,
  },
});

export const Counter = mongoose.model<ICounter>('Counter', CounterSchema);
