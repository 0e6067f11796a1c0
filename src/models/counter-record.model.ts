import { Schema } from 'mongoose';

/**
 * A stored counter bucket or typed KV entry
 */
export interface ICounterRecord {
  /** Composite store key */
  _id: string;
  value: string | number;
  expiresAt?: Date | null;
}

/**
 * MongoDB schema for counter records. expiresAt carries a TTL index created
 * by the adapter on initialize.
 */
export const CounterRecordSchema = new Schema<ICounterRecord>(
  {
    _id: { type: String, required: true },
    value: { type: Schema.Types.Mixed, required: true },
    expiresAt: { type: Date, default: null },
  },
  {
    versionKey: false,
    collection: 'velocity_counters',
  },
);
