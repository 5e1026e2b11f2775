import mongoose, { Schema } from 'mongoose';

export interface ICounter {
  _id: string;
  seq: number;
}

const CounterSchema = new Schema<ICounter>({
  _id: { type: String, required: true },
  seq: { type: Number, required: true, default: 0 },
});

const Counter = mongoose.model<ICounter>('Counter', CounterSchema);

/**
 * Next value of a named sequence. Allocated outside any transaction, so ids
 * burned by a rolled-back insert are not reused.
 */
export async function nextSequence(name: string): Promise<number> {
  const doc = await Counter.findOneAndUpdate(
    { _id: name },
    { $inc: { seq: 1 } },
    { new: true, upsert: true }
  ).lean<ICounter>();
  if (!doc) {
    throw new Error(`Sequence ${name} could not be allocated`);
  }
  return doc.seq;
}

export default Counter;
