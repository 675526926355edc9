// backend/services/tool/src/models/Counter.ts
import { Schema, model, models, type Model } from "mongoose";

/** One document per sequence; `seq` is the last id handed out. */
export interface CounterDoc {
  _id: string;
  seq: number;
}

const CounterSchema = new Schema<CounterDoc>(
  {
    _id: { type: String, required: true },
    seq: { type: Number, required: true, default: 0 },
  },
  {
    strict: true,
    versionKey: false,
    bufferCommands: false,
    collection: "counters",
  }
);

export const CounterModel: Model<CounterDoc> =
  models.Counter ?? model<CounterDoc>("Counter", CounterSchema);

/** Atomically reserve the next value of `sequence` (first call yields 1). */
export async function nextSequence(sequence: string): Promise<number> {
  const doc = await CounterModel.findOneAndUpdate(
    { _id: sequence },
    { $inc: { seq: 1 } },
    { upsert: true, new: true }
  )
    .lean()
    .exec();
  if (!doc) throw new Error(`counter "${sequence}" was not upserted`);
  return doc.seq;
}
