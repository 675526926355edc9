// backend/services/tool/src/models/Tool.ts
/**
 * Why:
 * - Keep the model boring (storage only). The shared Zod contract owns shape
 *   and the service owns rules; the mapper sits between them.
 * - _id is a NUMBER issued by the counters collection, not an ObjectId.
 */

import { Schema, model, models, type Model } from "mongoose";

export interface ToolDoc {
  _id: number;
  name: string;
  description: string;
}

const ToolSchema = new Schema<ToolDoc>(
  {
    _id: { type: Number, required: true },
    name: { type: String, required: true },
    description: { type: String, default: "" },
  },
  {
    strict: true,
    versionKey: false,
    bufferCommands: false,
    collection: "tools",
  }
);

export const ToolModel: Model<ToolDoc> =
  models.Tool ?? model<ToolDoc>("Tool", ToolSchema);
