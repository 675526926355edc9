// backend/services/tool/src/repo/mongoToolRepo.ts
import type { Tool } from "@shared/contracts/tool.contract";
import { ToolModel } from "../models/Tool";
import { nextSequence } from "../models/Counter";
import { dbToDomain, domainToDb } from "../mappers/tool.mapper";
import type { ToolDraft, ToolRepo } from "./toolRepo";

const SEQUENCE = "tools";

/**
 * Mongo-backed ToolRepo. Returns domain objects only (no mongoose docs).
 * Errors from the driver are not caught here.
 */
export class MongoToolRepo implements ToolRepo {
  public async findAll(): Promise<Tool[]> {
    const docs = await ToolModel.find({}).sort({ _id: 1 }).lean().exec();
    return docs.map(dbToDomain);
  }

  public async findById(id: number): Promise<Tool | null> {
    const doc = await ToolModel.findById(id).lean().exec();
    return doc ? dbToDomain(doc) : null;
  }

  public async existsById(id: number): Promise<boolean> {
    return (await ToolModel.exists({ _id: id }).exec()) !== null;
  }

  /**
   * No id: insert under a fresh sequence value. A duplicate _id (counter
   * behind the collection) fails with E11000 rather than overwriting.
   * With id: overwrite that record.
   */
  public async save(tool: ToolDraft): Promise<Tool> {
    if (tool.id === undefined) {
      const id = await nextSequence(SEQUENCE);
      const created = await ToolModel.create(domainToDb({ ...tool, id }));
      return dbToDomain(created.toObject());
    }

    const { _id, ...fields } = domainToDb({ ...tool, id: tool.id });
    const doc = await ToolModel.findOneAndUpdate(
      { _id },
      { $set: fields },
      { upsert: true, new: true, runValidators: true }
    )
      .lean()
      .exec();
    if (!doc) throw new Error(`tool ${_id} was not written`);
    return dbToDomain(doc);
  }

  public async deleteById(id: number): Promise<void> {
    await ToolModel.deleteOne({ _id: id }).exec();
  }

  public async deleteAll(): Promise<void> {
    await ToolModel.deleteMany({}).exec();
  }

  public async count(): Promise<number> {
    return ToolModel.countDocuments({}).exec();
  }
}
