import { ObjectId } from "mongodb";
import type { Collection, Db, Document } from "mongodb";
import type { NewTodoRecord, TodoFields, TodoRecord } from "../../core/entities/todo";
import type { TodoRepository } from "../../core/ports/TodoRepository";
import { StoreError, describeError } from "../../errors";
import { withTimeout } from "../timeout";

/** Shape of a todo as persisted; `createAt` is the field name already in use. */
export interface TodoDocument {
  _id: ObjectId;
  title: string;
  completed: boolean;
  createAt: Date;
}

export interface MongoTodoRepositoryOptions {
  timeoutMs: number;
}

function decode(doc: Record<string, unknown>): TodoRecord {
  const { _id, title, completed, createAt } = doc;
  if (!(_id instanceof ObjectId)) throw new Error(`invalid _id: ${String(_id)}`);
  if (typeof title !== "string") throw new Error(`todo ${_id.toHexString()}: title is not a string`);
  if (typeof completed !== "boolean" && typeof completed !== "undefined") {
    throw new Error(`todo ${_id.toHexString()}: completed is not a boolean`);
  }
  if (!(createAt instanceof Date)) throw new Error(`todo ${_id.toHexString()}: createAt is not a date`);
  return { id: _id, title, completed: completed ?? false, createdAt: createAt };
}

export default class MongoTodoRepository implements TodoRepository {
  constructor(
    private readonly db: Db,
    private readonly collection: Collection<TodoDocument>,
    private readonly options: MongoTodoRepositoryOptions
  ) {}

  private async run<T>(message: string, work: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(this.options.timeoutMs, work);
    } catch (err) {
      throw new StoreError(message, describeError(err), { cause: err });
    }
  }

  /**
   * Server-side bounds for writes, so a write abandoned by `withTimeout` is
   * also cut off by the server rather than applied later.
   */
  private get writeOptions() {
    const { timeoutMs } = this.options;
    return { maxTimeMS: timeoutMs, writeConcern: { wtimeoutMS: timeoutMs } };
  }

  private decodeAll(docs: Document[]): TodoRecord[] {
    try {
      return docs.map(decode);
    } catch (err) {
      throw new StoreError("Failed to decode todos", describeError(err), { cause: err });
    }
  }

  async findAll(): Promise<TodoRecord[]> {
    const docs = await this.run("Failed to fetch todo", () =>
      this.collection.find<Document>({}, { maxTimeMS: this.options.timeoutMs }).toArray()
    );
    return this.decodeAll(docs);
  }

  async findById(id: ObjectId): Promise<TodoRecord | null> {
    const doc = await this.run("Failed to fetch todo", () =>
      this.collection.findOne<Document>({ _id: id }, { maxTimeMS: this.options.timeoutMs })
    );
    return doc ? this.decodeAll([doc])[0] : null;
  }

  async insert(record: NewTodoRecord): Promise<ObjectId> {
    const doc: TodoDocument = {
      _id: new ObjectId(),
      title: record.title,
      completed: record.completed,
      createAt: record.createdAt,
    };
    const res = await this.run("Failed to save todo", () =>
      this.collection.insertOne(doc, this.writeOptions)
    );
    return res.insertedId;
  }

  async deleteById(id: ObjectId): Promise<number> {
    const res = await this.run("Failed to delete TODO", () =>
      this.collection.deleteOne({ _id: id }, this.writeOptions)
    );
    return res.deletedCount;
  }

  async updateById(id: ObjectId, fields: TodoFields): Promise<number> {
    const res = await this.run("Failed to update todo", () =>
      this.collection.updateOne(
        { _id: id },
        { $set: { title: fields.title, completed: fields.completed } },
        this.writeOptions
      )
    );
    return res.matchedCount;
  }

  async ping(): Promise<void> {
    await this.run("Failed to reach store", () => this.db.command({ ping: 1 }));
  }
}
