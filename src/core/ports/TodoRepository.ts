import type { ObjectId } from "mongodb";
import type { NewTodoRecord, TodoFields, TodoRecord } from "../entities/todo";

export interface TodoRepository {
  findAll(): Promise<TodoRecord[]>;
  findById(id: ObjectId): Promise<TodoRecord | null>;
  insert(record: NewTodoRecord): Promise<ObjectId>;
  /** Resolves to the number of deleted documents (0 when absent). */
  deleteById(id: ObjectId): Promise<number>;
  /** Resolves to the number of matched documents; a miss is not an error. */
  updateById(id: ObjectId, fields: TodoFields): Promise<number>;
  ping(): Promise<void>;
}
