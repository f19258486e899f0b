import { ObjectId } from "mongodb";
import type { NewTodoRecord, TodoFields, TodoRecord } from "../../core/entities/todo";
import type { TodoRepository } from "../../core/ports/TodoRepository";

export default class InMemoryTodoRepository implements TodoRepository {
  private items = new Map<string, TodoRecord>();

  async findAll(): Promise<TodoRecord[]> {
    return Array.from(this.items.values()).map(t => ({ ...t }));
  }

  async findById(id: ObjectId): Promise<TodoRecord | null> {
    const t = this.items.get(id.toHexString());
    return t ? { ...t } : null;
  }

  async insert(record: NewTodoRecord): Promise<ObjectId> {
    const id = new ObjectId();
    this.items.set(id.toHexString(), { ...record, id });
    return id;
  }

  async deleteById(id: ObjectId): Promise<number> {
    return this.items.delete(id.toHexString()) ? 1 : 0;
  }

  async updateById(id: ObjectId, fields: TodoFields): Promise<number> {
    const current = this.items.get(id.toHexString());
    if (!current) return 0;
    this.items.set(id.toHexString(), { ...current, title: fields.title, completed: fields.completed });
    return 1;
  }

  async ping(): Promise<void> {}
}
